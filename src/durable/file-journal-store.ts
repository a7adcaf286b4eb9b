// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { EscalationError, formatIssues } from "../errors.js";
import { logger } from "../logger.js";
import {
  assertSafeKey,
  isErrnoException,
  keyToFileName,
  readFileIfExists,
  releaseLock,
  tryAcquireLock,
  writeJsonAtomic,
} from "../persistence.js";
import { IncompatibleRunVersionError } from "./errors.js";
import { RUN_FORMAT_VERSION, RunRecordSchema, type JournalStore, type RunRecord } from "./journal.js";

/**
 * Run records as JSON files under `<dataDir>/runs/`, each guarded by a pid
 * lock file beside it. Finished records replaced by a new run move to
 * `runs/archive/`.
 */
export class FileJournalStore implements JournalStore {
  private readonly dir: string;
  private readonly log = logger.child({ module: "journal-store" });

  constructor(dataDir: string) {
    this.dir = path.join(dataDir, "runs");
  }

  private recordPath(instanceId: string): string {
    assertSafeKey(instanceId, "instance id");
    return path.join(this.dir, keyToFileName(instanceId, ".json"));
  }

  async load(instanceId: string): Promise<RunRecord | null> {
    const file = this.recordPath(instanceId);
    const raw = await readFileIfExists(file);
    if (raw === null) return null;
    return this.parse(raw, file, instanceId);
  }

  async save(record: RunRecord): Promise<void> {
    await writeJsonAtomic(this.recordPath(record.instanceId), { ...record, version: RUN_FORMAT_VERSION });
  }

  async archive(instanceId: string): Promise<void> {
    const file = this.recordPath(instanceId);
    const stamp = new Date().toISOString().replace(/[:.]/g, "-");
    const target = path.join(this.dir, "archive", keyToFileName(`${instanceId}.${stamp}`, ".json"));
    await fs.mkdir(path.dirname(target), { recursive: true });
    try {
      await fs.rename(file, target);
      this.log.debug({ instanceId, target }, "run archived");
    } catch (err: unknown) {
      if (!isErrnoException(err) || err.code !== "ENOENT") throw err;
    }
  }

  async list(): Promise<RunRecord[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "ENOENT") return [];
      throw err;
    }
    const records: RunRecord[] = [];
    for (const entry of entries.filter((e) => e.endsWith(".json")).sort()) {
      const file = path.join(this.dir, entry);
      const raw = await readFileIfExists(file);
      if (raw === null) continue;
      try {
        records.push(this.parse(raw, file, entry));
      } catch (err: unknown) {
        if (err instanceof IncompatibleRunVersionError) throw err;
        this.log.warn({ file, err: String(err) }, "skipping unreadable run record");
      }
    }
    return records;
  }

  tryLock(instanceId: string): Promise<boolean> {
    return tryAcquireLock(this.recordPath(instanceId) + ".lock");
  }

  unlock(instanceId: string): Promise<void> {
    return releaseLock(this.recordPath(instanceId) + ".lock");
  }

  private parse(raw: string, file: string, instanceId: string): RunRecord {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err: unknown) {
      throw new EscalationError(`Run record ${file} is not valid JSON: ${String(err)}`);
    }
    const result = RunRecordSchema.safeParse(json);
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new EscalationError(`Run record ${file} failed validation: ${issues}`);
    }
    if (result.data.version !== RUN_FORMAT_VERSION) {
      throw new IncompatibleRunVersionError(instanceId, result.data.version, RUN_FORMAT_VERSION);
    }
    return result.data;
  }
}
