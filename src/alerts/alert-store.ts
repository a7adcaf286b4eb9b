// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { AlertAlreadyExistsError, AlertNotFoundError, EscalationError, formatIssues } from "../errors.js";
import { logger } from "../logger.js";
import {
  assertSafeKey,
  isErrnoException,
  keyToFileName,
  readFileIfExists,
  writeJsonAtomic,
} from "../persistence.js";
import { AlertSchema, type Alert } from "../types.js";

/** Persisted alert records. The engine reads and updates; ingestion creates. */
export interface AlertStore {
  get(alertId: string): Promise<Alert | null>;
  /** Replace an existing alert. Throws {@link AlertNotFoundError} if it does not exist. */
  update(alert: Alert): Promise<Alert>;
  create(alert: Alert): Promise<Alert>;
  list(): Promise<Alert[]>;
}

/** Parse raw JSON into an alert, reporting zod issues by field path. */
export function parseAlert(raw: unknown, source: string): Alert {
  const result = AlertSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new EscalationError(`Invalid alert in ${source}: ${issues}`);
  }
  return result.data;
}

/** One JSON document per alert under `<dataDir>/alerts/`. */
export class FileAlertStore implements AlertStore {
  private readonly dir: string;
  private readonly log = logger.child({ component: "alert-store" });

  constructor(dataDir: string) {
    this.dir = path.join(dataDir, "alerts");
  }

  private fileFor(alertId: string): string {
    assertSafeKey(alertId, "alert id");
    return path.join(this.dir, keyToFileName(alertId, ".json"));
  }

  async get(alertId: string): Promise<Alert | null> {
    const file = this.fileFor(alertId);
    const raw = await readFileIfExists(file);
    if (raw === null) return null;
    return parseAlert(JSON.parse(raw), file);
  }

  async update(alert: Alert): Promise<Alert> {
    const file = this.fileFor(alert.id);
    if ((await readFileIfExists(file)) === null) {
      throw new AlertNotFoundError(alert.id);
    }
    const validated = parseAlert(alert, file);
    await writeJsonAtomic(file, validated);
    this.log.debug({ alertId: alert.id, status: alert.status }, "alert updated");
    return validated;
  }

  async create(alert: Alert): Promise<Alert> {
    const file = this.fileFor(alert.id);
    if ((await readFileIfExists(file)) !== null) {
      throw new AlertAlreadyExistsError(alert.id);
    }
    const validated = parseAlert(alert, file);
    await writeJsonAtomic(file, validated);
    this.log.info({ alertId: alert.id, customerId: alert.customerId }, "alert created");
    return validated;
  }

  async list(): Promise<Alert[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "ENOENT") return [];
      throw err;
    }
    const alerts: Alert[] = [];
    for (const entry of entries.filter((e) => e.endsWith(".json")).sort()) {
      const file = path.join(this.dir, entry);
      const raw = await readFileIfExists(file);
      if (raw !== null) alerts.push(parseAlert(JSON.parse(raw), file));
    }
    return alerts;
  }
}
