// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { logger } from "./logger.js";

const SAFE_KEY = /^[A-Za-z0-9._:-]+$/;

/** Reject keys that would escape their directory when used as a file name. */
export function assertSafeKey(key: string, kind: string): void {
  if (!SAFE_KEY.test(key) || key === "." || key === "..") {
    throw new Error(`Invalid ${kind} "${key}" — must match [A-Za-z0-9._:-]+`);
  }
}

/** Map a key to a portable file name (":" is not allowed on every file system). */
export function keyToFileName(key: string, extension: string): string {
  return `${key.replace(/:/g, "~")}${extension}`;
}

/**
 * Write a file via temp file + fsync + rename so readers never observe a
 * partially written document.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = filePath + ".tmp";
  const handle = await fs.open(tmpPath, "w");
  try {
    await handle.writeFile(data, "utf-8");
    await handle.sync();
  } finally {
    await handle.close();
  }
  await fs.rename(tmpPath, filePath);
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(value, null, 2));
}

/** Read a file, or null when it does not exist. */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

// --- Lock files ---

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    // EPERM means the process exists but belongs to someone else
    return isErrnoException(err) && err.code === "EPERM";
  }
}

/**
 * Try to take a pid lock file. Returns false when a live process holds it;
 * a lock left behind by a dead process is taken over.
 */
export async function tryAcquireLock(lockPath: string): Promise<boolean> {
  const log = logger.child({ module: "persistence" });
  await fs.mkdir(path.dirname(lockPath), { recursive: true });
  try {
    await fs.writeFile(lockPath, String(process.pid), { flag: "wx" });
    return true;
  } catch (err: unknown) {
    if (!isErrnoException(err) || err.code !== "EEXIST") throw err;
  }

  const raw = await readFileIfExists(lockPath);
  const holder = raw === null ? NaN : parseInt(raw, 10);
  if (!isNaN(holder) && isProcessAlive(holder)) {
    return false;
  }

  log.warn({ lockPath, stalePid: raw }, "taking over stale lock");
  await fs.writeFile(lockPath, String(process.pid));
  return true;
}

export async function releaseLock(lockPath: string): Promise<void> {
  try {
    await fs.unlink(lockPath);
  } catch (err: unknown) {
    if (!isErrnoException(err) || err.code !== "ENOENT") throw err;
  }
}
