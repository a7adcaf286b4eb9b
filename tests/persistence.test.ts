import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  assertSafeKey,
  keyToFileName,
  readFileIfExists,
  releaseLock,
  tryAcquireLock,
  writeJsonAtomic,
} from "../src/persistence.js";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "persistence-test-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("assertSafeKey", () => {
  it("accepts ids made of safe characters", () => {
    expect(() => assertSafeKey("cust-1:alert_2.v3", "alert id")).not.toThrow();
  });

  it("rejects path traversal and separators", () => {
    expect(() => assertSafeKey("..", "alert id")).toThrow('Invalid alert id ".."');
    expect(() => assertSafeKey("a/b", "alert id")).toThrow('Invalid alert id "a/b"');
    expect(() => assertSafeKey("", "instance id")).toThrow('Invalid instance id ""');
  });
});

describe("keyToFileName", () => {
  it("replaces colons", () => {
    expect(keyToFileName("cust-1:on-hours", ".json")).toBe("cust-1~on-hours.json");
  });
});

describe("writeJsonAtomic", () => {
  it("creates parent directories and leaves no temp file behind", async () => {
    const file = path.join(tmpDir, "nested", "dir", "doc.json");
    await writeJsonAtomic(file, { a: 1 });

    expect(JSON.parse(fs.readFileSync(file, "utf-8"))).toEqual({ a: 1 });
    expect(fs.existsSync(file + ".tmp")).toBe(false);
  });

  it("overwrites an existing document", async () => {
    const file = path.join(tmpDir, "doc.json");
    await writeJsonAtomic(file, { version: 1 });
    await writeJsonAtomic(file, { version: 2 });

    expect(JSON.parse(fs.readFileSync(file, "utf-8"))).toEqual({ version: 2 });
  });
});

describe("readFileIfExists", () => {
  it("returns null for a missing file", async () => {
    expect(await readFileIfExists(path.join(tmpDir, "missing.json"))).toBeNull();
  });
});

describe("lock files", () => {
  it("refuses a lock held by a live process", async () => {
    const lock = path.join(tmpDir, "run.lock");
    expect(await tryAcquireLock(lock)).toBe(true);
    expect(await tryAcquireLock(lock)).toBe(false);
    expect(fs.readFileSync(lock, "utf-8")).toBe(String(process.pid));
  });

  it("can be re-acquired after release", async () => {
    const lock = path.join(tmpDir, "run.lock");
    await tryAcquireLock(lock);
    await releaseLock(lock);
    expect(await tryAcquireLock(lock)).toBe(true);
  });

  it("takes over a lock left by a dead process", async () => {
    const lock = path.join(tmpDir, "run.lock");
    fs.writeFileSync(lock, "99999999");

    expect(await tryAcquireLock(lock)).toBe(true);
    expect(fs.readFileSync(lock, "utf-8")).toBe(String(process.pid));
  });

  it("releasing a missing lock is a no-op", async () => {
    await expect(releaseLock(path.join(tmpDir, "none.lock"))).resolves.toBeUndefined();
  });
});
