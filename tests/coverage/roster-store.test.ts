import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { YamlRosterStore } from "../../src/coverage/roster-store.js";
import { ConfigError } from "../../src/errors.js";
import type { ScheduleSlice } from "../../src/types.js";

const ROSTER_YAML = `
users:
  - id: alice
    display_name: Alice Moreau
    email: alice@example.com
    phone: "+15550101"
  - id: bob
    display_name: Bob Lindqvist

plans:
  - id: standard
    escalation:
      ack_timeout: 2m
      max_attempts_per_tier: 2
      retry_delay: 30s
  - id: relaxed

customers:
  - customer_id: cust-1
    plan_id: standard
    primary: [alice]
    backup: [bob]
`;

function daySlice(customerId: string, day: string, memberIds: string[]): ScheduleSlice {
  const start = new Date(`${day}T00:00:00.000Z`);
  return {
    id: `${customerId}:on-hours:${start.toISOString()}`,
    customerId,
    planId: "standard",
    role: "on-hours",
    memberIds,
    startUtc: start,
    endUtc: new Date(start.getTime() + 86_400_000),
    generatedAtUtc: new Date("2025-03-01T02:00:00.000Z"),
  };
}

let tmpDir: string;
let rosterPath: string;
let store: YamlRosterStore;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "roster-test-"));
  rosterPath = path.join(tmpDir, "roster.yaml");
  fs.writeFileSync(rosterPath, ROSTER_YAML);
  store = new YamlRosterStore({ rosterPath, slicesPath: path.join(tmpDir, "state", "slices.json") });
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("YamlRosterStore directory", () => {
  it("maps users to directory entries", async () => {
    expect(await store.getUser("alice")).toEqual({
      id: "alice",
      displayName: "Alice Moreau",
      email: "alice@example.com",
      phone: "+15550101",
    });
    expect(await store.getUser("bob")).toEqual({ id: "bob", displayName: "Bob Lindqvist", email: null, phone: null });
    expect(await store.getUser("zoe")).toBeNull();
  });

  it("parses plan durations and fills defaults", async () => {
    expect(await store.getPlan("standard")).toEqual({
      id: "standard",
      escalation: { ackTimeoutMs: 120_000, maxAttemptsPerTier: 2, retryDelayMs: 30_000 },
    });
    expect(await store.getPlan("relaxed")).toEqual({
      id: "relaxed",
      escalation: { ackTimeoutMs: 300_000, maxAttemptsPerTier: 3, retryDelayMs: 300_000 },
    });
  });

  it("lists customer bindings", async () => {
    expect(await store.listBindings()).toEqual([
      { customerId: "cust-1", planId: "standard", primaryMemberIds: ["alice"], backupMemberIds: ["bob"] },
    ]);
  });

  it("picks up edits without a restart", async () => {
    fs.writeFileSync(rosterPath, "users:\n  - { id: zoe, display_name: Zoe }\n");
    expect((await store.getUser("zoe"))?.displayName).toBe("Zoe");
  });

  it("reports an invalid roster as a configuration error", async () => {
    fs.writeFileSync(rosterPath, "users:\n  - id: alice\n");
    await expect(store.listBindings()).rejects.toThrow(ConfigError);
    await expect(store.listBindings()).rejects.toThrow(/users\.0\.display_name: Required/);
  });

  it("reports a missing roster file", async () => {
    fs.rmSync(rosterPath);
    await expect(store.getUser("alice")).rejects.toThrow(`Cannot read roster ${rosterPath}`);
  });
});

describe("YamlRosterStore slices", () => {
  it("has no slices before the first upsert", async () => {
    expect(await store.getLatest("cust-1")).toBeNull();
    expect(await store.slicesAround("cust-1", new Date("2025-03-01T12:00:00.000Z"))).toEqual([]);
  });

  it("upserts by id and finds covering slices", async () => {
    await store.upsertMany([daySlice("cust-1", "2025-03-01", ["alice"]), daySlice("cust-1", "2025-03-02", ["alice"])]);
    await store.upsertMany([daySlice("cust-1", "2025-03-02", ["bob"]), daySlice("cust-2", "2025-03-02", ["bob"])]);

    const around = await store.slicesAround("cust-1", new Date("2025-03-02T08:00:00.000Z"));
    expect(around).toHaveLength(1);
    expect(around[0]?.memberIds).toEqual(["bob"]);
    expect(around[0]?.startUtc).toEqual(new Date("2025-03-02T00:00:00.000Z"));

    const written: { slices: unknown[] } = JSON.parse(
      fs.readFileSync(path.join(tmpDir, "state", "slices.json"), "utf-8"),
    );
    expect(written.slices).toHaveLength(3);
  });

  it("returns the slice that ends last", async () => {
    await store.upsertMany([daySlice("cust-1", "2025-03-03", ["alice"]), daySlice("cust-1", "2025-03-01", ["alice"])]);

    expect((await store.getLatest("cust-1"))?.endUtc).toEqual(new Date("2025-03-04T00:00:00.000Z"));
    expect(await store.getLatest("cust-2")).toBeNull();
  });

  it("serialises concurrent upserts", async () => {
    await Promise.all([
      store.upsertMany([daySlice("cust-1", "2025-03-01", ["alice"])]),
      store.upsertMany([daySlice("cust-1", "2025-03-02", ["alice"])]),
      store.upsertMany([daySlice("cust-1", "2025-03-03", ["alice"])]),
    ]);

    expect((await store.getLatest("cust-1"))?.startUtc).toEqual(new Date("2025-03-03T00:00:00.000Z"));
    const all = await store.slicesAround("cust-1", new Date("2025-03-02T00:00:00.000Z"));
    expect(all).toHaveLength(1);
  });
});
