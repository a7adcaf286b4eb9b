import { describe, it, expect } from "vitest";
import {
  RosterCoverageResolver,
  SYSTEM_DEFAULT_POLICY,
  covers,
  type PlanSource,
  type SliceSource,
  type UserDirectory,
} from "../../src/coverage/resolver.js";
import { CoverageResolutionError } from "../../src/errors.js";
import type { DirectoryUser, OnCallPlan, ScheduleSlice, SliceRole } from "../../src/types.js";

const AT = new Date("2025-03-01T12:00:00.000Z");

function slice(role: SliceRole, memberIds: string[], start: string, end: string, planId = "standard"): ScheduleSlice {
  return {
    id: `cust-1:${role}:${start}`,
    customerId: "cust-1",
    planId,
    role,
    memberIds,
    startUtc: new Date(start),
    endUtc: new Date(end),
    generatedAtUtc: new Date("2025-02-28T02:00:00.000Z"),
  };
}

function sources(slices: ScheduleSlice[], plans: OnCallPlan[] = []) {
  const users: DirectoryUser[] = ["alice", "bob", "carol", "dave"].map((id) => ({
    id,
    displayName: id.charAt(0).toUpperCase() + id.slice(1),
    email: `${id}@example.com`,
    phone: null,
  }));
  const sliceSource: SliceSource = { slicesAround: async () => slices };
  const directory: UserDirectory = { getUser: async (id) => users.find((u) => u.id === id) ?? null };
  const planSource: PlanSource = { getPlan: async (id) => plans.find((p) => p.id === id) ?? null };
  return { sliceSource, directory, planSource };
}

const STANDARD: OnCallPlan = {
  id: "standard",
  escalation: { ackTimeoutMs: 120_000, maxAttemptsPerTier: 2, retryDelayMs: 60_000 },
};

describe("covers", () => {
  it("includes the start and excludes the end", () => {
    const s = slice("on-hours", [], "2025-03-01T00:00:00.000Z", "2025-03-02T00:00:00.000Z");
    expect(covers(s, new Date("2025-03-01T00:00:00.000Z"))).toBe(true);
    expect(covers(s, new Date("2025-03-01T23:59:59.999Z"))).toBe(true);
    expect(covers(s, new Date("2025-03-02T00:00:00.000Z"))).toBe(false);
  });
});

describe("RosterCoverageResolver", () => {
  it("resolves both tiers and the plan's policy", async () => {
    const { sliceSource, directory, planSource } = sources(
      [
        slice("on-hours", ["alice", "bob"], "2025-03-01T00:00:00.000Z", "2025-03-02T00:00:00.000Z"),
        slice("backup", ["carol"], "2025-03-01T00:00:00.000Z", "2025-03-02T00:00:00.000Z"),
      ],
      [STANDARD],
    );
    const result = await new RosterCoverageResolver(sliceSource, directory, planSource).resolve("cust-1", AT);

    expect(result.primaryTier.map((m) => m.userId)).toEqual(["alice", "bob"]);
    expect(result.primaryTier[0]).toEqual({
      userId: "alice",
      displayName: "Alice",
      email: "alice@example.com",
      phone: null,
    });
    expect(result.backupTier.map((m) => m.userId)).toEqual(["carol"]);
    expect(result.policy).toEqual(STANDARD.escalation);
    expect(result.planId).toBe("standard");
  });

  it("prefers an on-hours slice over an off-hours slice", async () => {
    const { sliceSource, directory, planSource } = sources([
      slice("off-hours", ["dave"], "2025-03-01T00:00:00.000Z", "2025-03-02T00:00:00.000Z"),
      slice("on-hours", ["alice"], "2025-03-01T09:00:00.000Z", "2025-03-01T17:00:00.000Z"),
    ]);
    const result = await new RosterCoverageResolver(sliceSource, directory, planSource).resolve("cust-1", AT);

    expect(result.primaryTier.map((m) => m.userId)).toEqual(["alice"]);
  });

  it("falls back to an off-hours slice", async () => {
    const { sliceSource, directory, planSource } = sources([
      slice("off-hours", ["dave"], "2025-03-01T00:00:00.000Z", "2025-03-02T00:00:00.000Z"),
    ]);
    const result = await new RosterCoverageResolver(sliceSource, directory, planSource).resolve("cust-1", AT);

    expect(result.primaryTier.map((m) => m.userId)).toEqual(["dave"]);
  });

  it("uses the latest-starting slice when several cover the instant", async () => {
    const { sliceSource, directory, planSource } = sources([
      slice("on-hours", ["alice"], "2025-03-01T00:00:00.000Z", "2025-03-02T00:00:00.000Z"),
      slice("on-hours", ["bob"], "2025-03-01T11:00:00.000Z", "2025-03-01T13:00:00.000Z"),
    ]);
    const result = await new RosterCoverageResolver(sliceSource, directory, planSource).resolve("cust-1", AT);

    expect(result.primaryTier.map((m) => m.userId)).toEqual(["bob"]);
  });

  it("ignores slices that do not cover the instant", async () => {
    const { sliceSource, directory, planSource } = sources([
      slice("on-hours", ["alice"], "2025-03-01T00:00:00.000Z", "2025-03-01T12:00:00.000Z"),
    ]);
    const result = await new RosterCoverageResolver(sliceSource, directory, planSource).resolve("cust-1", AT);

    expect(result).toEqual({ primaryTier: [], backupTier: [], policy: SYSTEM_DEFAULT_POLICY, planId: null });
  });

  it("drops members missing from the directory", async () => {
    const { sliceSource, directory, planSource } = sources([
      slice("on-hours", ["ghost", "bob"], "2025-03-01T00:00:00.000Z", "2025-03-02T00:00:00.000Z"),
    ]);
    const result = await new RosterCoverageResolver(sliceSource, directory, planSource).resolve("cust-1", AT);

    expect(result.primaryTier.map((m) => m.userId)).toEqual(["bob"]);
  });

  it("uses the configured default policy when the plan is unknown", async () => {
    const fallback = { ackTimeoutMs: 60_000, maxAttemptsPerTier: 1, retryDelayMs: 0 };
    const { sliceSource, directory, planSource } = sources([
      slice("on-hours", ["alice"], "2025-03-01T00:00:00.000Z", "2025-03-02T00:00:00.000Z", "retired"),
    ]);
    const result = await new RosterCoverageResolver(sliceSource, directory, planSource, fallback).resolve(
      "cust-1",
      AT,
    );

    expect(result.policy).toEqual(fallback);
    expect(result.planId).toBeNull();
  });

  it("wraps lookup failures with the customer id", async () => {
    const failing: SliceSource = {
      slicesAround: async () => {
        throw new Error("slice file unreadable");
      },
    };
    const { directory, planSource } = sources([]);
    const resolver = new RosterCoverageResolver(failing, directory, planSource);

    await expect(resolver.resolve("cust-1", AT)).rejects.toThrow(CoverageResolutionError);
    await expect(resolver.resolve("cust-1", AT)).rejects.toThrow(
      "Coverage lookup failed for customer cust-1: slice file unreadable",
    );
  });
});
