// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
// Roster store: users, plans and customer bindings from YAML, slices in JSON

import * as fs from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { parseDuration } from "../duration.js";
import { ConfigError, formatIssues } from "../errors.js";
import { logger } from "../logger.js";
import { readFileIfExists, writeJsonAtomic } from "../persistence.js";
import type { CustomerBinding, DirectoryUser, OnCallPlan, ScheduleSlice } from "../types.js";
import type { PlanSource, SliceSource, UserDirectory } from "./resolver.js";

// --- Zod Schemas ---

const DurationField = z.union([z.string(), z.number()]).transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (err: unknown) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: String(err) });
    return z.NEVER;
  }
});

const UserSchema = z.object({
  id: z.string().min(1),
  display_name: z.string().min(1),
  email: z.string().email().nullable().default(null),
  phone: z.string().min(1).nullable().default(null),
});

const PlanSchema = z.object({
  id: z.string().min(1),
  escalation: z
    .object({
      ack_timeout: DurationField.default("5m"),
      max_attempts_per_tier: z.number().int().min(0).default(3),
      retry_delay: DurationField.default("5m"),
    })
    .default({}),
});

const CustomerSchema = z.object({
  customer_id: z.string().min(1),
  plan_id: z.string().min(1),
  primary: z.array(z.string().min(1)).default([]),
  backup: z.array(z.string().min(1)).default([]),
});

const IsoDate = z
  .string()
  .refine((s) => !isNaN(new Date(s).getTime()), { message: "must be a valid ISO date string" })
  .transform((s) => new Date(s));

const SliceSchema = z.object({
  id: z.string().min(1),
  customerId: z.string().min(1),
  planId: z.string().min(1),
  role: z.enum(["on-hours", "off-hours", "backup"]),
  memberIds: z.array(z.string()),
  startUtc: IsoDate,
  endUtc: IsoDate,
  generatedAtUtc: IsoDate,
});

export const RosterFileSchema = z.object({
  users: z.array(UserSchema).default([]),
  plans: z.array(PlanSchema).default([]),
  customers: z.array(CustomerSchema).default([]),
});

export type RosterFile = z.infer<typeof RosterFileSchema>;

const SliceFileSchema = z.object({ slices: z.array(SliceSchema).default([]) });

// --- Interfaces consumed by the horizon extender ---

export interface SliceRepository {
  /** The slice that ends last for the customer, or null when none exist. */
  getLatest(customerId: string): Promise<ScheduleSlice | null>;
  /** Insert or replace slices by id. */
  upsertMany(slices: ScheduleSlice[]): Promise<void>;
}

export interface BindingSource {
  listBindings(): Promise<CustomerBinding[]>;
}

export interface RosterStorePaths {
  /** Hand-maintained YAML with users, plans and customers. */
  rosterPath: string;
  /** Generated slices, rewritten atomically on every upsert. */
  slicesPath: string;
}

/**
 * File-backed roster. The YAML file is re-read on each lookup so edits take
 * effect without a restart.
 */
export class YamlRosterStore implements SliceSource, UserDirectory, PlanSource, SliceRepository, BindingSource {
  private readonly log = logger.child({ component: "roster-store" });
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly paths: RosterStorePaths) {}

  async getUser(userId: string): Promise<DirectoryUser | null> {
    const roster = await this.loadRoster();
    const user = roster.users.find((u) => u.id === userId);
    if (!user) return null;
    return { id: user.id, displayName: user.display_name, email: user.email, phone: user.phone };
  }

  async getPlan(planId: string): Promise<OnCallPlan | null> {
    const roster = await this.loadRoster();
    const plan = roster.plans.find((p) => p.id === planId);
    if (!plan) return null;
    return {
      id: plan.id,
      escalation: {
        ackTimeoutMs: plan.escalation.ack_timeout,
        maxAttemptsPerTier: plan.escalation.max_attempts_per_tier,
        retryDelayMs: plan.escalation.retry_delay,
      },
    };
  }

  async listBindings(): Promise<CustomerBinding[]> {
    const roster = await this.loadRoster();
    return roster.customers.map((c) => ({
      customerId: c.customer_id,
      planId: c.plan_id,
      primaryMemberIds: [...c.primary],
      backupMemberIds: [...c.backup],
    }));
  }

  async slicesAround(customerId: string, at: Date): Promise<ScheduleSlice[]> {
    const t = at.getTime();
    return (await this.loadSlices()).filter(
      (s) => s.customerId === customerId && s.startUtc.getTime() <= t && t < s.endUtc.getTime(),
    );
  }

  async getLatest(customerId: string): Promise<ScheduleSlice | null> {
    let latest: ScheduleSlice | null = null;
    for (const slice of await this.loadSlices()) {
      if (slice.customerId !== customerId) continue;
      if (!latest || slice.endUtc.getTime() > latest.endUtc.getTime()) latest = slice;
    }
    return latest;
  }

  upsertMany(slices: ScheduleSlice[]): Promise<void> {
    const next = this.writeQueue.then(async () => {
      const byId = new Map((await this.loadSlices()).map((s): [string, ScheduleSlice] => [s.id, s]));
      for (const slice of slices) byId.set(slice.id, slice);
      const ordered = [...byId.values()].sort(
        (a, b) => a.startUtc.getTime() - b.startUtc.getTime() || a.id.localeCompare(b.id),
      );
      await writeJsonAtomic(this.paths.slicesPath, {
        slices: ordered.map((s) => ({
          ...s,
          startUtc: s.startUtc.toISOString(),
          endUtc: s.endUtc.toISOString(),
          generatedAtUtc: s.generatedAtUtc.toISOString(),
        })),
      });
      this.log.debug({ upserted: slices.length, total: ordered.length }, "slices written");
    });
    this.writeQueue = next.catch(() => undefined);
    return next;
  }

  async loadRoster(): Promise<RosterFile> {
    let text: string;
    try {
      text = await fs.readFile(this.paths.rosterPath, "utf-8");
    } catch (err: unknown) {
      throw new ConfigError(`Cannot read roster ${this.paths.rosterPath}: ${String(err)}`, { cause: err });
    }
    const parsed: unknown = parseYaml(text);
    const result = RosterFileSchema.safeParse(parsed ?? {});
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new ConfigError(`Invalid roster ${this.paths.rosterPath}: ${issues}`);
    }
    return result.data;
  }

  private async loadSlices(): Promise<ScheduleSlice[]> {
    const raw = await readFileIfExists(this.paths.slicesPath);
    if (raw === null) return [];
    const parsed: unknown = JSON.parse(raw);
    const result = SliceFileSchema.safeParse(parsed);
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new ConfigError(`Invalid slice file ${this.paths.slicesPath}: ${issues}`);
    }
    return result.data.slices;
  }
}
