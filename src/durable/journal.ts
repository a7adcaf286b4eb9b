// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
// Run records: the event-sourced journal behind every orchestration instance

import { createHash } from "node:crypto";
import { z } from "zod";

/** Bumped whenever the persisted layout changes incompatibly. */
export const RUN_FORMAT_VERSION = 1;

export const STEP_KINDS = ["activity", "timer", "clock", "guid"] as const;
export type StepKind = (typeof STEP_KINDS)[number];

export const RUN_STATUSES = ["pending", "running", "suspended", "completed", "failed"] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

/** Statuses that still need passes; a new run for the same id is rejected. */
export const ACTIVE_RUN_STATUSES: ReadonlySet<RunStatus> = new Set(["pending", "running", "suspended"]);

export const StepFailureSchema = z.object({
  name: z.string(),
  message: z.string(),
});

export const JournalEntrySchema = z.object({
  stepIndex: z.number().int().min(0),
  kind: z.enum(STEP_KINDS),
  name: z.string().min(1),
  inputHash: z.string(),
  result: z.unknown().optional(),
  failure: StepFailureSchema.optional(),
  recordedAt: z.string(),
  /** Timers only: the absolute deadline fixed when the timer was first created. */
  firesAt: z.string().optional(),
});

export type JournalEntry = z.infer<typeof JournalEntrySchema>;

export const RunRecordSchema = z.object({
  version: z.number().int(),
  instanceId: z.string().min(1),
  orchestration: z.string().min(1),
  input: z.unknown(),
  status: z.enum(RUN_STATUSES),
  createdAt: z.string(),
  updatedAt: z.string(),
  wakeAt: z.string().optional(),
  output: z.unknown().optional(),
  error: z.string().optional(),
  journal: z.array(JournalEntrySchema),
});

export type RunRecord = z.infer<typeof RunRecordSchema>;

/** Durable home of run records, plus a per-instance lock for single execution. */
export interface JournalStore {
  load(instanceId: string): Promise<RunRecord | null>;
  save(record: RunRecord): Promise<void>;
  /** Move a finished record aside so the id can be reused by a fresh run. */
  archive(instanceId: string): Promise<void>;
  list(): Promise<RunRecord[]>;
  /** False when another holder (this or another process) owns the instance. */
  tryLock(instanceId: string): Promise<boolean>;
  unlock(instanceId: string): Promise<void>;
}

/** Short stable fingerprint of a step's input. */
export function hashInput(input: unknown): string {
  const json = JSON.stringify(input) ?? "null";
  return createHash("sha256").update(json).digest("hex").slice(0, 16);
}

/** Normalise a value to what survives a JSON round trip; `undefined` becomes `null`. */
export function toJsonValue(value: unknown): unknown {
  const json = JSON.stringify(value);
  return json === undefined ? null : JSON.parse(json);
}
