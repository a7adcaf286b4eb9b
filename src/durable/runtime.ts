// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import pLimit from "p-limit";
import { errorMessage } from "../errors.js";
import type { EscalationEventBus } from "../events.js";
import { logger, type Logger } from "../logger.js";
import { systemClock, type Clock } from "./clock.js";
import { ReplayContext, type PassInterrupt } from "./context.js";
import type { ActivityDefinition, ActivityImplementation, OrchestrationDefinition } from "./definitions.js";
import {
  InstanceAlreadyRunningError,
  UnknownActivityError,
  UnknownInstanceError,
  UnknownOrchestrationError,
} from "./errors.js";
import {
  ACTIVE_RUN_STATUSES,
  RUN_FORMAT_VERSION,
  toJsonValue,
  type JournalStore,
  type RunRecord,
} from "./journal.js";

/** setTimeout cannot wait longer than this; longer waits are re-armed. */
const MAX_TIMER_MS = 2_147_483_647;
const DEFAULT_BUSY_RETRY_MS = 5_000;

export interface DurableRuntimeOptions {
  store: JournalStore;
  clock?: Clock;
  /** Upper bound on replay passes executing at once. */
  maxConcurrentRuns?: number;
  /** Dispatch a pass as soon as a run is started. Off when the caller drives passes with runOnce. */
  autoStart?: boolean;
  events?: EscalationEventBus;
  logger?: Logger;
  /**
   * Called after a run is recorded as failed, outside any replay. Covers
   * failures the orchestration cannot observe, such as non-deterministic replay.
   */
  onRunFailed?: (record: RunRecord, error: string) => Promise<void>;
  /** Delay before retrying a wake that found the instance locked by another process. */
  busyRetryMs?: number;
}

/** Result of one replay pass. */
export type PassResult =
  | { status: "completed"; output: unknown }
  | { status: "suspended"; wakeAt: Date }
  | { status: "failed"; error: string }
  /** Another pass holds the instance; nothing was done. */
  | { status: "busy" };

type ErasedActivity = (input: unknown) => Promise<unknown>;
type ErasedOrchestration = (ctx: ReplayContext, input: unknown) => Promise<unknown>;

/**
 * Runs orchestrations as replayed passes over their journals.
 *
 * A pass re-executes the orchestration from the top against its journal,
 * ends when the code returns, throws, or waits on a timer that has not fired,
 * and releases its pool slot. Suspended runs are woken by a timer at their
 * `wakeAt` or, after a restart, by {@link resumePending}.
 */
export class DurableRuntime {
  private readonly store: JournalStore;
  private readonly clock: Clock;
  private readonly autoStart: boolean;
  private readonly events?: EscalationEventBus;
  private readonly log: Logger;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly onRunFailed?: (record: RunRecord, error: string) => Promise<void>;
  private readonly busyRetryMs: number;

  private readonly activities = new Map<string, ErasedActivity>();
  private readonly orchestrations = new Map<string, ErasedOrchestration>();
  /** Instances with a pass queued or executing in this process. */
  private readonly leases = new Set<string>();
  private readonly wakeTimers = new Map<string, NodeJS.Timeout>();
  private readonly waiters = new Map<string, Array<(record: RunRecord) => void>>();
  private readonly inflight = new Set<Promise<void>>();
  private stopped = false;

  constructor(options: DurableRuntimeOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.autoStart = options.autoStart ?? true;
    this.events = options.events;
    this.log = (options.logger ?? logger).child({ component: "durable-runtime" });
    this.limit = pLimit(options.maxConcurrentRuns ?? 8);
    this.onRunFailed = options.onRunFailed;
    this.busyRetryMs = options.busyRetryMs ?? DEFAULT_BUSY_RETRY_MS;
  }

  registerActivity<I, O>(def: ActivityDefinition<I, O>, impl: ActivityImplementation<I, O>): this {
    this.activities.set(def.name, (raw) => impl(def.input.parse(raw)));
    return this;
  }

  registerOrchestration<I, O>(def: OrchestrationDefinition<I, O>): this {
    this.orchestrations.set(def.name, (ctx, raw) => def.run(ctx, def.input.parse(raw)));
    return this;
  }

  /**
   * Create a run for `instanceId`. Rejects while a run for the id is still
   * active; a finished run is archived and replaced.
   */
  async startNew<I, O>(def: OrchestrationDefinition<I, O>, instanceId: string, input: I): Promise<RunRecord> {
    if (!this.orchestrations.has(def.name)) {
      throw new UnknownOrchestrationError(def.name);
    }
    if (this.leases.has(instanceId)) {
      throw new InstanceAlreadyRunningError(instanceId);
    }

    const validated = def.input.parse(input);
    if (!(await this.store.tryLock(instanceId))) {
      throw new InstanceAlreadyRunningError(instanceId);
    }
    let record: RunRecord;
    try {
      const existing = await this.store.load(instanceId);
      if (existing && ACTIVE_RUN_STATUSES.has(existing.status)) {
        throw new InstanceAlreadyRunningError(instanceId);
      }
      if (existing) {
        await this.store.archive(instanceId);
      }
      const now = this.clock.now().toISOString();
      record = {
        version: RUN_FORMAT_VERSION,
        instanceId,
        orchestration: def.name,
        input: toJsonValue(validated),
        status: "pending",
        createdAt: now,
        updatedAt: now,
        journal: [],
      };
      await this.store.save(record);
    } finally {
      await this.store.unlock(instanceId);
    }

    this.log.info({ instanceId, orchestration: def.name }, "run created");
    if (this.autoStart) this.dispatch(instanceId);
    return record;
  }

  /** Execute one replay pass for the instance. */
  async runOnce(instanceId: string): Promise<PassResult> {
    if (this.leases.has(instanceId)) return { status: "busy" };
    this.leases.add(instanceId);
    try {
      return await this.limit(async () => {
        if (!(await this.store.tryLock(instanceId))) return { status: "busy" } as const;
        try {
          return await this.executePass(instanceId);
        } finally {
          await this.store.unlock(instanceId);
        }
      });
    } finally {
      this.leases.delete(instanceId);
    }
  }

  /**
   * Crash recovery: pending and interrupted runs are dispatched again,
   * suspended runs are scheduled at their wake time.
   */
  async resumePending(): Promise<{ dispatched: string[]; scheduled: string[] }> {
    const dispatched: string[] = [];
    const scheduled: string[] = [];
    for (const record of await this.store.list()) {
      if (record.status === "pending" || record.status === "running") {
        dispatched.push(record.instanceId);
        this.dispatch(record.instanceId);
      } else if (record.status === "suspended") {
        scheduled.push(record.instanceId);
        this.scheduleWake(record.instanceId, new Date(record.wakeAt ?? record.updatedAt));
      }
    }
    this.log.info({ dispatched: dispatched.length, scheduled: scheduled.length }, "pending runs resumed");
    return { dispatched, scheduled };
  }

  getStatus(instanceId: string): Promise<RunRecord | null> {
    return this.store.load(instanceId);
  }

  /** Resolves once the run completes or fails in this process (or already has). */
  async waitForCompletion(instanceId: string): Promise<RunRecord> {
    const done = new Promise<RunRecord>((resolve) => {
      const list = this.waiters.get(instanceId) ?? [];
      list.push(resolve);
      this.waiters.set(instanceId, list);
    });
    const record = await this.store.load(instanceId);
    if (!record) {
      this.waiters.delete(instanceId);
      throw new UnknownInstanceError(instanceId);
    }
    if (record.status === "completed" || record.status === "failed") this.settle(record);
    return done;
  }

  /** Cancel scheduled wakes and let in-flight passes finish. */
  async stop(): Promise<void> {
    this.stopped = true;
    for (const timer of this.wakeTimers.values()) clearTimeout(timer);
    this.wakeTimers.clear();
    await Promise.allSettled([...this.inflight]);
  }

  /** Number of runs waiting on a scheduled wake in this process. */
  get scheduledWakes(): number {
    return this.wakeTimers.size;
  }

  // --- internals ---

  private dispatch(instanceId: string): void {
    if (this.stopped) return;
    const task = this.runOnce(instanceId)
      .then(async (result) => {
        if (result.status === "suspended") this.scheduleWake(instanceId, result.wakeAt);
        if (result.status === "busy") await this.retryWhenFree(instanceId);
      })
      .catch((err: unknown) => {
        this.log.error({ instanceId, err: errorMessage(err) }, "pass crashed");
      });
    this.inflight.add(task);
    void task.finally(() => this.inflight.delete(task));
  }

  /**
   * Another pass (possibly in another process) holds the instance. Keep
   * tracking the run while it is still active so its wake is not lost.
   */
  private async retryWhenFree(instanceId: string): Promise<void> {
    const record = await this.store.load(instanceId);
    if (!record || !ACTIVE_RUN_STATUSES.has(record.status)) return;
    const retryAt = new Date(this.clock.now().getTime() + this.busyRetryMs);
    const wakeAt = record.status === "suspended" && record.wakeAt ? new Date(record.wakeAt) : retryAt;
    this.log.debug({ instanceId, status: record.status }, "instance busy, wake rescheduled");
    this.scheduleWake(instanceId, wakeAt > retryAt ? wakeAt : retryAt);
  }

  private scheduleWake(instanceId: string, wakeAt: Date): void {
    if (this.stopped) return;
    const existing = this.wakeTimers.get(instanceId);
    if (existing) clearTimeout(existing);

    const remaining = Math.max(0, wakeAt.getTime() - this.clock.now().getTime());
    const timer = setTimeout(() => {
      this.wakeTimers.delete(instanceId);
      if (this.clock.now().getTime() < wakeAt.getTime()) {
        this.scheduleWake(instanceId, wakeAt);
      } else {
        this.dispatch(instanceId);
      }
    }, Math.min(remaining, MAX_TIMER_MS));
    this.wakeTimers.set(instanceId, timer);
    this.log.debug({ instanceId, wakeAt: wakeAt.toISOString(), remainingMs: remaining }, "wake scheduled");
  }

  private async executePass(instanceId: string): Promise<PassResult> {
    const record = await this.store.load(instanceId);
    if (!record) throw new UnknownInstanceError(instanceId);
    if (record.status === "completed") return { status: "completed", output: record.output };
    if (record.status === "failed") return { status: "failed", error: record.error ?? "failed" };

    const run = this.orchestrations.get(record.orchestration);
    if (!run) throw new UnknownOrchestrationError(record.orchestration);

    const log = this.log.child({ instanceId, orchestration: record.orchestration });
    record.status = "running";
    record.wakeAt = undefined;
    await this.touch(record);
    this.events?.emitTyped("run:started", { instanceId, orchestration: record.orchestration });
    log.debug({ journaled: record.journal.length }, "pass started");

    const ctx = new ReplayContext({
      record,
      clock: this.clock,
      log,
      invoke: (name, input) => this.invokeActivity(name, input),
      hasActivity: (name) => this.activities.has(name),
      persist: (r) => this.touch(r),
    });

    const outcome = await this.race(ctx, Promise.resolve().then(() => run(ctx, record.input)));

    switch (outcome.kind) {
      case "returned":
        record.status = "completed";
        record.output = toJsonValue(outcome.output);
        await this.touch(record);
        log.info("run completed");
        this.events?.emitTyped("run:completed", { instanceId, output: record.output });
        this.settle(record);
        return { status: "completed", output: record.output };

      case "suspend":
        record.status = "suspended";
        record.wakeAt = outcome.wakeAt.toISOString();
        await this.touch(record);
        log.debug({ wakeAt: record.wakeAt }, "run suspended");
        this.events?.emitTyped("run:suspended", { instanceId, wakeAt: outcome.wakeAt });
        return { status: "suspended", wakeAt: outcome.wakeAt };

      case "fatal":
      case "threw": {
        const error = errorMessage(outcome.error);
        record.status = "failed";
        record.error = error;
        await this.touch(record);
        log.error({ err: error }, "run failed");
        this.events?.emitTyped("run:failed", { instanceId, error });
        await this.reportFailure(record, error);
        this.settle(record);
        return { status: "failed", error };
      }
    }
  }

  /**
   * Wait for whichever comes first: the orchestration settling or the
   * context interrupting the pass. An interrupt always wins.
   */
  private async race(
    ctx: ReplayContext,
    execution: Promise<unknown>,
  ): Promise<PassInterrupt | { kind: "returned"; output: unknown } | { kind: "threw"; error: unknown }> {
    const settled = await Promise.race([
      ctx.interrupt,
      execution.then(
        (output) => ({ kind: "returned" as const, output }),
        (error: unknown) => ({ kind: "threw" as const, error }),
      ),
    ]);
    return ctx.interruption ?? settled;
  }

  private async invokeActivity(name: string, input: unknown): Promise<unknown> {
    const impl = this.activities.get(name);
    if (!impl) throw new UnknownActivityError(name);
    return impl(input);
  }

  private async reportFailure(record: RunRecord, error: string): Promise<void> {
    if (!this.onRunFailed) return;
    try {
      await this.onRunFailed(record, error);
    } catch (err: unknown) {
      this.log.error({ instanceId: record.instanceId, err: errorMessage(err) }, "failure handler failed");
    }
  }

  private async touch(record: RunRecord): Promise<void> {
    record.updatedAt = this.clock.now().toISOString();
    await this.store.save(record);
  }

  private settle(record: RunRecord): void {
    const list = this.waiters.get(record.instanceId);
    if (!list) return;
    this.waiters.delete(record.instanceId);
    for (const resolve of list) resolve(record);
  }
}
