// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import { randomUUID } from "node:crypto";
import type { Logger } from "../logger.js";
import { errorMessage } from "../errors.js";
import type { Clock } from "./clock.js";
import type { ActivityDefinition } from "./definitions.js";
import { ActivityFailedError, NonDeterminismError, UnknownActivityError } from "./errors.js";
import { hashInput, toJsonValue, type JournalEntry, type RunRecord, type StepKind } from "./journal.js";

/** What orchestration code may use to touch the outside world. */
export interface OrchestrationContext {
  readonly instanceId: string;
  /** True while re-executing steps that are already in the journal. */
  readonly isReplaying: boolean;
  /** Silent while replaying, so each line is logged once per run. */
  readonly log: Logger;
  callActivity<I, O>(activity: ActivityDefinition<I, O>, input: I): Promise<O>;
  /** Durable wait; survives restarts and resumes only for the remaining time. */
  delay(ms: number): Promise<void>;
  now(): Date;
  newId(): string;
}

/** Why a pass stopped before the orchestration returned. */
export type PassInterrupt =
  | { kind: "suspend"; wakeAt: Date }
  | { kind: "fatal"; error: Error };

export type ActivityInvoker = (name: string, input: unknown) => Promise<unknown>;

export interface ReplayContextOptions {
  record: RunRecord;
  clock: Clock;
  log: Logger;
  invoke: ActivityInvoker;
  hasActivity: (name: string) => boolean;
  /** Persist the record after a live step, before the orchestration continues. */
  persist: (record: RunRecord) => Promise<void>;
}

const TIMER_NAME = "delay";

/**
 * One replay pass over a run record. Each call consumes the next journal
 * slot; recorded slots are answered from the journal, the rest run live and
 * are appended.
 *
 * Suspension and fatal replay errors resolve {@link interrupt} and leave the
 * orchestration awaiting a promise that never settles, so its own try/catch
 * cannot intercept them.
 */
export class ReplayContext implements OrchestrationContext {
  readonly instanceId: string;
  readonly interrupt: Promise<PassInterrupt>;

  private cursor = 0;
  private halted: PassInterrupt | null = null;
  private resolveInterrupt: (value: PassInterrupt) => void = () => {};
  private readonly liveLog: Logger;
  private readonly replayLog: Logger;

  constructor(private readonly opts: ReplayContextOptions) {
    this.instanceId = opts.record.instanceId;
    this.liveLog = opts.log;
    this.replayLog = opts.log.child({}, { level: "silent" });
    this.interrupt = new Promise<PassInterrupt>((resolve) => {
      this.resolveInterrupt = resolve;
    });
  }

  get isReplaying(): boolean {
    return this.cursor < this.opts.record.journal.length;
  }

  get log(): Logger {
    return this.isReplaying ? this.replayLog : this.liveLog;
  }

  get interruption(): PassInterrupt | null {
    return this.halted;
  }

  async callActivity<I, O>(activity: ActivityDefinition<I, O>, input: I): Promise<O> {
    if (this.halted) return never();

    const inputHash = hashInput(input);
    const recorded = this.nextRecorded("activity", activity.name, inputHash);
    if (recorded === "halted") return never();

    if (recorded) {
      if (recorded.failure) {
        throw new ActivityFailedError(activity.name, recorded.failure.message, recorded.failure.name);
      }
      return activity.output.parse(recorded.result);
    }

    if (!this.opts.hasActivity(activity.name)) {
      throw new UnknownActivityError(activity.name);
    }

    const stepIndex = this.cursor;
    let entry: JournalEntry;
    let failure: ActivityFailedError | undefined;
    try {
      const raw = await this.opts.invoke(activity.name, activity.input.parse(input));
      const result = toJsonValue(activity.output.parse(toJsonValue(raw)));
      entry = this.entry(stepIndex, "activity", activity.name, inputHash, { result });
    } catch (err: unknown) {
      const name = err instanceof Error ? err.name : "Error";
      failure = new ActivityFailedError(activity.name, errorMessage(err), name);
      entry = this.entry(stepIndex, "activity", activity.name, inputHash, {
        failure: { name, message: failure.message },
      });
    }

    await this.append(entry);
    if (failure) throw failure;
    return activity.output.parse(entry.result);
  }

  async delay(ms: number): Promise<void> {
    if (this.halted) return never();

    const inputHash = hashInput(ms);
    const recorded = this.nextRecorded("timer", TIMER_NAME, inputHash);
    if (recorded === "halted") return never();

    if (recorded) {
      const isLast = recorded.stepIndex === this.opts.record.journal.length - 1;
      const firesAt = new Date(recorded.firesAt ?? recorded.recordedAt);
      if (!isLast || this.opts.clock.now().getTime() >= firesAt.getTime()) return;
      return this.suspend(firesAt);
    }

    const now = this.opts.clock.now();
    const firesAt = new Date(now.getTime() + Math.max(0, ms));
    const entry = this.entry(this.cursor, "timer", TIMER_NAME, inputHash, {});
    entry.firesAt = firesAt.toISOString();
    await this.append(entry);
    if (ms <= 0) return;
    this.liveLog.debug({ firesAt: entry.firesAt }, "timer created");
    return this.suspend(firesAt);
  }

  now(): Date {
    return new Date(this.deterministicValue("clock", "now", () => this.opts.clock.now().toISOString()));
  }

  newId(): string {
    return this.deterministicValue("guid", "newId", () => randomUUID());
  }

  // --- internals ---

  /**
   * Values that are recorded once and replayed. The entry is persisted with
   * the next live step or at the end of the pass.
   */
  private deterministicValue(kind: StepKind, name: string, produce: () => string): string {
    if (this.halted) throw this.haltError();

    const inputHash = hashInput(null);
    const recorded = this.nextRecorded(kind, name, inputHash);
    if (recorded === "halted") throw this.haltError();
    if (recorded) {
      if (typeof recorded.result !== "string") {
        const error = new NonDeterminismError(this.instanceId, recorded.stepIndex, `${kind} without a value`, name);
        this.halt({ kind: "fatal", error });
        throw error;
      }
      return recorded.result;
    }

    const value = produce();
    const entry = this.entry(this.cursor, kind, name, inputHash, { result: value });
    this.opts.record.journal.push(entry);
    this.cursor += 1;
    return value;
  }

  /**
   * The recorded entry for the next slot, null when past the end of the
   * journal, or "halted" after a mismatch.
   */
  private nextRecorded(kind: StepKind, name: string, inputHash: string): JournalEntry | null | "halted" {
    const journal = this.opts.record.journal;
    const index = this.cursor;
    const recorded = journal[index];
    if (!recorded) return null;

    if (recorded.kind !== kind || recorded.name !== name || recorded.inputHash !== inputHash) {
      const error = new NonDeterminismError(
        this.instanceId,
        index,
        `${recorded.kind} "${recorded.name}" (${recorded.inputHash})`,
        `${kind} "${name}" (${inputHash})`,
      );
      this.halt({ kind: "fatal", error });
      return "halted";
    }
    this.cursor += 1;
    return recorded;
  }

  private entry(
    stepIndex: number,
    kind: StepKind,
    name: string,
    inputHash: string,
    outcome: Pick<JournalEntry, "result" | "failure">,
  ): JournalEntry {
    return {
      stepIndex,
      kind,
      name,
      inputHash,
      ...outcome,
      recordedAt: this.opts.clock.now().toISOString(),
    };
  }

  private async append(entry: JournalEntry): Promise<void> {
    this.opts.record.journal.push(entry);
    this.cursor = this.opts.record.journal.length;
    await this.opts.persist(this.opts.record);
  }

  private suspend(wakeAt: Date): Promise<never> {
    this.halt({ kind: "suspend", wakeAt });
    return never();
  }

  private haltError(): Error {
    const halted = this.halted;
    return halted?.kind === "fatal" ? halted.error : new Error(`Run ${this.instanceId} is suspended`);
  }

  private halt(interrupt: PassInterrupt): void {
    if (this.halted) return;
    this.halted = interrupt;
    this.resolveInterrupt(interrupt);
  }
}

function never(): Promise<never> {
  return new Promise<never>(() => {});
}
