// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import { DAY_MS, addMs, startOfUtcDay } from "../duration.js";
import { EscalationError, errorMessage } from "../errors.js";
import type { EscalationEventBus } from "../events.js";
import { logger } from "../logger.js";
import { systemClock, type Clock } from "../durable/clock.js";
import type { CustomerBinding, ScheduleSlice, SliceRole } from "../types.js";
import type { BindingSource, SliceRepository } from "./roster-store.js";

export const DEFAULT_HORIZON_DAYS = 45;
/** Hour of day (UTC) at which the daily extension runs. */
export const DAILY_RUN_HOUR_UTC = 2;

/** Materializes roster slices for a customer over a time range. */
export interface SliceGenerator {
  generate(binding: CustomerBinding, fromUtc: Date, toUtc: Date, generatedAtUtc: Date): ScheduleSlice[];
}

/** Deterministic id, so regenerating a range replaces rather than duplicates. */
export function sliceId(customerId: string, role: SliceRole, startUtc: Date): string {
  return `${customerId}:${role}:${startUtc.toISOString()}`;
}

/**
 * Whole-team coverage: for every UTC day in range, one on-hours slice with
 * the primary team and one backup slice with the backup team. Days are
 * clipped to the requested range.
 */
export class WholeTeamDailyGenerator implements SliceGenerator {
  generate(binding: CustomerBinding, fromUtc: Date, toUtc: Date, generatedAtUtc: Date): ScheduleSlice[] {
    const slices: ScheduleSlice[] = [];
    for (let day = startOfUtcDay(fromUtc); day < toUtc; day = addMs(day, DAY_MS)) {
      const start = day < fromUtc ? fromUtc : day;
      const dayEnd = addMs(day, DAY_MS);
      const end = dayEnd > toUtc ? toUtc : dayEnd;
      if (start >= end) continue;

      const teams: Array<[SliceRole, string[]]> = [
        ["on-hours", binding.primaryMemberIds],
        ["backup", binding.backupMemberIds],
      ];
      for (const [role, memberIds] of teams) {
        if (memberIds.length === 0) continue;
        slices.push({
          id: sliceId(binding.customerId, role, start),
          customerId: binding.customerId,
          planId: binding.planId,
          role,
          memberIds: [...memberIds],
          startUtc: start,
          endUtc: end,
          generatedAtUtc,
        });
      }
    }
    return slices;
  }
}

export interface HorizonRunSummary {
  extended: number;
  skipped: number;
  errors: number;
}

export interface HorizonExtenderOptions {
  bindings: BindingSource;
  slices: SliceRepository;
  generator: SliceGenerator;
  horizonDays?: number;
  clock?: Clock;
  events?: EscalationEventBus;
}

/** Keeps every customer's roster materialized a fixed number of days ahead. */
export class HorizonExtender {
  private readonly log = logger.child({ component: "horizon" });
  private readonly horizonDays: number;
  private readonly clock: Clock;

  constructor(private readonly opts: HorizonExtenderOptions) {
    this.horizonDays = opts.horizonDays ?? DEFAULT_HORIZON_DAYS;
    this.clock = opts.clock ?? systemClock;
  }

  /**
   * Generate and upsert slices for `[from, to)`. Re-running an already
   * covered range rewrites the same slice ids. Returns the number of slices written.
   */
  async extendHorizon(customerId: string, from: Date, to: Date): Promise<number> {
    if (to <= from) return 0;
    const binding = (await this.opts.bindings.listBindings()).find((b) => b.customerId === customerId);
    if (!binding) {
      throw new EscalationError(`Customer ${customerId} has no on-call plan binding`);
    }
    return this.extendBinding(binding, from, to);
  }

  /**
   * One daily pass over all bound customers: generate from today when no
   * slice exists, extend from the day the latest slice ends when it falls
   * short of the horizon, otherwise skip. A failing customer is counted and
   * the pass moves on.
   */
  async runDailyExtension(now: Date = this.clock.now()): Promise<HorizonRunSummary> {
    const today = startOfUtcDay(now);
    const horizon = addMs(today, this.horizonDays * DAY_MS);
    const summary: HorizonRunSummary = { extended: 0, skipped: 0, errors: 0 };

    this.log.info({ horizon: horizon.toISOString() }, "starting daily schedule extension");
    for (const binding of await this.opts.bindings.listBindings()) {
      try {
        const latest = await this.opts.slices.getLatest(binding.customerId);
        if (!latest) {
          await this.extendBinding(binding, today, horizon);
          summary.extended++;
        } else if (latest.endUtc < horizon) {
          await this.extendBinding(binding, startOfUtcDay(latest.endUtc), horizon);
          summary.extended++;
        } else {
          summary.skipped++;
          this.log.debug({ customerId: binding.customerId, end: latest.endUtc.toISOString() }, "horizon already covered");
        }
      } catch (err: unknown) {
        summary.errors++;
        this.log.error({ customerId: binding.customerId, err: errorMessage(err) }, "schedule extension failed");
      }
    }
    this.log.info(summary, "schedule extension completed");
    return summary;
  }

  private async extendBinding(binding: CustomerBinding, from: Date, to: Date): Promise<number> {
    const slices = this.opts.generator.generate(binding, from, to, this.clock.now());
    await this.opts.slices.upsertMany(slices);
    this.log.info(
      { customerId: binding.customerId, from: from.toISOString(), to: to.toISOString(), slices: slices.length },
      "schedule extended",
    );
    this.opts.events?.emitTyped("horizon:extended", {
      customerId: binding.customerId,
      from,
      to,
      slices: slices.length,
    });
    return slices.length;
  }
}

/** Milliseconds from `now` until the next `hourUtc`:00 UTC (strictly in the future). */
export function msUntilNextRun(now: Date, hourUtc: number = DAILY_RUN_HOUR_UTC): number {
  let next = addMs(startOfUtcDay(now), hourUtc * 3_600_000);
  if (next <= now) next = addMs(next, DAY_MS);
  return next.getTime() - now.getTime();
}

export interface DailyJobHandle {
  stop(): void;
}

/** Run the extension every day at 02:00 UTC until stopped. */
export function startDailyExtensionJob(
  extender: HorizonExtender,
  options: { hourUtc?: number; clock?: Clock } = {},
): DailyJobHandle {
  const clock = options.clock ?? systemClock;
  const log = logger.child({ component: "horizon-job" });
  let timer: NodeJS.Timeout | undefined;
  let stopped = false;

  const arm = (): void => {
    if (stopped) return;
    const delay = msUntilNextRun(clock.now(), options.hourUtc);
    log.debug({ delayMs: delay }, "next schedule extension armed");
    timer = setTimeout(() => {
      extender.runDailyExtension(clock.now()).then(
        () => arm(),
        (err: unknown) => {
          log.error({ err: errorMessage(err) }, "daily schedule extension failed");
          arm();
        },
      );
    }, delay);
  };

  arm();
  return {
    stop() {
      stopped = true;
      if (timer) clearTimeout(timer);
    },
  };
}
