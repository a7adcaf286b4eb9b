// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import { MINUTE_MS } from "../duration.js";
import { CoverageResolutionError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type {
  DirectoryUser,
  EscalationPolicy,
  OnCallCoverage,
  OnCallMember,
  OnCallPlan,
  ScheduleSlice,
  SliceRole,
} from "../types.js";

export const SYSTEM_DEFAULT_POLICY: EscalationPolicy = {
  ackTimeoutMs: 5 * MINUTE_MS,
  maxAttemptsPerTier: 3,
  retryDelayMs: 5 * MINUTE_MS,
};

/** Who is on call for a customer at an instant, and under which policy. */
export interface CoverageResolver {
  resolve(customerId: string, asOf: Date): Promise<OnCallCoverage>;
}

export interface SliceSource {
  /** Slices of the customer that might cover `at`; callers filter with {@link covers}. */
  slicesAround(customerId: string, at: Date): Promise<ScheduleSlice[]>;
}

export interface UserDirectory {
  getUser(userId: string): Promise<DirectoryUser | null>;
}

export interface PlanSource {
  getPlan(planId: string): Promise<OnCallPlan | null>;
}

/** Half-open window: the start instant is covered, the end instant is not. */
export function covers(slice: ScheduleSlice, at: Date): boolean {
  const t = at.getTime();
  return slice.startUtc.getTime() <= t && t < slice.endUtc.getTime();
}

const PRIMARY_ROLES: readonly SliceRole[] = ["on-hours", "off-hours"];

/**
 * Resolves coverage from materialized roster slices. On-hours slices win
 * over off-hours slices for the primary tier; the backup tier comes from the
 * covering backup slice.
 */
export class RosterCoverageResolver implements CoverageResolver {
  private readonly log = logger.child({ component: "coverage-resolver" });

  constructor(
    private readonly slices: SliceSource,
    private readonly users: UserDirectory,
    private readonly plans: PlanSource,
    private readonly defaultPolicy: EscalationPolicy = SYSTEM_DEFAULT_POLICY,
  ) {}

  async resolve(customerId: string, asOf: Date): Promise<OnCallCoverage> {
    try {
      return await this.lookup(customerId, asOf);
    } catch (err: unknown) {
      if (err instanceof CoverageResolutionError) throw err;
      throw new CoverageResolutionError(customerId, errorMessage(err), { cause: err });
    }
  }

  private async lookup(customerId: string, asOf: Date): Promise<OnCallCoverage> {
    const covering = (await this.slices.slicesAround(customerId, asOf)).filter((s) => covers(s, asOf));

    const primarySlice = PRIMARY_ROLES
      .map((role) => latestStarting(covering.filter((s) => s.role === role)))
      .find((s) => s !== undefined);
    const backupSlice = latestStarting(covering.filter((s) => s.role === "backup"));

    const [primaryTier, backupTier] = await Promise.all([
      this.members(primarySlice),
      this.members(backupSlice),
    ]);

    let planId: string | null = null;
    let policy = this.defaultPolicy;
    for (const slice of [primarySlice, backupSlice]) {
      if (!slice) continue;
      const plan = await this.plans.getPlan(slice.planId);
      if (plan) {
        planId = plan.id;
        policy = plan.escalation;
        break;
      }
      this.log.warn({ customerId, planId: slice.planId }, "plan not found, trying next");
    }

    this.log.debug(
      { customerId, asOf: asOf.toISOString(), primary: primaryTier.length, backup: backupTier.length, planId },
      "coverage resolved",
    );
    return { primaryTier, backupTier, policy: { ...policy }, planId };
  }

  private async members(slice: ScheduleSlice | undefined): Promise<OnCallMember[]> {
    if (!slice) return [];
    const members: OnCallMember[] = [];
    for (const userId of slice.memberIds) {
      const user = await this.users.getUser(userId);
      if (!user) {
        this.log.warn({ userId, sliceId: slice.id }, "on-call user not found in directory, skipping");
        continue;
      }
      members.push({ userId: user.id, displayName: user.displayName, email: user.email, phone: user.phone });
    }
    return members;
  }
}

function latestStarting(slices: ScheduleSlice[]): ScheduleSlice | undefined {
  let best: ScheduleSlice | undefined;
  for (const slice of slices) {
    if (!best || slice.startUtc.getTime() > best.startUtc.getTime()) best = slice;
  }
  return best;
}
