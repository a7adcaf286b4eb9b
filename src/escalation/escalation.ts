// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import { DEFAULT_HANDLED_STATUSES } from "../alerts/status.js";
import type { OrchestrationContext } from "../durable/context.js";
import type { AlertStatus, EscalationTier, OnCallMember } from "../types.js";
import {
  AddTimelineEntry,
  GetAlert,
  MarkEscalated,
  RecordNotificationResult,
  SendNotification,
  UpdateEscalationState,
  type AlertSnapshot,
} from "./activities.js";
import {
  escalationReason,
  initialState,
  isTerminal,
  membersFor,
  nextState,
  type EscalationEvent,
  type EscalationPlan,
  type EscalationState,
} from "./state-machine.js";

export interface EscalationOptions {
  /** Alert statuses that mean someone has taken over. */
  handledStatuses?: ReadonlySet<AlertStatus>;
}

export type EscalationResult =
  | { outcome: "Exhausted"; attempts: number }
  | { outcome: "HandledExternally"; attempts: number; reason: string };

type Liveness = { open: true; alert: AlertSnapshot } | { open: false; reason: string };

/**
 * Page the plan's members tier by tier until someone handles the alert or
 * every member has been tried. Runs inside an orchestration; all I/O goes
 * through activities.
 */
export async function runEscalation(
  ctx: OrchestrationContext,
  alertId: string,
  plan: EscalationPlan,
  options: EscalationOptions = {},
): Promise<EscalationResult> {
  const handled = options.handledStatuses ?? DEFAULT_HANDLED_STATUSES;
  let attempts = 0;
  let state: EscalationState = initialState(plan);

  ctx.log.info(
    { alertId, primary: plan.primaryTier.length, backup: plan.backupTier.length },
    "starting escalation",
  );

  const checkLiveness = async (): Promise<Liveness> => {
    const alert = await ctx.callActivity(GetAlert, { alertId });
    if (!alert) return { open: false, reason: "alert no longer exists" };
    if (handled.has(alert.status)) return { open: false, reason: `alert is ${alert.status}` };
    return { open: true, alert };
  };

  const notify = async (tier: EscalationTier, member: OnCallMember, alert: AlertSnapshot): Promise<boolean> => {
    attempts++;
    ctx.log.info({ alertId, tier, userId: member.userId }, `notifying ${tier} on-call ${member.displayName}`);
    await ctx.callActivity(UpdateEscalationState, { alertId, userId: member.userId, tier });
    const result = await ctx.callActivity(SendNotification, { alert, member });
    await ctx.callActivity(RecordNotificationResult, {
      alertId,
      userId: member.userId,
      displayName: member.displayName,
      tier,
      result,
    });
    return result.emailSent || result.smsSent;
  };

  while (!isTerminal(state)) {
    let event: EscalationEvent;
    switch (state.kind) {
      case "NotifyingTier": {
        const member = membersFor(plan, state.tier)[state.index];
        if (!member) throw new Error(`No ${state.tier} member at position ${state.index}`);
        const liveness = await checkLiveness();
        event = liveness.open
          ? { type: "Notified", delivered: await notify(state.tier, member, liveness.alert) }
          : { type: "Handled", reason: liveness.reason };
        break;
      }
      case "WaitingAck":
        await ctx.delay(plan.policy.ackTimeoutMs);
        event = { type: "AckTimeoutElapsed" };
        break;
      case "AdvanceTier": {
        const liveness = await checkLiveness();
        event = liveness.open ? { type: "StillOpen" } : { type: "Handled", reason: liveness.reason };
        break;
      }
      case "EscalatingToBackup":
        ctx.log.info({ alertId }, "primary tier did not respond, escalating to backup");
        await ctx.callActivity(MarkEscalated, { alertId, reason: escalationReason(plan) });
        event = { type: "BackupStarted" };
        break;
    }
    state = nextState(state, event, plan);
  }

  if (state.kind === "HandledExternally") {
    ctx.log.info({ alertId, reason: state.reason, attempts }, "escalation stopped");
    return { outcome: "HandledExternally", attempts, reason: state.reason };
  }

  ctx.log.warn({ alertId, attempts }, "all notification attempts exhausted");
  await ctx.callActivity(AddTimelineEntry, {
    alertId,
    comment: `All ${attempts} notification attempts completed without response`,
  });
  return { outcome: "Exhausted", attempts };
}
