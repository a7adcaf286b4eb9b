// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import { systemClock, type Clock } from "../durable/clock.js";
import { AlertNotFoundError, InvalidTransitionError } from "../errors.js";
import type { EscalationEventBus } from "../events.js";
import { logger } from "../logger.js";
import type { Alert, AlertStatus, EscalationTier, NotificationResult } from "../types.js";
import type { AlertStore } from "./alert-store.js";
import { canTransitionAlert, isTerminalStatus } from "./status.js";

export const ENGINE_ACTOR = "escalation-engine";

export interface NotificationOutcome extends NotificationResult {
  userId: string;
  displayName: string;
  tier: EscalationTier;
}

interface StatusChange {
  to: AlertStatus;
  comment: string;
  actor: string;
  /** Reject the change instead of keeping a terminal status. */
  strict: boolean;
}

/**
 * All alert mutations go through here so every change lands in the timeline.
 *
 * Engine-driven changes never overwrite a terminal status: the comment is
 * still recorded but the status stays put. Human actions (acknowledge,
 * resolve, manual escalation) are strict and throw on an illegal move.
 */
export class AlertService {
  private readonly log = logger.child({ component: "alert-service" });

  constructor(
    private readonly store: AlertStore,
    private readonly clock: Clock = systemClock,
    private readonly events?: EscalationEventBus,
  ) {}

  get(alertId: string): Promise<Alert | null> {
    return this.store.get(alertId);
  }

  async require(alertId: string): Promise<Alert> {
    const alert = await this.store.get(alertId);
    if (!alert) throw new AlertNotFoundError(alertId);
    return alert;
  }

  /** Count one more attempt and point the alert at the member being paged. */
  async updateEscalationState(alertId: string, userId: string, tier: EscalationTier): Promise<Alert> {
    const alert = await this.require(alertId);
    alert.escalationAttempts += 1;
    alert.currentEscalationTarget = userId;

    // Backup paging happens under Escalated; primary paging is Pending.
    const target: AlertStatus = tier === "primary" ? "Pending" : alert.status;
    if (target !== alert.status && !isTerminalStatus(alert.status)) {
      this.apply(alert, {
        to: target,
        comment: `Escalation attempt ${alert.escalationAttempts}: paging ${userId}`,
        actor: ENGINE_ACTOR,
        strict: false,
      });
    } else {
      alert.updatedAt = this.timestamp();
    }
    return this.store.update(alert);
  }

  async recordNotificationResult(alertId: string, outcome: NotificationOutcome): Promise<Alert> {
    const alert = await this.require(alertId);
    this.append(alert, describeNotification(outcome), ENGINE_ACTOR);
    this.events?.emitTyped("notification:attempt", {
      alertId,
      userId: outcome.userId,
      tier: outcome.tier,
      emailSent: outcome.emailSent,
      smsSent: outcome.smsSent,
    });
    return this.store.update(alert);
  }

  markEscalated(alertId: string, reason: string): Promise<Alert> {
    return this.change(alertId, { to: "Escalated", comment: reason, actor: ENGINE_ACTOR, strict: false });
  }

  markFailed(alertId: string, reason: string): Promise<Alert> {
    return this.change(alertId, { to: "Failed", comment: reason, actor: ENGINE_ACTOR, strict: false });
  }

  async addTimelineEntry(alertId: string, comment: string, actor = ENGINE_ACTOR): Promise<Alert> {
    const alert = await this.require(alertId);
    this.append(alert, comment, actor);
    return this.store.update(alert);
  }

  /** Out-of-band acknowledgement; a running escalation notices it at its next liveness check. */
  acknowledge(alertId: string, actor: string): Promise<Alert> {
    return this.change(alertId, { to: "Accepted", comment: `Acknowledged by ${actor}`, actor, strict: true });
  }

  resolve(alertId: string, actor: string): Promise<Alert> {
    return this.change(alertId, { to: "Resolved", comment: `Resolved by ${actor}`, actor, strict: true });
  }

  async requestManualEscalation(alertId: string, actor: string): Promise<Alert> {
    const alert = await this.require(alertId);
    if (isTerminalStatus(alert.status)) {
      throw new InvalidTransitionError(alertId, alert.status, "Escalated");
    }
    this.apply(alert, { to: "Escalated", comment: "Manual escalation requested", actor, strict: true });
    return this.store.update(alert);
  }

  private async change(alertId: string, change: StatusChange): Promise<Alert> {
    const alert = await this.require(alertId);
    this.apply(alert, change);
    return this.store.update(alert);
  }

  private apply(alert: Alert, change: StatusChange): void {
    const from = alert.status;
    let to = change.to;
    if (!canTransitionAlert(from, to)) {
      if (change.strict || !isTerminalStatus(from)) {
        throw new InvalidTransitionError(alert.id, from, to);
      }
      this.log.info({ alertId: alert.id, status: from, requested: to }, "keeping terminal status");
      to = from;
    }

    const timestamp = this.timestamp();
    alert.status = to;
    alert.updatedAt = timestamp;
    if (to === "Resolved" && from !== "Resolved") {
      alert.resolvedAt = timestamp;
    }
    alert.timeline.push({
      actor: change.actor,
      comment: change.comment,
      previousStatus: from,
      newStatus: to,
      timestamp,
    });

    if (from !== to) {
      this.log.info({ alertId: alert.id, from, to }, change.comment);
      this.events?.emitTyped("alert:status", { alertId: alert.id, from, to, comment: change.comment });
    }
  }

  private append(alert: Alert, comment: string, actor: string): void {
    const timestamp = this.timestamp();
    alert.updatedAt = timestamp;
    alert.timeline.push({
      actor,
      comment,
      previousStatus: alert.status,
      newStatus: alert.status,
      timestamp,
    });
  }

  private timestamp(): string {
    return this.clock.now().toISOString();
  }
}

/** Timeline text for one notification attempt, e.g. "Notified primary on-call Alice (email: sent, SMS: failed)". */
export function describeNotification(outcome: NotificationOutcome): string {
  const channels = `email: ${outcome.emailSent ? "sent" : "failed"}, SMS: ${outcome.smsSent ? "sent" : "failed"}`;
  const who = `${outcome.tier} on-call ${outcome.displayName}`;
  if (outcome.emailSent || outcome.smsSent) {
    return `Notified ${who} (${channels})`;
  }
  const reason = outcome.error ? `: ${outcome.error}` : "";
  return `Failed to notify ${who} (${channels})${reason}`;
}
