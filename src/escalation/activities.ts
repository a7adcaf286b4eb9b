// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
// Activity definitions and their implementations against the engine's collaborators

import { z } from "zod";
import type { AlertService } from "../alerts/alert-service.js";
import type { CoverageResolver } from "../coverage/resolver.js";
import { defineActivity } from "../durable/definitions.js";
import type { DurableRuntime } from "../durable/runtime.js";
import { logger } from "../logger.js";
import type { NotificationDispatcher } from "../notifications/dispatcher.js";
import { buildNotification } from "../notifications/message.js";
import {
  AlertSeveritySchema,
  AlertStatusSchema,
  NotificationResultSchema,
  OnCallCoverageSchema,
  OnCallMemberSchema,
  type Alert,
} from "../types.js";

const TierSchema = z.enum(["primary", "backup"]);

/** What the orchestration needs to know about an alert between steps. */
export const AlertSnapshotSchema = z.object({
  alertId: z.string(),
  customerId: z.string(),
  resourceId: z.string(),
  status: AlertStatusSchema,
  severity: AlertSeveritySchema,
  title: z.string(),
  description: z.string().nullable(),
  escalationAttempts: z.number().int(),
});

export type AlertSnapshot = z.infer<typeof AlertSnapshotSchema>;

export function toSnapshot(alert: Alert): AlertSnapshot {
  return {
    alertId: alert.id,
    customerId: alert.customerId,
    resourceId: alert.resourceId,
    status: alert.status,
    severity: alert.severity,
    title: alert.title,
    description: alert.description,
    escalationAttempts: alert.escalationAttempts,
  };
}

const AlertReasonSchema = z.object({ alertId: z.string(), reason: z.string() });

export const GetOnCallCoverage = defineActivity({
  name: "GetOnCallCoverage",
  input: z.object({ customerId: z.string(), asOf: z.string() }),
  output: OnCallCoverageSchema,
});

export const GetAlert = defineActivity({
  name: "GetAlert",
  input: z.object({ alertId: z.string() }),
  output: AlertSnapshotSchema.nullable(),
});

export const UpdateEscalationState = defineActivity({
  name: "UpdateEscalationState",
  input: z.object({ alertId: z.string(), userId: z.string(), tier: TierSchema }),
  output: AlertSnapshotSchema,
});

export const SendNotification = defineActivity({
  name: "SendNotification",
  input: z.object({ alert: AlertSnapshotSchema, member: OnCallMemberSchema }),
  output: NotificationResultSchema,
});

export const RecordNotificationResult = defineActivity({
  name: "RecordNotificationResult",
  input: z.object({
    alertId: z.string(),
    userId: z.string(),
    displayName: z.string(),
    tier: TierSchema,
    result: NotificationResultSchema,
  }),
  output: AlertSnapshotSchema,
});

export const MarkEscalated = defineActivity({
  name: "MarkEscalated",
  input: AlertReasonSchema,
  output: AlertSnapshotSchema,
});

export const MarkFailed = defineActivity({
  name: "MarkFailed",
  input: AlertReasonSchema,
  output: AlertSnapshotSchema,
});

export const AddTimelineEntry = defineActivity({
  name: "AddTimelineEntry",
  input: z.object({ alertId: z.string(), comment: z.string() }),
  output: AlertSnapshotSchema,
});

export interface EscalationActivityDeps {
  alerts: AlertService;
  coverage: CoverageResolver;
  dispatcher: NotificationDispatcher;
  /** Sender name shown in subjects and SMS text. */
  sender: string;
}

/** Bind every escalation activity to its collaborator on the runtime. */
export function registerEscalationActivities(runtime: DurableRuntime, deps: EscalationActivityDeps): void {
  const log = logger.child({ component: "activities" });

  runtime
    .registerActivity(GetOnCallCoverage, ({ customerId, asOf }) =>
      deps.coverage.resolve(customerId, new Date(asOf)),
    )
    .registerActivity(GetAlert, async ({ alertId }) => {
      const alert = await deps.alerts.get(alertId);
      return alert ? toSnapshot(alert) : null;
    })
    .registerActivity(UpdateEscalationState, async ({ alertId, userId, tier }) => {
      log.info({ alertId, userId, tier }, "updating escalation state");
      return toSnapshot(await deps.alerts.updateEscalationState(alertId, userId, tier));
    })
    .registerActivity(SendNotification, ({ alert, member }) => {
      log.info({ alertId: alert.alertId, userId: member.userId }, "sending notification");
      const message = buildNotification(deps.sender, alert);
      return deps.dispatcher.send({
        alertId: alert.alertId,
        userId: member.userId,
        email: member.email,
        phone: member.phone,
        ...message,
      });
    })
    .registerActivity(RecordNotificationResult, async ({ alertId, userId, displayName, tier, result }) =>
      toSnapshot(await deps.alerts.recordNotificationResult(alertId, { userId, displayName, tier, ...result })),
    )
    .registerActivity(MarkEscalated, async ({ alertId, reason }) => {
      log.info({ alertId, reason }, "marking alert escalated");
      return toSnapshot(await deps.alerts.markEscalated(alertId, reason));
    })
    .registerActivity(MarkFailed, async ({ alertId, reason }) => {
      log.warn({ alertId, reason }, "marking alert failed");
      return toSnapshot(await deps.alerts.markFailed(alertId, reason));
    })
    .registerActivity(AddTimelineEntry, async ({ alertId, comment }) =>
      toSnapshot(await deps.alerts.addTimelineEntry(alertId, comment)),
    );
}
