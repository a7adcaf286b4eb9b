// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import { errorMessage } from "../errors.js";
import { defineOrchestration, type OrchestrationDefinition } from "../durable/definitions.js";
import { AlertSchema, type Alert, type AlertStatus } from "../types.js";
import { GetOnCallCoverage, MarkEscalated, MarkFailed } from "./activities.js";
import { runEscalation } from "./escalation.js";

export const ALERT_ORCHESTRATION = "AlertOrchestration";

export const NO_COVERAGE_REASON = "No on-call users configured - unable to send notifications";

export type AlertOrchestrationResult =
  | { outcome: "NoCoverage" }
  | { outcome: "HandledExternally"; attempts: number; reason: string }
  | { outcome: "Exhausted"; attempts: number }
  | { outcome: "Failed"; error: string };

export interface AlertOrchestrationOptions {
  handledStatuses?: ReadonlySet<AlertStatus>;
}

/**
 * Entry point per alert: resolve who is on call right now, then escalate.
 * Any error ends the run with the alert marked Failed so it never stays
 * silently in progress.
 */
export function createAlertOrchestration(
  options: AlertOrchestrationOptions = {},
): OrchestrationDefinition<Alert, AlertOrchestrationResult> {
  return defineOrchestration({
    name: ALERT_ORCHESTRATION,
    input: AlertSchema,
    async run(ctx, alert): Promise<AlertOrchestrationResult> {
      ctx.log.info({ alertId: alert.id, customerId: alert.customerId }, "starting alert orchestration");
      try {
        const coverage = await ctx.callActivity(GetOnCallCoverage, {
          customerId: alert.customerId,
          asOf: ctx.now().toISOString(),
        });

        if (coverage.primaryTier.length === 0 && coverage.backupTier.length === 0) {
          ctx.log.warn({ alertId: alert.id, customerId: alert.customerId }, "no on-call users found");
          await ctx.callActivity(MarkEscalated, { alertId: alert.id, reason: NO_COVERAGE_REASON });
          return { outcome: "NoCoverage" };
        }

        return await runEscalation(
          ctx,
          alert.id,
          { primaryTier: coverage.primaryTier, backupTier: coverage.backupTier, policy: coverage.policy },
          { handledStatuses: options.handledStatuses },
        );
      } catch (err: unknown) {
        const error = errorMessage(err);
        ctx.log.error({ alertId: alert.id, err: error }, "alert orchestration failed");
        await ctx.callActivity(MarkFailed, { alertId: alert.id, reason: `Orchestration failed: ${error}` });
        return { outcome: "Failed", error };
      }
    },
  });
}
