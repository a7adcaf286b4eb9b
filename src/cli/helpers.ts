// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
/**
 * Shared CLI helper functions for the command actions.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { InvalidArgumentError } from "commander";
import { parseAlert } from "../alerts/alert-store.js";
import { loadConfig, type ConfigFile } from "../config.js";
import type { RunRecord } from "../durable/journal.js";
import { formatDuration } from "../duration.js";
import { createEngineFromConfig, type EscalationEngine } from "../engine.js";
import type { EscalationEventBus } from "../events.js";
import { logger, redirectLogToFile } from "../logger.js";
import { ALERT_STATUSES, type Alert, type AlertStatus } from "../types.js";

/** Load config from the global --config option and apply its logging settings. */
export function loadConfigFromOpts(configPath?: string): ConfigFile {
  const config = loadConfig(configPath);
  logger.level = config.logging.level;
  return config;
}

/** Route logs to the configured file, if any. */
export function applyLogFile(config: ConfigFile): void {
  if (config.logging.file) {
    redirectLogToFile(path.resolve(config.logging.file));
  }
}

export function createEngine(config: ConfigFile, events?: EscalationEventBus): EscalationEngine {
  return createEngineFromConfig(config, { events });
}

/** Parse and validate an alert id from CLI input. */
export function parseAlertId(value: string): string {
  const id = value.trim();
  if (!/^[A-Za-z0-9._:-]+$/.test(id)) {
    throw new InvalidArgumentError("Alert id may only contain letters, digits, '.', '_', ':' and '-'.");
  }
  return id;
}

/** Parse a whole number of days from CLI input. */
export function parseDays(value: string): number {
  const num = parseInt(value, 10);
  if (isNaN(num) || num < 1 || String(num) !== value.trim()) {
    throw new InvalidArgumentError("Days must be a positive integer.");
  }
  return num;
}

/** Parse an ISO date from CLI input. */
export function parseDate(value: string): Date {
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    throw new InvalidArgumentError(`"${value}" is not a valid date.`);
  }
  return date;
}

/** Parse an alert status name from CLI input. */
export function parseStatus(value: string): AlertStatus {
  const status = ALERT_STATUSES.find((s) => s.toLowerCase() === value.trim().toLowerCase());
  if (!status) {
    throw new InvalidArgumentError(`Status must be one of: ${ALERT_STATUSES.join(", ")}.`);
  }
  return status;
}

/** Read an alert JSON document, filling defaults for omitted fields. */
export function readAlertFile(filePath: string, now: Date = new Date()): Alert {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Alert file not found: ${resolved}`);
  }
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  const stamp = now.toISOString();
  const withTimestamps = typeof raw === "object" && raw !== null
    ? { createdAt: stamp, updatedAt: stamp, ...raw }
    : raw;
  return parseAlert(withTimestamps, resolved);
}

const STATUS_ICONS: Record<string, string> = {
  Received: "📥",
  Checking: "🔎",
  Pending: "⏳",
  Escalated: "📣",
  Accepted: "✅",
  Resolved: "✅",
  Failed: "❌",
};

/** Multi-line, human-readable summary of an alert and its run. */
export function formatAlertReport(alert: Alert, run: RunRecord | null, now: Date = new Date()): string {
  const lines: string[] = [];
  lines.push(`${STATUS_ICONS[alert.status] ?? "•"} Alert ${alert.id} — ${alert.status}`);
  lines.push(`  Title: ${alert.title} (${alert.severity})`);
  lines.push(`  Customer: ${alert.customerId}  Resource: ${alert.resourceId}`);
  lines.push(`  Attempts: ${alert.escalationAttempts}  Target: ${alert.currentEscalationTarget ?? "-"}`);
  if (run) {
    lines.push(`  Run: ${formatRunStatus(run, now)}`);
  }
  if (alert.timeline.length > 0) {
    lines.push("  Timeline:");
    for (const entry of alert.timeline) {
      const transition = entry.previousStatus === entry.newStatus
        ? entry.newStatus
        : `${entry.previousStatus} → ${entry.newStatus}`;
      lines.push(`    ${entry.timestamp}  [${transition}] ${entry.comment} (${entry.actor})`);
    }
  }
  return lines.join("\n");
}

/** One line per alert for listings. */
export function formatAlertLine(alert: Alert): string {
  const target = alert.currentEscalationTarget ? ` → ${alert.currentEscalationTarget}` : "";
  return `${STATUS_ICONS[alert.status] ?? "•"} ${alert.id}  ${alert.status}  ${alert.severity}  ${alert.title}${target}`;
}

export function formatRunStatus(run: RunRecord, now: Date = new Date()): string {
  const steps = `${run.journal.length} step${run.journal.length === 1 ? "" : "s"}`;
  switch (run.status) {
    case "suspended": {
      if (!run.wakeAt) return `suspended, ${steps}`;
      const remaining = Math.max(0, new Date(run.wakeAt).getTime() - now.getTime());
      return `suspended until ${run.wakeAt} (in ${formatDuration(remaining)}), ${steps}`;
    }
    case "failed":
      return `failed: ${run.error ?? "unknown error"}, ${steps}`;
    default:
      return `${run.status}, ${steps}`;
  }
}

/** Print engine events as progress lines on stdout. */
export function attachProgress(events: EscalationEventBus): void {
  events.onTyped("alert:status", ({ alertId, from, to, comment }) => {
    console.log(`  ${STATUS_ICONS[to] ?? "•"} ${alertId}: ${from} → ${to} — ${comment}`);
  });
  events.onTyped("notification:attempt", ({ alertId, userId, tier, emailSent, smsSent }) => {
    const ok = emailSent || smsSent;
    console.log(
      `  ${ok ? "📨" : "⚠️ "} ${alertId}: ${tier} ${userId} (email ${emailSent ? "sent" : "failed"}, sms ${smsSent ? "sent" : "failed"})`,
    );
  });
  events.onTyped("run:suspended", ({ instanceId, wakeAt }) => {
    console.log(`  💤 ${instanceId}: waiting until ${wakeAt.toISOString()}`);
  });
  events.onTyped("horizon:extended", ({ customerId, to, slices }) => {
    console.log(`  🗓️  ${customerId}: ${slices} slices through ${to.toISOString()}`);
  });
}
