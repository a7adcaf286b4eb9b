// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import type { AlertSeverity } from "../types.js";

/** Display payload copied from the alert; never changes during escalation. */
export interface AlertDisplay {
  alertId: string;
  customerId: string;
  resourceId: string;
  title: string;
  description: string | null;
  severity: AlertSeverity;
}

export interface NotificationMessage {
  subject: string;
  body: string;
  smsText: string;
}

const SMS_TITLE_LIMIT = 50;

export function buildNotification(sender: string, display: AlertDisplay): NotificationMessage {
  const subject = `[${sender}] ${display.severity}: ${display.title}`;

  const body = [
    "Alert Notification",
    "",
    `Title: ${display.title}`,
    `Severity: ${display.severity}`,
    `Resource: ${display.resourceId}`,
    `Alert ID: ${display.alertId}`,
    "",
    "Description:",
    display.description ?? "No description provided",
    "",
    "You are receiving this notification because you are on-call.",
    "Acknowledge the alert to stop further escalation.",
    "",
    "--",
    sender,
  ].join("\n");

  // Count code points so an emoji is never cut in half.
  const chars = Array.from(display.title);
  const title = chars.length > SMS_TITLE_LIMIT
    ? chars.slice(0, SMS_TITLE_LIMIT - 3).join("") + "..."
    : display.title;

  return { subject, body, smsText: `[${sender}] ${display.severity}: ${title}` };
}
