// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import type { AlertStatus } from "../types.js";

export const ALERT_TRANSITIONS: Record<AlertStatus, AlertStatus[]> = {
  Received: ["Checking", "Pending", "Escalated", "Accepted", "Resolved", "Failed"],
  Checking: ["Pending", "Escalated", "Accepted", "Resolved", "Failed"],
  Pending: ["Escalated", "Accepted", "Resolved", "Failed"],
  Escalated: ["Pending", "Accepted", "Resolved", "Failed"],
  Accepted: ["Resolved"],
  Resolved: [],
  Failed: [],
};

export const TERMINAL_STATUSES: ReadonlySet<AlertStatus> = new Set(["Accepted", "Resolved", "Failed"]);

/** Default statuses at which escalation stops because someone took over. */
export const DEFAULT_HANDLED_STATUSES: ReadonlySet<AlertStatus> = new Set(["Accepted", "Resolved"]);

export function canTransitionAlert(from: AlertStatus, to: AlertStatus): boolean {
  return from === to || ALERT_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: AlertStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}
