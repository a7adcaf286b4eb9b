// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
// Escalation state machine: pure transitions, side effects live in escalation.ts

import type { EscalationPolicy, EscalationTier, OnCallMember } from "../types.js";

export type EscalationState =
  | { kind: "NotifyingTier"; tier: EscalationTier; index: number }
  | { kind: "WaitingAck"; tier: EscalationTier; index: number }
  | { kind: "AdvanceTier"; from: EscalationTier }
  | { kind: "EscalatingToBackup" }
  | { kind: "Exhausted" }
  | { kind: "HandledExternally"; reason: string };

export type EscalationEvent =
  /** Liveness check found the alert gone or handled. */
  | { type: "Handled"; reason: string }
  /** Liveness check found the alert still open. */
  | { type: "StillOpen" }
  | { type: "Notified"; delivered: boolean }
  | { type: "AckTimeoutElapsed" }
  | { type: "BackupStarted" };

export interface EscalationPlan {
  primaryTier: OnCallMember[];
  backupTier: OnCallMember[];
  policy: EscalationPolicy;
}

export type TerminalState = Extract<EscalationState, { kind: "Exhausted" | "HandledExternally" }>;

export class InvalidEscalationEventError extends Error {
  constructor(state: EscalationState, event: EscalationEvent) {
    super(`Event ${event.type} is not valid in state ${state.kind}`);
    this.name = "InvalidEscalationEventError";
  }
}

/** Members of a tier that will actually be tried, capped by `maxAttemptsPerTier`. */
export function membersFor(plan: EscalationPlan, tier: EscalationTier): OnCallMember[] {
  const members = tier === "primary" ? plan.primaryTier : plan.backupTier;
  return members.slice(0, Math.max(0, plan.policy.maxAttemptsPerTier));
}

export function initialState(plan: EscalationPlan): EscalationState {
  return positionAt(plan, "primary", 0);
}

export function isTerminal(state: EscalationState): state is TerminalState {
  return state.kind === "Exhausted" || state.kind === "HandledExternally";
}

/** Timeline text recorded when the primary tier hands over to backup. */
export function escalationReason(plan: EscalationPlan): string {
  return membersFor(plan, "primary").length === 0
    ? "No primary on-call members available. Escalating to backup."
    : "Primary on-call did not respond. Escalating to backup.";
}

export function nextState(state: EscalationState, event: EscalationEvent, plan: EscalationPlan): EscalationState {
  switch (state.kind) {
    case "NotifyingTier":
      if (event.type === "Handled") return { kind: "HandledExternally", reason: event.reason };
      if (event.type === "Notified") {
        return event.delivered
          ? { kind: "WaitingAck", tier: state.tier, index: state.index }
          : positionAt(plan, state.tier, state.index + 1);
      }
      break;

    case "WaitingAck":
      if (event.type === "AckTimeoutElapsed") return positionAt(plan, state.tier, state.index + 1);
      break;

    case "AdvanceTier":
      if (event.type === "Handled") return { kind: "HandledExternally", reason: event.reason };
      if (event.type === "StillOpen") {
        // An untried backup tier is entered even when the cap leaves it no members.
        return state.from === "primary" && plan.backupTier.length > 0
          ? { kind: "EscalatingToBackup" }
          : { kind: "Exhausted" };
      }
      break;

    case "EscalatingToBackup":
      if (event.type === "BackupStarted") return positionAt(plan, "backup", 0);
      break;

    case "Exhausted":
    case "HandledExternally":
      break;
  }
  throw new InvalidEscalationEventError(state, event);
}

function positionAt(plan: EscalationPlan, tier: EscalationTier, index: number): EscalationState {
  return index < membersFor(plan, tier).length
    ? { kind: "NotifyingTier", tier, index }
    : { kind: "AdvanceTier", from: tier };
}
