import { describe, it, expect } from "vitest";
import {
  InvalidEscalationEventError,
  escalationReason,
  initialState,
  isTerminal,
  membersFor,
  nextState,
  type EscalationPlan,
} from "../../src/escalation/state-machine.js";
import { member, policy } from "../helpers/fakes.js";

function plan(primary: string[], backup: string[], maxAttemptsPerTier = 3): EscalationPlan {
  return {
    primaryTier: primary.map(member),
    backupTier: backup.map(member),
    policy: policy({ maxAttemptsPerTier }),
  };
}

describe("initialState", () => {
  it("starts by notifying the first primary member", () => {
    expect(initialState(plan(["A"], []))).toEqual({ kind: "NotifyingTier", tier: "primary", index: 0 });
  });

  it("skips an empty primary tier", () => {
    expect(initialState(plan([], ["B"]))).toEqual({ kind: "AdvanceTier", from: "primary" });
  });

  it("treats a zero attempt cap as an empty tier", () => {
    expect(initialState(plan(["A"], ["B"], 0))).toEqual({ kind: "AdvanceTier", from: "primary" });
  });
});

describe("membersFor", () => {
  it("caps the tier at maxAttemptsPerTier, keeping tier order", () => {
    expect(membersFor(plan(["A", "B", "C"], [], 2), "primary").map((m) => m.userId)).toEqual(["A", "B"]);
  });
});

describe("nextState", () => {
  const p = plan(["A", "B"], ["C"]);

  it("waits for an ack after a delivered notification", () => {
    const state = nextState({ kind: "NotifyingTier", tier: "primary", index: 0 }, { type: "Notified", delivered: true }, p);
    expect(state).toEqual({ kind: "WaitingAck", tier: "primary", index: 0 });
  });

  it("moves straight to the next member after a failed notification", () => {
    const state = nextState({ kind: "NotifyingTier", tier: "primary", index: 0 }, { type: "Notified", delivered: false }, p);
    expect(state).toEqual({ kind: "NotifyingTier", tier: "primary", index: 1 });
  });

  it("advances the tier after the last member's timeout", () => {
    const state = nextState({ kind: "WaitingAck", tier: "primary", index: 1 }, { type: "AckTimeoutElapsed" }, p);
    expect(state).toEqual({ kind: "AdvanceTier", from: "primary" });
  });

  it("escalates to backup when primary is exhausted and backup exists", () => {
    expect(nextState({ kind: "AdvanceTier", from: "primary" }, { type: "StillOpen" }, p)).toEqual({
      kind: "EscalatingToBackup",
    });
    expect(nextState({ kind: "EscalatingToBackup" }, { type: "BackupStarted" }, p)).toEqual({
      kind: "NotifyingTier",
      tier: "backup",
      index: 0,
    });
  });

  it("is exhausted after the backup tier or without one", () => {
    expect(nextState({ kind: "AdvanceTier", from: "backup" }, { type: "StillOpen" }, p)).toEqual({ kind: "Exhausted" });
    expect(nextState({ kind: "AdvanceTier", from: "primary" }, { type: "StillOpen" }, plan(["A"], []))).toEqual({
      kind: "Exhausted",
    });
  });

  it("stops when the alert was handled", () => {
    expect(
      nextState({ kind: "NotifyingTier", tier: "backup", index: 0 }, { type: "Handled", reason: "alert is Accepted" }, p),
    ).toEqual({ kind: "HandledExternally", reason: "alert is Accepted" });
    expect(nextState({ kind: "AdvanceTier", from: "primary" }, { type: "Handled", reason: "gone" }, p)).toEqual({
      kind: "HandledExternally",
      reason: "gone",
    });
  });

  it("rejects events that do not apply to the state", () => {
    expect(() => nextState({ kind: "WaitingAck", tier: "primary", index: 0 }, { type: "StillOpen" }, p)).toThrow(
      InvalidEscalationEventError,
    );
    expect(() => nextState({ kind: "Exhausted" }, { type: "AckTimeoutElapsed" }, p)).toThrow(
      "Event AckTimeoutElapsed is not valid in state Exhausted",
    );
  });
});

describe("helpers", () => {
  it("identifies terminal states", () => {
    expect(isTerminal({ kind: "Exhausted" })).toBe(true);
    expect(isTerminal({ kind: "HandledExternally", reason: "x" })).toBe(true);
    expect(isTerminal({ kind: "EscalatingToBackup" })).toBe(false);
  });

  it("explains why the backup tier is paged", () => {
    expect(escalationReason(plan(["A"], ["B"]))).toBe("Primary on-call did not respond. Escalating to backup.");
    expect(escalationReason(plan([], ["B"]))).toBe("No primary on-call members available. Escalating to backup.");
  });
});
