// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import { EscalationError } from "../errors.js";

/** Orchestration code issued a different call than the one its journal recorded. */
export class NonDeterminismError extends EscalationError {
  constructor(
    readonly instanceId: string,
    readonly stepIndex: number,
    expected: string,
    actual: string,
  ) {
    super(`Non-deterministic replay of ${instanceId} at step ${stepIndex}: journal has ${expected}, code issued ${actual}`);
  }
}

export class InstanceAlreadyRunningError extends EscalationError {
  constructor(readonly instanceId: string) {
    super(`An orchestration run for ${instanceId} is already active`);
  }
}

export class UnknownActivityError extends EscalationError {
  constructor(readonly activityName: string) {
    super(`No activity registered under "${activityName}"`);
  }
}

export class UnknownOrchestrationError extends EscalationError {
  constructor(readonly orchestrationName: string) {
    super(`No orchestration registered under "${orchestrationName}"`);
  }
}

export class UnknownInstanceError extends EscalationError {
  constructor(readonly instanceId: string) {
    super(`No orchestration run found for ${instanceId}`);
  }
}

/**
 * An activity threw. Raised live and again on every replay of the same step,
 * carrying the original message.
 */
export class ActivityFailedError extends EscalationError {
  constructor(
    readonly activityName: string,
    message: string,
    readonly errorName: string = "Error",
  ) {
    super(message);
  }
}

export class IncompatibleRunVersionError extends EscalationError {
  constructor(readonly instanceId: string, readonly found: number, readonly expected: number) {
    super(`Run record for ${instanceId} has format version ${found}, expected ${expected}`);
  }
}
