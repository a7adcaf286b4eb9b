// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import type { ZodError } from "zod";
import type { AlertStatus } from "./types.js";

/** Base class for errors raised by the escalation engine. */
export class EscalationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AlertNotFoundError extends EscalationError {
  constructor(readonly alertId: string) {
    super(`Alert ${alertId} not found`);
  }
}

export class AlertAlreadyExistsError extends EscalationError {
  constructor(readonly alertId: string) {
    super(`Alert ${alertId} already exists`);
  }
}

export class InvalidTransitionError extends EscalationError {
  constructor(
    readonly alertId: string,
    readonly from: AlertStatus,
    readonly to: AlertStatus,
  ) {
    super(`Alert ${alertId} cannot move from ${from} to ${to}`);
  }
}

export class CoverageResolutionError extends EscalationError {
  constructor(readonly customerId: string, message: string, options?: ErrorOptions) {
    super(`Coverage lookup failed for customer ${customerId}: ${message}`, options);
  }
}

export class ConfigError extends EscalationError {}

/** Extract a printable message from anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** One line per zod issue, prefixed by the offending field path. */
export function formatIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}
