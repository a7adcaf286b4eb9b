// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
// Typed event system for engine → CLI communication.

import { EventEmitter } from "node:events";
import type { AlertStatus, EscalationTier } from "./types.js";

export interface EscalationEngineEvents {
  "run:started": { instanceId: string; orchestration: string };
  "run:suspended": { instanceId: string; wakeAt: Date };
  "run:completed": { instanceId: string; output: unknown };
  "run:failed": { instanceId: string; error: string };
  "alert:status": { alertId: string; from: AlertStatus; to: AlertStatus; comment: string };
  "notification:attempt": {
    alertId: string;
    userId: string;
    tier: EscalationTier;
    emailSent: boolean;
    smsSent: boolean;
  };
  "horizon:extended": { customerId: string; from: Date; to: Date; slices: number };
  "log": { level: "info" | "warn" | "error"; message: string };
}

type EventKey = keyof EscalationEngineEvents;

/**
 * Type-safe event bus for engine ↔ CLI communication.
 *
 * Wraps Node's EventEmitter with typed `emitTyped` / `onTyped` methods
 * so callers get compile-time safety on event names and payloads.
 */
export class EscalationEventBus extends EventEmitter {
  /** Emit an event with a type-checked payload. */
  emitTyped<K extends EventKey>(event: K, payload: EscalationEngineEvents[K]): void {
    this.emit(event, payload);
  }

  /** Subscribe to an event with a type-checked listener. */
  onTyped<K extends EventKey>(event: K, listener: (payload: EscalationEngineEvents[K]) => void): this {
    return this.on(event, listener as (...args: unknown[]) => void);
  }
}
