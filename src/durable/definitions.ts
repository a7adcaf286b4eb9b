// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import type { z } from "zod";
import type { OrchestrationContext } from "./context.js";

/**
 * A named side-effecting step. Schemas validate the input on the way in and
 * the journaled result on the way back out during replay.
 */
export interface ActivityDefinition<I, O> {
  name: string;
  input: z.ZodType<I, z.ZodTypeDef, unknown>;
  output: z.ZodType<O, z.ZodTypeDef, unknown>;
}

export type ActivityImplementation<I, O> = (input: I) => Promise<O>;

/**
 * Deterministic workflow code. `run` is re-executed from the top on every
 * pass, so it may only reach the outside world through `ctx`.
 */
export interface OrchestrationDefinition<I, O> {
  name: string;
  input: z.ZodType<I, z.ZodTypeDef, unknown>;
  run(ctx: OrchestrationContext, input: I): Promise<O>;
}

export function defineActivity<I, O>(def: ActivityDefinition<I, O>): ActivityDefinition<I, O> {
  return def;
}

export function defineOrchestration<I, O>(def: OrchestrationDefinition<I, O>): OrchestrationDefinition<I, O> {
  return def;
}
