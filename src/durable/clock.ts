// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.

/** Source of wall-clock time. Orchestration code never reads it directly. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
