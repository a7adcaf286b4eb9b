// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

export const MINUTE_MS = 60_000;
export const DAY_MS = 86_400_000;

/**
 * Parses a duration written as `250ms`, `30s`, `5m`, `2h`, `1d`, a compound
 * such as `1h30m`, or a plain number of milliseconds.
 * @throws Error when the value is negative or not a recognised duration.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Invalid duration: ${value}`);
    }
    return Math.round(value);
  }

  const text = value.trim();
  if (/^\d+$/.test(text)) return parseInt(text, 10);

  const pattern = /(\d+(?:\.\d+)?)(ms|s|m|h|d)/g;
  let total = 0;
  let consumed = 0;
  for (const match of text.matchAll(pattern)) {
    const [whole, amount, unit] = match;
    const factor = unit === undefined ? undefined : UNIT_MS[unit];
    if (amount === undefined || factor === undefined) break;
    total += parseFloat(amount) * factor;
    consumed += whole.length;
  }

  if (consumed === 0 || consumed !== text.length) {
    throw new Error(`Invalid duration: "${value}" (expected e.g. 30s, 5m, 1h30m)`);
  }
  return Math.round(total);
}

/**
 * Formats a duration in milliseconds into a human-readable string.
 * @returns Formatted string (e.g. '500ms', '5s', '2m', '2m 30s', '1h 5m')
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (seconds > 0) parts.push(`${seconds}s`);
  return parts.join(" ");
}

/** Midnight UTC of the day containing `date`. */
export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addMs(date: Date, ms: number): Date {
  return new Date(date.getTime() + ms);
}
