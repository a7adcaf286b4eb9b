import { describe, it, expect } from "vitest";
import { addMs, formatDuration, parseDuration, startOfUtcDay } from "../src/duration.js";

describe("parseDuration", () => {
  it("parses single-unit durations", () => {
    expect(parseDuration("250ms")).toBe(250);
    expect(parseDuration("30s")).toBe(30_000);
    expect(parseDuration("5m")).toBe(300_000);
    expect(parseDuration("2h")).toBe(7_200_000);
    expect(parseDuration("1d")).toBe(86_400_000);
  });

  it("parses compound and fractional durations", () => {
    expect(parseDuration("1h30m")).toBe(5_400_000);
    expect(parseDuration("1.5m")).toBe(90_000);
  });

  it("accepts plain milliseconds as string or number", () => {
    expect(parseDuration("1500")).toBe(1500);
    expect(parseDuration(42)).toBe(42);
  });

  it("rejects unknown units and trailing text", () => {
    expect(() => parseDuration("soon")).toThrow('Invalid duration: "soon"');
    expect(() => parseDuration("5m later")).toThrow("Invalid duration");
    expect(() => parseDuration("")).toThrow("Invalid duration");
  });

  it("rejects negative numbers", () => {
    expect(() => parseDuration(-1)).toThrow("Invalid duration: -1");
  });
});

describe("formatDuration", () => {
  it("formats sub-second and composite durations", () => {
    expect(formatDuration(500)).toBe("500ms");
    expect(formatDuration(5_000)).toBe("5s");
    expect(formatDuration(150_000)).toBe("2m 30s");
    expect(formatDuration(3_900_000)).toBe("1h 5m");
  });
});

describe("date helpers", () => {
  it("truncates to midnight UTC", () => {
    expect(startOfUtcDay(new Date("2025-03-01T23:59:59.999Z")).toISOString()).toBe("2025-03-01T00:00:00.000Z");
  });

  it("adds milliseconds without mutating the input", () => {
    const start = new Date("2025-03-01T00:00:00.000Z");
    expect(addMs(start, 60_000).toISOString()).toBe("2025-03-01T00:01:00.000Z");
    expect(start.toISOString()).toBe("2025-03-01T00:00:00.000Z");
  });
});
