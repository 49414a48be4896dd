import { describe, expect, it } from "vitest";
import { ValidationError } from "./errors.js";
import {
  createTimeWindow,
  timeWindowContains,
  timeWindowDurationDays,
  timeWindowToJSON,
} from "./time-window.js";

describe("createTimeWindow", () => {
  it("accepts unix seconds, dates and date strings", () => {
    expect(createTimeWindow(100, 200)).toEqual({ start: 100, end: 200 });
    expect(createTimeWindow(new Date("2025-01-01T00:00:00Z"), "2025-01-31T00:00:00Z")).toEqual({
      start: 1735689600,
      end: 1738281600,
    });
  });

  it("rejects missing bounds", () => {
    expect(() => createTimeWindow(null, 10)).toThrow(ValidationError);
    expect(() => createTimeWindow(10, undefined)).toThrow("End date cannot be empty");
  });

  it("rejects a start that is not before the end", () => {
    expect(() => createTimeWindow(200, 200)).toThrow("Start date must be before end date");
    expect(() => createTimeWindow(300, 200)).toThrow(ValidationError);
  });

  it("rejects unparseable strings", () => {
    expect(() => createTimeWindow("not a date", 10)).toThrow("Invalid start date: not a date");
  });

  it("returns a frozen window", () => {
    expect(Object.isFrozen(createTimeWindow(1, 2))).toBe(true);
  });
});

describe("time window queries", () => {
  const window = createTimeWindow("2025-01-01T00:00:00Z", "2025-01-31T00:00:00Z");

  it("includes both bounds", () => {
    expect(timeWindowContains(window, 1735689600)).toBe(true);
    expect(timeWindowContains(window, 1738281600)).toBe(true);
    expect(timeWindowContains(window, 1735689599)).toBe(false);
    expect(timeWindowContains(window, 1738281601)).toBe(false);
  });

  it("reports duration in whole days", () => {
    expect(timeWindowDurationDays(window)).toBe(30);
    expect(timeWindowDurationDays(createTimeWindow(0, 86400 * 1.4))).toBe(1);
  });

  it("serializes bounds as ISO strings", () => {
    expect(timeWindowToJSON(window)).toEqual({
      start: "2025-01-01T00:00:00.000Z",
      end: "2025-01-31T00:00:00.000Z",
      durationDays: 30,
    });
  });
});
