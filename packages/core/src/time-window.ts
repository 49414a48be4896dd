import { ValidationError } from "./errors.js";

export type TimeWindow = {
  readonly start: number;
  readonly end: number;
};

export type TimeInput = number | string | Date;

export type TimeWindowJSON = {
  start: string;
  end: string;
  durationDays: number;
};

const SECONDS_PER_DAY = 24 * 60 * 60;

const toUnixSeconds = (input: TimeInput | null | undefined, label: string): number => {
  if (input === null || input === undefined) {
    throw new ValidationError(`${label} cannot be empty`);
  }

  if (typeof input === "number") {
    if (!Number.isFinite(input)) {
      throw new ValidationError(`${label} is not a finite timestamp`);
    }

    return input;
  }

  const millis = input instanceof Date ? input.getTime() : Date.parse(input);
  if (Number.isNaN(millis)) {
    throw new ValidationError(`Invalid ${label.toLowerCase()}: ${String(input)}`);
  }

  return Math.floor(millis / 1000);
};

/**
 * Builds an immutable time window. Numbers are unix seconds; strings go through
 * `Date.parse`. The start must be strictly before the end.
 */
export const createTimeWindow = (
  start: TimeInput | null | undefined,
  end: TimeInput | null | undefined,
): TimeWindow => {
  const startSeconds = toUnixSeconds(start, "Start date");
  const endSeconds = toUnixSeconds(end, "End date");

  if (startSeconds >= endSeconds) {
    throw new ValidationError("Start date must be before end date");
  }

  return Object.freeze({ start: startSeconds, end: endSeconds });
};

export const timeWindowContains = (window: TimeWindow, timestamp: number): boolean =>
  timestamp >= window.start && timestamp <= window.end;

export const timeWindowDurationDays = (window: TimeWindow): number =>
  Math.round((window.end - window.start) / SECONDS_PER_DAY);

export const timeWindowToJSON = (window: TimeWindow): TimeWindowJSON => ({
  start: new Date(window.start * 1000).toISOString(),
  end: new Date(window.end * 1000).toISOString(),
  durationDays: timeWindowDurationDays(window),
});
