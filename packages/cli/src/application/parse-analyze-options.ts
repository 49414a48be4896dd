import { createTimeWindow, ValidationError, type MetricCategory, type TimeWindow } from "@repometrics/core";
import { isMetricCategory } from "@repometrics/metrics";

const RELATIVE_TIME = /^(\d+)([dwmy])$/;
const SECONDS_PER_DAY = 24 * 60 * 60;
const DEFAULT_WINDOW_DAYS = 30;
const ALL_TIME_FALLBACK_DAYS = 365;

const daysPerUnit = (unit: string | undefined): number => {
  switch (unit) {
    case "w":
      return 7;
    case "m":
      return 30;
    case "y":
      return 365;
    default:
      return 1;
  }
};

const toUnixSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/**
 * Parses `--since`/`--until` values: `30d`, `2w`, `3m` (30 days) and `1y` (365 days)
 * count back from `now`; anything else must be a date `Date.parse` accepts.
 */
export const parseTimeOption = (value: string, now: Date): number => {
  const trimmed = value.trim();
  const relative = RELATIVE_TIME.exec(trimmed);
  if (relative !== null) {
    const days = Number(relative[1]) * daysPerUnit(relative[2]);
    return toUnixSeconds(now) - days * SECONDS_PER_DAY;
  }

  const millis = Date.parse(trimmed);
  if (Number.isNaN(millis)) {
    throw new ValidationError(`Invalid time format: ${value}`);
  }

  return Math.floor(millis / 1000);
};

export type WindowOptions = {
  since?: string;
  until?: string;
  allTime?: boolean;
};

/**
 * `--all-time` starts at the first commit (a year back when the history is empty) and
 * wins over `--since`/`--until`. Without any option the window is the last 30 days.
 */
export const resolveAnalysisWindow = (
  options: WindowOptions,
  now: Date,
  earliestCommitTimestamp: () => number | null,
): TimeWindow => {
  const end = toUnixSeconds(now);

  if (options.allTime === true) {
    const earliest = earliestCommitTimestamp();
    return createTimeWindow(earliest ?? end - ALL_TIME_FALLBACK_DAYS * SECONDS_PER_DAY, end);
  }

  const start =
    options.since === undefined ? end - DEFAULT_WINDOW_DAYS * SECONDS_PER_DAY : parseTimeOption(options.since, now);
  return createTimeWindow(start, options.until === undefined ? end : parseTimeOption(options.until, now));
};

/** Splits a comma-separated option, dropping blanks. */
export const parseListOption = (value: string | undefined): string[] =>
  value === undefined
    ? []
    : value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);

export const parseCategoryOption = (value: string | undefined): MetricCategory[] =>
  parseListOption(value).map((entry) => {
    if (!isMetricCategory(entry)) {
      throw new ValidationError(`Unknown metric category: ${entry}`);
    }

    return entry;
  });
