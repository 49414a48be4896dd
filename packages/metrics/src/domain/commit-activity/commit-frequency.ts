import type { Commit, DistributionValue } from "@repometrics/core";
import type { MetricsConfig, WorkingHoursConfig } from "../../config.js";
import { isWeekday, secondsToDays, toIsoString, toLocalTime, WEEKDAY_NAMES } from "../calendar.js";
import {
  average,
  indexOfFirstMax,
  maxOf,
  minOf,
  percentage,
  populationStandardDeviation,
  round1,
  round2,
} from "../math.js";
import type { MetricDefinition } from "../metric-types.js";

export type HourCount = { hour: number; count: number };
export type WeekdayCount = { weekday: string; count: number };

export type CommitFrequencySummary = {
  totalCommits: number;
  commitsPerDay: {
    average: number;
    max: number;
    min: number;
  };
  commitsPerHour: HourCount[];
  commitsPerWeekday: WeekdayCount[];
  workingHours: {
    workingHoursCommits: number;
    offHoursCommits: number;
    workingHoursPercentage: number;
    offHoursPercentage: number;
  };
  busiestDay: { date: string; commits: number } | null;
  busiestHour: string | null;
  consistencyScore: number;
  timeSpanDays: number;
  firstCommit: string | null;
  lastCommit: string | null;
  averageCommitsPerDay: number;
};

const isWorkingHours = (weekday: number, hour: number, workingHours: WorkingHoursConfig): boolean =>
  isWeekday(weekday) && hour >= workingHours.startHour && hour < workingHours.endHour;

/** 100 for a perfectly even daily cadence, falling by 50 per unit of coefficient of variation. */
export const consistencyScore = (dailyCounts: readonly number[]): number => {
  if (dailyCounts.length === 0) {
    return 0;
  }

  if (dailyCounts.length === 1) {
    return 100;
  }

  const mean = average(dailyCounts);
  const coefficient = populationStandardDeviation(dailyCounts) / mean;
  return round1(Math.max(100 - coefficient * 50, 0));
};

const emptySummary = (): CommitFrequencySummary => ({
  totalCommits: 0,
  commitsPerDay: { average: 0, max: 0, min: 0 },
  commitsPerHour: Array.from({ length: 24 }, (_, hour) => ({ hour, count: 0 })),
  commitsPerWeekday: WEEKDAY_NAMES.map((weekday) => ({ weekday, count: 0 })),
  workingHours: { workingHoursCommits: 0, offHoursCommits: 0, workingHoursPercentage: 0, offHoursPercentage: 0 },
  busiestDay: null,
  busiestHour: null,
  consistencyScore: 0,
  timeSpanDays: 0,
  firstCommit: null,
  lastCommit: null,
  averageCommitsPerDay: 0,
});

export const computeCommitFrequency = (
  commits: readonly Commit[],
  config: MetricsConfig,
): { value: DistributionValue; summary: CommitFrequencySummary } => {
  if (commits.length === 0) {
    return { value: { kind: "distribution", buckets: [] }, summary: emptySummary() };
  }

  const dailyCounts = new Map<string, number>();
  const hourly: number[] = new Array<number>(24).fill(0);
  // hours in the order they first appear, for tie-breaking
  const hourOrder: number[] = [];
  const weekdayCounts: number[] = new Array<number>(7).fill(0);
  let workingHoursCommits = 0;
  let first = Number.POSITIVE_INFINITY;
  let last = Number.NEGATIVE_INFINITY;

  for (const commit of commits) {
    const local = toLocalTime(commit.timestamp, commit.utcOffsetMinutes);
    dailyCounts.set(local.date, (dailyCounts.get(local.date) ?? 0) + 1);

    if ((hourly[local.hour] ?? 0) === 0) {
      hourOrder.push(local.hour);
    }
    hourly[local.hour] = (hourly[local.hour] ?? 0) + 1;
    weekdayCounts[local.weekday] = (weekdayCounts[local.weekday] ?? 0) + 1;

    if (isWorkingHours(local.weekday, local.hour, config.workingHours)) {
      workingHoursCommits += 1;
    }

    first = Math.min(first, commit.timestamp);
    last = Math.max(last, commit.timestamp);
  }

  const dayEntries = [...dailyCounts.entries()];
  const counts = dayEntries.map(([, count]) => count);
  const busiestDayIndex = indexOfFirstMax(dayEntries, ([, count]) => count);
  const busiestDay = dayEntries[busiestDayIndex];
  const busiestHourIndex = indexOfFirstMax(hourOrder, (hour) => hourly[hour] ?? 0);
  const busiestHour = hourOrder[busiestHourIndex];

  const spanDays = secondsToDays(last - first);
  const offHoursCommits = commits.length - workingHoursCommits;

  const buckets = [...dayEntries]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([bucket, count]) => ({ bucket, count }));

  return {
    value: { kind: "distribution", buckets },
    summary: {
      totalCommits: commits.length,
      commitsPerDay: {
        average: round2(average(counts)),
        max: maxOf(counts),
        min: minOf(counts),
      },
      commitsPerHour: hourly.map((count, hour) => ({ hour, count })),
      commitsPerWeekday: WEEKDAY_NAMES.map((weekday, index) => ({ weekday, count: weekdayCounts[index] ?? 0 })),
      workingHours: {
        workingHoursCommits,
        offHoursCommits,
        workingHoursPercentage: round1(percentage(workingHoursCommits, commits.length)),
        offHoursPercentage: round1(percentage(offHoursCommits, commits.length)),
      },
      busiestDay: busiestDay === undefined ? null : { date: busiestDay[0], commits: busiestDay[1] },
      busiestHour: busiestHour === undefined ? null : `${busiestHour}:00`,
      consistencyScore: consistencyScore(counts),
      timeSpanDays: round1(spanDays),
      firstCommit: toIsoString(first),
      lastCommit: toIsoString(last),
      averageCommitsPerDay: round2(commits.length / Math.max(spanDays, 1)),
    },
  };
};

export const commitFrequencyMetric: MetricDefinition<DistributionValue, CommitFrequencySummary> = {
  name: "commit_frequency",
  category: "commit_activity",
  description: "Commits per calendar day with hourly, weekday and working-hours patterns",
  dataPointsLabel: "commits",
  sources: ["commits"],
  requiresMergeCommits: false,
  compute: ({ commits }, config) => ({
    ...computeCommitFrequency(commits, config),
    dataPoints: commits.length,
  }),
};
