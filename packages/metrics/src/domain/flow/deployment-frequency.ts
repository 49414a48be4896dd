import type { Commit, TableValue, Tag, TimeWindow } from "@repometrics/core";
import type { DeploymentConfig } from "../../config.js";
import { isWeekday, secondsToDays, toIsoString, toLocalTime, WEEKDAY_NAMES } from "../calendar.js";
import {
  average,
  coefficientOfVariation,
  indexOfFirstMax,
  maxOf,
  minOf,
  populationStandardDeviation,
  round1,
  round2,
  round3,
} from "../math.js";
import type { MetricDefinition } from "../metric-types.js";
import { createProductionTagMatcher, type ProductionTagMatcher } from "../production-tag-matcher.js";

export const MERGE_PATTERNS: readonly RegExp[] = [
  /^Merge pull request/i,
  /^Merge branch/i,
  /^Merge remote-tracking branch/i,
  /^Merged in/i,
];

const SUCCESS_KEYWORDS = ["success", "successful", "deploy", "deployed", "release", "released"];
const FAILURE_KEYWORDS = ["rollback", "revert", "failed", "error", "issue", "problem"];
const MIN_DEPLOYMENTS_FOR_TRENDS = 4;
const MIN_MONTHS_FOR_TRENDS = 3;

export type DeploymentType = "production_release" | "merge_deployment";

export type Deployment = {
  type: DeploymentType;
  identifier: string;
  deployedAt: string;
  timestamp: number;
  utcOffsetMinutes: number;
  commitHash: string | null;
  method: "tag" | "merge";
  message: string | null;
};

export type FrequencyCategory = "none" | "low" | "moderate" | "high" | "very_high";
export type Predictability =
  | "highly_predictable"
  | "moderately_predictable"
  | "somewhat_predictable"
  | "unpredictable"
  | "unknown";
export type DeploymentVelocity = "small_batches" | "medium_batches" | "large_batches" | "very_large_batches";
export type BatchSizeCategory = "SINGLE_COMMIT" | "SMALL_BATCH" | "MEDIUM_BATCH" | "LARGE_BATCH" | "VERY_LARGE_BATCH";

export type DeploymentFrequencyStats = {
  totalDeployments: number;
  daysSpan: number;
  deploymentsPerDay: number;
  deploymentsPerWeek: number;
  deploymentsPerMonth: number;
  avgDaysBetweenDeployments: number;
  minDaysBetween: number;
  maxDaysBetween: number;
  daysSinceLastDeployment: number | null;
  frequencyCategory: FrequencyCategory;
};

export type DeploymentStability = {
  consistencyScore: number;
  coefficientOfVariation: number;
  stdDeviationDays: number;
  deploymentPredictability: Predictability;
  longestGapDays: number;
  shortestGapDays: number;
};

export type DeploymentPatterns = {
  byHourOfDay: { hour: number; count: number }[];
  byDayOfWeek: { weekday: string; count: number }[];
  byMonth: { month: string; count: number }[];
  byDeploymentType: Record<DeploymentType, number>;
  peakDeploymentHour: number | null;
  peakDeploymentDay: string | null;
  workingHoursRatio: number;
  weekdayRatio: number;
};

export type DeploymentTrends = {
  monthlyCounts: { month: string; count: number }[];
  trendDirection: "increasing" | "decreasing" | "stable";
  trendPercentage: number;
  mostActiveMonth: string | null;
  leastActiveMonth: string | null;
};

export type DeploymentQuality = {
  commitsPerDeployment: number;
  deploymentVelocity: DeploymentVelocity;
  batchSizeCategory: BatchSizeCategory;
  apparentSuccesses: number;
  apparentFailures: number;
  successRate: number;
  deploymentEfficiency: number;
};

export type DeploymentFrequencySummary = {
  mainBranch: string;
  overall: DeploymentFrequencyStats;
  stability: DeploymentStability;
  patterns: DeploymentPatterns | null;
  trends: DeploymentTrends | null;
  quality: DeploymentQuality | null;
};

export const isMergeCommit = (subject: string): boolean => {
  const trimmed = subject.trim();
  return MERGE_PATTERNS.some((pattern) => pattern.test(trimmed));
};

/** First branch whose name contains a main-like name; "main" when none does. */
export const resolveMainBranch = (branches: readonly string[], config: DeploymentConfig): string =>
  branches.find((branch) => config.mainBranchNames.some((name) => branch.includes(name))) ?? "main";

const tagDeployment = (tag: Tag): Deployment => ({
  type: "production_release",
  identifier: tag.name,
  deployedAt: toIsoString(tag.timestamp),
  timestamp: tag.timestamp,
  utcOffsetMinutes: tag.utcOffsetMinutes,
  commitHash: tag.commitHash,
  method: "tag",
  message: null,
});

const mergeDeployment = (commit: Commit): Deployment => ({
  type: "merge_deployment",
  identifier: commit.hash.slice(0, 8),
  deployedAt: toIsoString(commit.timestamp),
  timestamp: commit.timestamp,
  utcOffsetMinutes: commit.utcOffsetMinutes,
  commitHash: commit.hash,
  method: "merge",
  message: commit.subject,
});

/**
 * One deployment per local calendar day: the first production tag of the day, otherwise
 * the latest merge. The result is newest first.
 */
export const dedupeDeploymentsByDay = (deployments: readonly Deployment[]): Deployment[] => {
  const byDay = new Map<string, Deployment[]>();
  for (const deployment of deployments) {
    const day = toLocalTime(deployment.timestamp, deployment.utcOffsetMinutes).date;
    const group = byDay.get(day) ?? [];
    group.push(deployment);
    byDay.set(day, group);
  }

  const unique: Deployment[] = [];
  for (const group of byDay.values()) {
    const release = group.find((deployment) => deployment.type === "production_release");
    if (release !== undefined) {
      unique.push(release);
      continue;
    }

    const merges = group.filter((deployment) => deployment.type === "merge_deployment");
    const latest = merges[indexOfFirstMax(merges, (deployment) => deployment.timestamp)];
    if (latest !== undefined) {
      unique.push(latest);
    }
  }

  return unique.sort((a, b) => b.timestamp - a.timestamp);
};

export const identifyDeployments = (
  tags: readonly Tag[],
  commits: readonly Commit[],
  matcher: ProductionTagMatcher,
): Deployment[] => {
  const deployments = [
    ...matcher.filterProductionTags(tags).map(tagDeployment),
    ...commits.filter((commit) => isMergeCommit(commit.subject)).map(mergeDeployment),
  ];

  return dedupeDeploymentsByDay(deployments);
};

export const frequencyCategory = (deploymentsPerWeek: number): FrequencyCategory => {
  if (deploymentsPerWeek === 0) {
    return "none";
  }

  if (deploymentsPerWeek <= 0.25) {
    return "low";
  }

  if (deploymentsPerWeek <= 1) {
    return "moderate";
  }

  return deploymentsPerWeek <= 3 ? "high" : "very_high";
};

export const predictability = (consistencyScore: number): Predictability => {
  if (consistencyScore >= 0.8) {
    return "highly_predictable";
  }

  if (consistencyScore >= 0.6) {
    return "moderately_predictable";
  }

  return consistencyScore >= 0.4 ? "somewhat_predictable" : "unpredictable";
};

const velocity = (commitsPerDeployment: number): DeploymentVelocity => {
  if (commitsPerDeployment <= 5) {
    return "small_batches";
  }

  if (commitsPerDeployment <= 20) {
    return "medium_batches";
  }

  return commitsPerDeployment <= 50 ? "large_batches" : "very_large_batches";
};

const batchSize = (commitsPerDeployment: number): BatchSizeCategory => {
  if (commitsPerDeployment <= 1) {
    return "SINGLE_COMMIT";
  }

  if (commitsPerDeployment <= 5) {
    return "SMALL_BATCH";
  }

  if (commitsPerDeployment <= 15) {
    return "MEDIUM_BATCH";
  }

  return commitsPerDeployment <= 30 ? "LARGE_BATCH" : "VERY_LARGE_BATCH";
};

/** Gaps between consecutive deployments in days, oldest first. */
export const deploymentIntervals = (timestamps: readonly number[]): number[] => {
  const sorted = [...timestamps].sort((a, b) => a - b);
  const intervals: number[] = [];
  for (let index = 1; index < sorted.length; index += 1) {
    intervals.push(round2(secondsToDays((sorted[index] ?? 0) - (sorted[index - 1] ?? 0))));
  }

  return intervals;
};

const frequencyStats = (deployments: readonly Deployment[], window: TimeWindow): DeploymentFrequencyStats => {
  if (deployments.length === 0) {
    return {
      totalDeployments: 0,
      daysSpan: 0,
      deploymentsPerDay: 0,
      deploymentsPerWeek: 0,
      deploymentsPerMonth: 0,
      avgDaysBetweenDeployments: 0,
      minDaysBetween: 0,
      maxDaysBetween: 0,
      daysSinceLastDeployment: null,
      frequencyCategory: "none",
    };
  }

  const timestamps = deployments.map((deployment) => deployment.timestamp);
  const first = minOf(timestamps);
  const last = maxOf(timestamps);
  const daysSpan = Math.max(round1(secondsToDays(last - first)), 1);
  const deploymentsPerDay = round3(deployments.length / daysSpan);
  const deploymentsPerWeek = round2(deploymentsPerDay * 7);
  const intervals = deploymentIntervals(timestamps);

  return {
    totalDeployments: deployments.length,
    daysSpan,
    deploymentsPerDay,
    deploymentsPerWeek,
    deploymentsPerMonth: round2(deploymentsPerDay * 30),
    avgDaysBetweenDeployments: round2(average(intervals)),
    minDaysBetween: minOf(intervals),
    maxDaysBetween: maxOf(intervals),
    daysSinceLastDeployment: round1(secondsToDays(window.end - last)),
    frequencyCategory: frequencyCategory(deploymentsPerWeek),
  };
};

export const deploymentStability = (deployments: readonly Deployment[]): DeploymentStability => {
  const intervals = deploymentIntervals(deployments.map((deployment) => deployment.timestamp));
  if (intervals.length === 0) {
    return {
      consistencyScore: 0,
      coefficientOfVariation: 0,
      stdDeviationDays: 0,
      deploymentPredictability: "unknown",
      longestGapDays: 0,
      shortestGapDays: 0,
    };
  }

  const variation = coefficientOfVariation(intervals);
  const consistencyScore = round3(Math.max(1 - variation, 0));

  return {
    consistencyScore,
    coefficientOfVariation: round3(variation),
    stdDeviationDays: round2(populationStandardDeviation(intervals)),
    deploymentPredictability: predictability(consistencyScore),
    longestGapDays: maxOf(intervals),
    shortestGapDays: minOf(intervals),
  };
};

const countBy = <T>(items: readonly T[], keyOf: (item: T) => string): Map<string, number> => {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = keyOf(item);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  return counts;
};

const deploymentMonth = (deployment: Deployment): string =>
  toLocalTime(deployment.timestamp, deployment.utcOffsetMinutes).date.slice(0, 7);

export const deploymentPatterns = (deployments: readonly Deployment[]): DeploymentPatterns | null => {
  if (deployments.length === 0) {
    return null;
  }

  const local = deployments.map((deployment) => toLocalTime(deployment.timestamp, deployment.utcOffsetMinutes));
  const hourCounts = countBy(local, (time) => String(time.hour));
  const dayCounts = countBy(local, (time) => time.weekdayName);
  const hourEntries = [...hourCounts.entries()];
  const dayEntries = [...dayCounts.entries()];
  const peakHour = hourEntries[indexOfFirstMax(hourEntries, ([, count]) => count)];
  const peakDay = dayEntries[indexOfFirstMax(dayEntries, ([, count]) => count)];

  // Working hours here are 09:00 through 18:59, matching hour buckets 9..18.
  const workingHourDeployments = local.filter((time) => time.hour >= 9 && time.hour <= 18).length;
  const weekdayDeployments = local.filter((time) => isWeekday(time.weekday)).length;

  return {
    byHourOfDay: hourEntries
      .map(([hour, count]) => ({ hour: Number(hour), count }))
      .sort((a, b) => a.hour - b.hour),
    byDayOfWeek: WEEKDAY_NAMES.map((weekday) => ({ weekday, count: dayCounts.get(weekday) ?? 0 })),
    byMonth: [...countBy(deployments, deploymentMonth).entries()]
      .map(([month, count]) => ({ month, count }))
      .sort((a, b) => (a.month < b.month ? -1 : a.month > b.month ? 1 : 0)),
    byDeploymentType: {
      production_release: deployments.filter((deployment) => deployment.type === "production_release").length,
      merge_deployment: deployments.filter((deployment) => deployment.type === "merge_deployment").length,
    },
    peakDeploymentHour: peakHour === undefined ? null : Number(peakHour[0]),
    peakDeploymentDay: peakDay?.[0] ?? null,
    workingHoursRatio: round3(workingHourDeployments / deployments.length),
    weekdayRatio: round3(weekdayDeployments / deployments.length),
  };
};

const deploymentTrends = (deployments: readonly Deployment[]): DeploymentTrends | null => {
  if (deployments.length < MIN_DEPLOYMENTS_FOR_TRENDS) {
    return null;
  }

  const monthlyCounts = [...countBy(deployments, deploymentMonth).entries()]
    .map(([month, count]) => ({ month, count }))
    .sort((a, b) => (a.month < b.month ? -1 : a.month > b.month ? 1 : 0));
  if (monthlyCounts.length < MIN_MONTHS_FOR_TRENDS) {
    return null;
  }

  const counts = monthlyCounts.map((entry) => entry.count);
  const half = Math.floor(counts.length / 2);
  const firstAverage = average(counts.slice(0, half));
  const secondAverage = average(counts.slice(counts.length - half));

  let trendDirection: DeploymentTrends["trendDirection"] = "stable";
  if (firstAverage !== 0 && Math.abs(secondAverage - firstAverage) >= 0.1) {
    trendDirection = secondAverage > firstAverage ? "increasing" : "decreasing";
  }

  const most = monthlyCounts[indexOfFirstMax(monthlyCounts, (entry) => entry.count)];
  const least = monthlyCounts[indexOfFirstMax(monthlyCounts, (entry) => -entry.count)];

  return {
    monthlyCounts,
    trendDirection,
    trendPercentage: firstAverage > 0 ? round1(((secondAverage - firstAverage) / firstAverage) * 100) : 0,
    mostActiveMonth: most?.month ?? null,
    leastActiveMonth: least?.month ?? null,
  };
};

const containsKeyword = (message: string, keywords: readonly string[]): boolean =>
  keywords.some((keyword) => message.includes(keyword));

export const deploymentQuality = (
  deployments: readonly Deployment[],
  commitCount: number,
): DeploymentQuality | null => {
  if (deployments.length === 0 || commitCount === 0) {
    return null;
  }

  const commitsPerDeployment = commitCount / deployments.length;
  const messages = deployments.map((deployment) => (deployment.message ?? "").toLowerCase());
  const apparentSuccesses = messages.filter((message) => containsKeyword(message, SUCCESS_KEYWORDS)).length;
  const apparentFailures = messages.filter((message) => containsKeyword(message, FAILURE_KEYWORDS)).length;
  const withIndicators = apparentSuccesses + apparentFailures;
  const successRate =
    withIndicators > 0
      ? round2((apparentSuccesses / withIndicators) * 100)
      : round2(((deployments.length - apparentFailures) / deployments.length) * 100);

  const deploymentsPerWeek = round3(deployments.length / (commitCount / 7));
  const frequencyScore = Math.min(deploymentsPerWeek, 5) / 5;
  const batchScore = Math.min(20 / Math.max(commitsPerDeployment, 1), 1);

  return {
    commitsPerDeployment: round2(commitsPerDeployment),
    deploymentVelocity: velocity(round2(commitsPerDeployment)),
    batchSizeCategory: batchSize(round2(commitsPerDeployment)),
    apparentSuccesses,
    apparentFailures,
    successRate,
    deploymentEfficiency: round3((frequencyScore + batchScore) / 2),
  };
};

export const computeDeploymentFrequency = (
  input: { tags: readonly Tag[]; commits: readonly Commit[]; branches: readonly string[]; timeWindow: TimeWindow },
  config: DeploymentConfig,
  matcher: ProductionTagMatcher = createProductionTagMatcher(),
): { value: TableValue<Deployment>; summary: DeploymentFrequencySummary } => {
  const { timeWindow } = input;
  const tagsInWindow = input.tags.filter((tag) => tag.timestamp >= timeWindow.start && tag.timestamp <= timeWindow.end);
  const deployments = identifyDeployments(tagsInWindow, input.commits, matcher);

  return {
    value: { kind: "table", rows: deployments },
    summary: {
      mainBranch: resolveMainBranch(input.branches, config),
      overall: frequencyStats(deployments, timeWindow),
      stability: deploymentStability(deployments),
      patterns: deploymentPatterns(deployments),
      trends: deploymentTrends(deployments),
      quality: deploymentQuality(deployments, input.commits.length),
    },
  };
};

export const deploymentFrequencyMetric: MetricDefinition<TableValue<Deployment>, DeploymentFrequencySummary> = {
  name: "deployment_frequency",
  category: "flow",
  description: "Production deployments from release tags and merges, newest first",
  dataPointsLabel: "deployments",
  sources: ["commits", "tags", "branches"],
  requiresMergeCommits: true,
  compute: (input, config) => {
    const result = computeDeploymentFrequency(input, config.deployment);
    return { ...result, dataPoints: result.value.rows.length };
  },
};
