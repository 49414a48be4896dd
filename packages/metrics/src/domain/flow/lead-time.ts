import type { Commit, TableValue, Tag } from "@repometrics/core";
import type { LeadTimeConfig } from "../../config.js";
import { toIsoString, toLocalTime } from "../calendar.js";
import {
  average,
  indexOfFirstMax,
  maxOf,
  median,
  minOf,
  percentage,
  percentile,
  round1,
  round2,
  round3,
} from "../math.js";
import type { MetricDefinition } from "../metric-types.js";
import { createProductionTagMatcher, type ProductionTagMatcher } from "../production-tag-matcher.js";

const SECONDS_PER_HOUR = 3600;
const BOTTLENECK_SAMPLE_SIZE = 20;
const RELEASE_SAMPLE_SIZE = 10;
const MIN_COMMITS_FOR_TRENDS = 10;

export type CommitLeadTime = {
  hash: string;
  author: string;
  committedAt: string;
  leadTimeHours: number;
  leadTimeDays: number;
  deployedInRelease: string;
  deploymentDate: string;
};

export type SpeedCategories = {
  veryFast: number;
  fast: number;
  moderate: number;
  slow: number;
  verySlow: number;
};

export type LeadTimeDistribution = {
  quartiles: { q1: number; q2: number; q3: number };
  percentiles: { p50: number; p75: number; p90: number; p95: number; p99: number };
  categories: SpeedCategories;
  outliers: number[];
};

export type AuthorLeadTime = {
  author: string;
  totalCommits: number;
  commitsDeployed: number;
  avgLeadTimeHours: number | null;
  medianLeadTimeHours: number | null;
  minLeadTimeHours: number | null;
  maxLeadTimeHours: number | null;
  deploymentRate: number;
};

export type BottleneckAnalysis = {
  p95ThresholdHours: number;
  highLeadTimeCommits: string[];
  bottleneckAuthors: { author: string; commits: number }[];
};

export type TrendDirection = "improving" | "deteriorating" | "stable";

export type LeadTimeTrends = {
  monthlyAverages: { month: string; avgLeadTimeHours: number }[];
  trendDirection: TrendDirection;
  improvementRate: number;
};

export type LeadTimeSummary = {
  totalCommits: number;
  commitsWithLeadTime: number;
  avgLeadTimeHours: number;
  medianLeadTimeHours: number;
  p95LeadTimeHours: number;
  minLeadTimeHours: number;
  maxLeadTimeHours: number;
  flowEfficiency: number;
  distribution: LeadTimeDistribution | null;
  byAuthor: AuthorLeadTime[];
  fastAuthors: number;
  slowestAuthor: string | null;
  productionReleases: string[];
  bottlenecks: BottleneckAnalysis | null;
  bottleneckCount: number;
  trends: LeadTimeTrends | null;
};

export const speedCategories = (leadTimes: readonly number[]): SpeedCategories => {
  const categories: SpeedCategories = { veryFast: 0, fast: 0, moderate: 0, slow: 0, verySlow: 0 };

  for (const hours of leadTimes) {
    if (hours <= 4) {
      categories.veryFast += 1;
    } else if (hours <= 24) {
      categories.fast += 1;
    } else if (hours <= 168) {
      categories.moderate += 1;
    } else if (hours <= 672) {
      categories.slow += 1;
    } else {
      categories.verySlow += 1;
    }
  }

  return categories;
};

/** Values outside 1.5 IQR of the quartiles; needs at least four samples. */
export const iqrOutliers = (values: readonly number[]): number[] => {
  if (values.length < 4) {
    return [];
  }

  const sorted = [...values].sort((a, b) => a - b);
  const q1 = percentile(sorted, 25);
  const q3 = percentile(sorted, 75);
  const iqr = q3 - q1;
  const lower = q1 - 1.5 * iqr;
  const upper = q3 + 1.5 * iqr;
  return sorted.filter((value) => value < lower || value > upper);
};

export const flowEfficiency = (leadTimes: readonly number[], thresholdHours: number): number => {
  if (leadTimes.length === 0) {
    return 1;
  }

  return round3(leadTimes.filter((hours) => hours <= thresholdHours).length / leadTimes.length);
};

/**
 * Pairs each commit with the earliest production release tagged strictly after it.
 * Commits with no later release are left out.
 */
export const commitLeadTimes = (
  commits: readonly Commit[],
  tags: readonly Tag[],
  matcher: ProductionTagMatcher,
): CommitLeadTime[] => {
  const releases = matcher.filterProductionTags(tags).sort((a, b) => a.timestamp - b.timestamp);
  if (releases.length === 0) {
    return [];
  }

  const rows: CommitLeadTime[] = [];
  for (const commit of commits) {
    const release = releases.find((candidate) => candidate.timestamp > commit.timestamp);
    if (release === undefined) {
      continue;
    }

    const leadTimeHours = round2((release.timestamp - commit.timestamp) / SECONDS_PER_HOUR);
    rows.push({
      hash: commit.hash,
      author: commit.authorName,
      committedAt: toIsoString(commit.timestamp),
      leadTimeHours,
      leadTimeDays: round2(leadTimeHours / 24),
      deployedInRelease: release.name,
      deploymentDate: toIsoString(release.timestamp),
    });
  }

  return rows;
};

const authorLeadTimes = (commits: readonly Commit[], rows: readonly CommitLeadTime[]): AuthorLeadTime[] => {
  const totals = new Map<string, number>();
  for (const commit of commits) {
    totals.set(commit.authorName, (totals.get(commit.authorName) ?? 0) + 1);
  }

  const deployed = new Map<string, number[]>();
  for (const row of rows) {
    const hours = deployed.get(row.author) ?? [];
    hours.push(row.leadTimeHours);
    deployed.set(row.author, hours);
  }

  const stats = [...totals.entries()].map(([author, totalCommits]): AuthorLeadTime => {
    const hours = deployed.get(author) ?? [];
    const hasDeployments = hours.length > 0;
    return {
      author,
      totalCommits,
      commitsDeployed: hours.length,
      avgLeadTimeHours: hasDeployments ? round2(average(hours)) : null,
      medianLeadTimeHours: hasDeployments ? round2(median(hours)) : null,
      minLeadTimeHours: hasDeployments ? minOf(hours) : null,
      maxLeadTimeHours: hasDeployments ? maxOf(hours) : null,
      deploymentRate: round2(percentage(hours.length, totalCommits)),
    };
  });

  return stats.sort((a, b) => {
    if (a.avgLeadTimeHours === null || b.avgLeadTimeHours === null) {
      return (a.avgLeadTimeHours === null ? 1 : 0) - (b.avgLeadTimeHours === null ? 1 : 0);
    }

    return a.avgLeadTimeHours - b.avgLeadTimeHours;
  });
};

const bottleneckAnalysis = (rows: readonly CommitLeadTime[]): BottleneckAnalysis | null => {
  if (rows.length === 0) {
    return null;
  }

  const threshold = percentile(
    rows.map((row) => row.leadTimeHours),
    95,
  );
  const slow = rows.filter((row) => row.leadTimeHours > threshold);
  const byAuthor = new Map<string, number>();
  for (const row of slow) {
    byAuthor.set(row.author, (byAuthor.get(row.author) ?? 0) + 1);
  }

  return {
    p95ThresholdHours: threshold,
    highLeadTimeCommits: slow.slice(0, BOTTLENECK_SAMPLE_SIZE).map((row) => row.hash),
    bottleneckAuthors: [...byAuthor.entries()]
      .map(([author, commits]) => ({ author, commits }))
      .sort((a, b) => b.commits - a.commits),
  };
};

const leadTimeTrends = (commits: readonly Commit[], rows: readonly CommitLeadTime[]): LeadTimeTrends | null => {
  if (rows.length < MIN_COMMITS_FOR_TRENDS) {
    return null;
  }

  const commitsByHash = new Map(commits.map((commit) => [commit.hash, commit]));
  const byMonth = new Map<string, number[]>();
  for (const row of rows) {
    const commit = commitsByHash.get(row.hash);
    if (commit === undefined) {
      continue;
    }

    const month = toLocalTime(commit.timestamp, commit.utcOffsetMinutes).date.slice(0, 7);
    const hours = byMonth.get(month) ?? [];
    hours.push(row.leadTimeHours);
    byMonth.set(month, hours);
  }

  const monthlyAverages = [...byMonth.entries()]
    .map(([month, hours]) => ({ month, avgLeadTimeHours: round2(average(hours)) }))
    .sort((a, b) => (a.month < b.month ? -1 : a.month > b.month ? 1 : 0));

  const averages = monthlyAverages.map((entry) => entry.avgLeadTimeHours);
  const half = Math.floor(averages.length / 2);
  let trendDirection: TrendDirection = "stable";
  if (averages.length >= 2) {
    const firstAverage = average(averages.slice(0, half));
    const secondAverage = average(averages.slice(averages.length - half));
    if (secondAverage < firstAverage * 0.9) {
      trendDirection = "improving";
    } else if (secondAverage > firstAverage * 1.1) {
      trendDirection = "deteriorating";
    }
  }

  const first = averages[0] ?? 0;
  const last = averages[averages.length - 1] ?? 0;
  const improvementRate = averages.length < 2 || first === 0 ? 0 : round1(((first - last) / first) * 100);

  return { monthlyAverages, trendDirection, improvementRate };
};

const leadTimeDistribution = (leadTimes: readonly number[]): LeadTimeDistribution | null => {
  if (leadTimes.length === 0) {
    return null;
  }

  return {
    quartiles: { q1: percentile(leadTimes, 25), q2: percentile(leadTimes, 50), q3: percentile(leadTimes, 75) },
    percentiles: {
      p50: percentile(leadTimes, 50),
      p75: percentile(leadTimes, 75),
      p90: percentile(leadTimes, 90),
      p95: percentile(leadTimes, 95),
      p99: percentile(leadTimes, 99),
    },
    categories: speedCategories(leadTimes),
    outliers: iqrOutliers(leadTimes),
  };
};

export const computeLeadTime = (
  commits: readonly Commit[],
  tags: readonly Tag[],
  config: LeadTimeConfig,
  matcher: ProductionTagMatcher = createProductionTagMatcher(),
): { value: TableValue<CommitLeadTime>; summary: LeadTimeSummary } => {
  const rows = commits.length === 0 ? [] : commitLeadTimes(commits, tags, matcher);
  const leadTimes = rows.map((row) => row.leadTimeHours);
  const byAuthor = authorLeadTimes(commits, rows);
  const deployedAuthors = byAuthor.filter((stats) => stats.avgLeadTimeHours !== null);
  const slowest = deployedAuthors[indexOfFirstMax(deployedAuthors, (stats) => stats.avgLeadTimeHours ?? 0)];
  const bottlenecks = bottleneckAnalysis(rows);
  const releases = matcher
    .filterProductionTags(tags)
    .sort((a, b) => b.timestamp - a.timestamp)
    .slice(0, RELEASE_SAMPLE_SIZE)
    .map((tag) => tag.name);

  return {
    value: { kind: "table", rows },
    summary: {
      totalCommits: commits.length,
      commitsWithLeadTime: rows.length,
      avgLeadTimeHours: round2(average(leadTimes)),
      medianLeadTimeHours: round2(median(leadTimes)),
      p95LeadTimeHours: percentile(leadTimes, 95),
      minLeadTimeHours: minOf(leadTimes),
      maxLeadTimeHours: maxOf(leadTimes),
      flowEfficiency: flowEfficiency(leadTimes, config.flowEfficiencyThresholdHours),
      distribution: leadTimeDistribution(leadTimes),
      byAuthor,
      fastAuthors: deployedAuthors.filter((stats) => (stats.avgLeadTimeHours ?? 0) < config.fastAuthorHours).length,
      slowestAuthor: slowest?.author ?? null,
      productionReleases: releases,
      bottlenecks,
      bottleneckCount: bottlenecks?.highLeadTimeCommits.length ?? 0,
      trends: leadTimeTrends(commits, rows),
    },
  };
};

export const leadTimeMetric: MetricDefinition<TableValue<CommitLeadTime>, LeadTimeSummary> = {
  name: "lead_time",
  category: "flow",
  description: "Hours from commit to the first production release that contains it",
  dataPointsLabel: "commits",
  sources: ["commits", "tags"],
  requiresMergeCommits: false,
  compute: ({ commits, tags }, config) => ({
    ...computeLeadTime(commits, tags, config.leadTime),
    dataPoints: commits.length,
  }),
};
