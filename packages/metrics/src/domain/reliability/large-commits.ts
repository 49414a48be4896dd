import type { Commit, TableValue } from "@repometrics/core";
import type { ReliabilityConfig } from "../../config.js";
import { toIsoString } from "../calendar.js";
import {
  average,
  indexOfFirstMax,
  maxOf,
  minOf,
  percentage,
  percentile,
  populationStandardDeviation,
  round1,
  round2,
} from "../math.js";
import type { MetricDefinition } from "../metric-types.js";

const LINES_PER_FILE = 10;

export type SizeThresholds = {
  small: number;
  medium: number;
  large: number;
  huge: number;
};

export const DEFAULT_SIZE_THRESHOLDS: SizeThresholds = { small: 50, medium: 200, large: 500, huge: 1000 };

export type LargeCommitRow = {
  hash: string;
  author: string;
  committedAt: string;
  subject: string;
  size: number;
  additions: number;
  deletions: number;
  filesChanged: number;
  severity: "large" | "huge";
};

export type AuthorLargeCommitStats = {
  author: string;
  totalCommits: number;
  largeCommits: number;
  hugeCommits: number;
  avgCommitSize: number;
  maxCommitSize: number;
  largeCommitRatio: number;
  riskScore: number;
};

export type SizeDistributionStats = {
  min: number;
  max: number;
  median: number;
  p75: number;
  p90: number;
  p95: number;
  p99: number;
  stdDeviation: number;
};

export type LargeCommitsSummary = {
  totalCommits: number;
  largeCommits: number;
  hugeCommits: number;
  largeCommitRatio: number;
  hugeCommitRatio: number;
  riskScore: number;
  avgCommitSize: number;
  thresholds: SizeThresholds;
  sizeDistribution: SizeDistributionStats | null;
  byAuthor: AuthorLargeCommitStats[];
  highRiskAuthors: number;
  largestCommitAuthor: string | null;
};

/** Lines touched plus a fixed weight per file, so wide commits rank above narrow ones. */
export const weightedCommitSize = (commit: Commit): number =>
  commit.additions + commit.deletions + commit.fileChanges.length * LINES_PER_FILE;

/** Thresholds are taken from the repository's own size percentiles (25, 50, 75, 90). */
export const sizeThresholds = (sizes: readonly number[]): SizeThresholds =>
  sizes.length === 0
    ? DEFAULT_SIZE_THRESHOLDS
    : {
        small: percentile(sizes, 25),
        medium: percentile(sizes, 50),
        large: percentile(sizes, 75),
        huge: percentile(sizes, 90),
      };

/** Huge commits weigh three times a large one; 100 means every commit is huge. */
export const sizeRiskScore = (large: number, huge: number, total: number): number =>
  total === 0 ? 0 : round2(((large + huge * 3) / (total * 3)) * 100);

const ratio = (count: number, total: number): number => round2(percentage(count, total));

const authorStats = (
  commits: readonly Commit[],
  sizes: readonly number[],
  thresholds: SizeThresholds,
): AuthorLargeCommitStats[] => {
  const byAuthor = new Map<string, number[]>();
  commits.forEach((commit, index) => {
    const authorSizes = byAuthor.get(commit.authorName) ?? [];
    authorSizes.push(sizes[index] ?? 0);
    byAuthor.set(commit.authorName, authorSizes);
  });

  return [...byAuthor.entries()]
    .map(([author, authorSizes]): AuthorLargeCommitStats => {
      const hugeCommits = authorSizes.filter((size) => size >= thresholds.huge).length;
      const largeCommits = authorSizes.filter((size) => size >= thresholds.large).length;

      return {
        author,
        totalCommits: authorSizes.length,
        largeCommits,
        hugeCommits,
        avgCommitSize: round1(average(authorSizes)),
        maxCommitSize: maxOf(authorSizes),
        largeCommitRatio: ratio(largeCommits, authorSizes.length),
        riskScore: sizeRiskScore(largeCommits, hugeCommits, authorSizes.length),
      };
    })
    .sort((left, right) => right.riskScore - left.riskScore);
};

const sizeDistribution = (sizes: readonly number[]): SizeDistributionStats | null => {
  if (sizes.length === 0) {
    return null;
  }

  return {
    min: minOf(sizes),
    max: maxOf(sizes),
    median: percentile(sizes, 50),
    p75: percentile(sizes, 75),
    p90: percentile(sizes, 90),
    p95: percentile(sizes, 95),
    p99: percentile(sizes, 99),
    stdDeviation: round2(populationStandardDeviation(sizes)),
  };
};

export const computeLargeCommits = (
  commits: readonly Commit[],
  config: ReliabilityConfig,
): { value: TableValue<LargeCommitRow>; summary: LargeCommitsSummary } => {
  const sizes = commits.map(weightedCommitSize);
  const thresholds = sizeThresholds(sizes);

  // Huge commits are counted as large too.
  const rows = commits
    .map((commit, index): LargeCommitRow | null => {
      const size = sizes[index] ?? 0;
      if (size < thresholds.large) {
        return null;
      }

      return {
        hash: commit.hash,
        author: commit.authorName,
        committedAt: toIsoString(commit.timestamp),
        subject: commit.subject,
        size,
        additions: commit.additions,
        deletions: commit.deletions,
        filesChanged: commit.fileChanges.length,
        severity: size >= thresholds.huge ? "huge" : "large",
      };
    })
    .filter((row): row is LargeCommitRow => row !== null)
    .sort((left, right) => right.size - left.size);

  const largeCommits = rows.length;
  const hugeCommits = rows.filter((row) => row.severity === "huge").length;
  const byAuthor = authorStats(commits, sizes, thresholds);

  return {
    value: { kind: "table", rows },
    summary: {
      totalCommits: commits.length,
      largeCommits,
      hugeCommits,
      largeCommitRatio: ratio(largeCommits, commits.length),
      hugeCommitRatio: ratio(hugeCommits, commits.length),
      riskScore: sizeRiskScore(largeCommits, hugeCommits, commits.length),
      avgCommitSize: round1(average(sizes)),
      thresholds,
      sizeDistribution: sizeDistribution(sizes),
      byAuthor,
      highRiskAuthors: byAuthor.filter((entry) => entry.riskScore > config.highRiskAuthorScore).length,
      largestCommitAuthor: byAuthor[indexOfFirstMax(byAuthor, (entry) => entry.maxCommitSize)]?.author ?? null,
    },
  };
};

export const largeCommitsMetric: MetricDefinition<TableValue<LargeCommitRow>, LargeCommitsSummary> = {
  name: "large_commits",
  category: "reliability",
  description: "Commits that are unusually large for this repository",
  dataPointsLabel: "commits",
  sources: ["commit_stats"],
  requiresMergeCommits: false,
  compute: ({ commits }, config) => ({
    ...computeLargeCommits(commits, config.reliability),
    dataPoints: commits.length,
  }),
};
