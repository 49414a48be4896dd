import type { Commit, DistributionValue } from "@repometrics/core";
import type { CommitSizeConfig, MetricsConfig } from "../../config.js";
import { average, maxOf, median, minOf, percentage, round1, round2, sum } from "../math.js";
import type { MetricDefinition } from "../metric-types.js";

export type CommitSizeBucket = "small" | "medium" | "large" | "huge";

export type CommitSizeSummary = {
  totalCommits: number;
  averageSize: number;
  medianSize: number;
  minSize: number;
  maxSize: number;
  distributionPercentages: Record<CommitSizeBucket, number>;
  totalLinesChanged: number;
  totalAdditions: number;
  totalDeletions: number;
  netLines: number;
  filesPerCommit: number;
};

export const classifyCommitSize = (size: number, thresholds: CommitSizeConfig): CommitSizeBucket => {
  if (size <= thresholds.smallMax) {
    return "small";
  }

  if (size <= thresholds.mediumMax) {
    return "medium";
  }

  return size <= thresholds.largeMax ? "large" : "huge";
};

export const computeCommitSize = (
  commits: readonly Commit[],
  config: MetricsConfig,
): { value: DistributionValue; summary: CommitSizeSummary } => {
  const counts: Record<CommitSizeBucket, number> = { small: 0, medium: 0, large: 0, huge: 0 };
  const sizes = commits.map((commit) => commit.additions + commit.deletions);

  for (const size of sizes) {
    counts[classifyCommitSize(size, config.commitSize)] += 1;
  }

  const totalAdditions = sum(commits.map((commit) => commit.additions));
  const totalDeletions = sum(commits.map((commit) => commit.deletions));
  const bucketPercentage = (bucket: CommitSizeBucket): number => round1(percentage(counts[bucket], sizes.length));

  return {
    value: {
      kind: "distribution",
      buckets:
        sizes.length === 0
          ? []
          : (["small", "medium", "large", "huge"] as const).map((bucket) => ({ bucket, count: counts[bucket] })),
    },
    summary: {
      totalCommits: commits.length,
      averageSize: round2(average(sizes)),
      medianSize: round2(median(sizes)),
      minSize: minOf(sizes),
      maxSize: maxOf(sizes),
      distributionPercentages: {
        small: bucketPercentage("small"),
        medium: bucketPercentage("medium"),
        large: bucketPercentage("large"),
        huge: bucketPercentage("huge"),
      },
      totalLinesChanged: totalAdditions + totalDeletions,
      totalAdditions,
      totalDeletions,
      netLines: totalAdditions - totalDeletions,
      filesPerCommit: round2(average(commits.map((commit) => commit.fileChanges.length))),
    },
  };
};

export const commitSizeMetric: MetricDefinition<DistributionValue, CommitSizeSummary> = {
  name: "commit_size",
  category: "commit_activity",
  description: "Distribution of lines changed per commit",
  dataPointsLabel: "commits",
  sources: ["commit_stats"],
  requiresMergeCommits: false,
  compute: ({ commits }, config) => ({
    ...computeCommitSize(commits, config),
    dataPoints: commits.length,
  }),
};
