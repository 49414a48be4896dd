import type { Commit, TableValue } from "@repometrics/core";
import type { FileChurnConfig, MetricsConfig } from "../../config.js";
import { percentage, round1, round2 } from "../math.js";
import type { MetricDefinition } from "../metric-types.js";

export type FileChurnRow = {
  filename: string;
  totalChurn: number;
  additions: number;
  deletions: number;
  netChanges: number;
  commits: number;
  authorsCount: number;
  authors: string[];
  avgChurnPerCommit: number;
  churnRatio: number;
};

export type FileChurnSummary = {
  totalFilesChanged: number;
  totalFileChanges: number;
  avgChangesPerFile: number;
  highChurnFiles: number;
  mediumChurnFiles: number;
  lowChurnFiles: number;
  hotspotPercentage: number;
};

type FileAccumulator = {
  additions: number;
  deletions: number;
  commits: number;
  authors: Set<string>;
};

export type ChurnLevel = "high" | "medium" | "low";

export const classifyChurn = (totalChurn: number, thresholds: FileChurnConfig): ChurnLevel => {
  if (totalChurn > thresholds.highChurnThreshold) {
    return "high";
  }

  return totalChurn > thresholds.mediumChurnThreshold ? "medium" : "low";
};

export const computeFileChurn = (
  commits: readonly Commit[],
  config: MetricsConfig,
): { value: TableValue<FileChurnRow>; summary: FileChurnSummary } => {
  const files = new Map<string, FileAccumulator>();
  let totalFileChanges = 0;

  for (const commit of commits) {
    for (const change of commit.fileChanges) {
      const stats = files.get(change.filename) ?? { additions: 0, deletions: 0, commits: 0, authors: new Set<string>() };
      stats.additions += change.additions;
      stats.deletions += change.deletions;
      stats.commits += 1;
      stats.authors.add(commit.authorName);
      files.set(change.filename, stats);
      totalFileChanges += 1;
    }
  }

  const rows: FileChurnRow[] = [...files.entries()]
    .map(([filename, stats]) => {
      const totalChurn = stats.additions + stats.deletions;
      return {
        filename,
        totalChurn,
        additions: stats.additions,
        deletions: stats.deletions,
        netChanges: stats.additions - stats.deletions,
        commits: stats.commits,
        authorsCount: stats.authors.size,
        authors: [...stats.authors],
        avgChurnPerCommit: stats.commits > 0 ? round2(totalChurn / stats.commits) : 0,
        churnRatio: round1(percentage(stats.deletions, totalChurn)),
      };
    })
    .sort((a, b) => b.totalChurn - a.totalChurn);

  const levels: Record<ChurnLevel, number> = { high: 0, medium: 0, low: 0 };
  for (const row of rows) {
    levels[classifyChurn(row.totalChurn, config.fileChurn)] += 1;
  }

  return {
    value: { kind: "table", rows },
    summary: {
      totalFilesChanged: rows.length,
      totalFileChanges,
      avgChangesPerFile: rows.length > 0 ? round2(totalFileChanges / rows.length) : 0,
      highChurnFiles: levels.high,
      mediumChurnFiles: levels.medium,
      lowChurnFiles: levels.low,
      hotspotPercentage: round1(percentage(levels.high, rows.length)),
    },
  };
};

export const fileChurnMetric: MetricDefinition<TableValue<FileChurnRow>, FileChurnSummary> = {
  name: "file_churn",
  category: "code_churn",
  description: "Lines added and deleted per file, highest churn first",
  dataPointsLabel: "files",
  sources: ["commit_stats"],
  requiresMergeCommits: false,
  compute: ({ commits }, config) => {
    const result = computeFileChurn(commits, config);
    return { ...result, dataPoints: result.value.rows.length };
  },
};
