import type {
  Commit,
  Contributor,
  MetricCategory,
  MetricValue,
  Tag,
  TimeWindow,
} from "@repometrics/core";
import type { MetricsConfig } from "../config.js";

export type MetricSource = "commits" | "commit_stats" | "contributors" | "tags" | "branches";

/**
 * Records handed to a metric after filtering. Only the sources a metric declares are
 * loaded; the others stay empty.
 */
export type MetricInput = {
  commits: readonly Commit[];
  contributors: readonly Contributor[];
  tags: readonly Tag[];
  branches: readonly string[];
  timeWindow: TimeWindow;
};

export type MetricComputation<TValue extends MetricValue, TSummary extends object> = {
  value: TValue;
  dataPoints: number;
  summary: TSummary;
};

export type MetricDefinition<TValue extends MetricValue = MetricValue, TSummary extends object = object> = {
  name: string;
  category: MetricCategory;
  description: string;
  dataPointsLabel: string;
  sources: readonly MetricSource[];
  // Merge commits are kept for this metric even when the run excludes them.
  requiresMergeCommits: boolean;
  compute: (input: MetricInput, config: MetricsConfig) => MetricComputation<TValue, TSummary>;
};
