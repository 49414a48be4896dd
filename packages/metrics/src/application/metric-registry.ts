import type { MetricCategory } from "@repometrics/core";
import { coChangePairsMetric } from "../domain/code-churn/co-change-pairs.js";
import { authorsPerFileMetric } from "../domain/code-churn/authors-per-file.js";
import { fileChurnMetric } from "../domain/code-churn/file-churn.js";
import { fileOwnershipMetric } from "../domain/code-churn/file-ownership.js";
import { commitFrequencyMetric } from "../domain/commit-activity/commit-frequency.js";
import { commitSizeMetric } from "../domain/commit-activity/commit-size.js";
import { commitsPerDeveloperMetric } from "../domain/commit-activity/commits-per-developer.js";
import { linesChangedMetric } from "../domain/commit-activity/lines-changed.js";
import { deploymentFrequencyMetric } from "../domain/flow/deployment-frequency.js";
import { leadTimeMetric } from "../domain/flow/lead-time.js";
import type { MetricDefinition } from "../domain/metric-types.js";
import { bugfixRatioMetric } from "../domain/reliability/bugfix-ratio.js";
import { largeCommitsMetric } from "../domain/reliability/large-commits.js";
import { revertRateMetric } from "../domain/reliability/revert-rate.js";

export class UnknownMetricError extends Error {
  readonly metricName: string;

  constructor(metricName: string) {
    super(`Unknown metric: ${metricName}`);
    this.name = "UnknownMetricError";
    this.metricName = metricName;
  }
}

export const METRIC_CATEGORIES: Readonly<Record<MetricCategory, string>> = {
  commit_activity: "How often, how much and by whom code is committed",
  code_churn: "Where code changes concentrate and which files move together",
  reliability: "Fixes, reverts and oversized commits",
  flow: "How quickly commits reach production and how often it ships",
};

const METRICS: readonly MetricDefinition[] = [
  commitsPerDeveloperMetric,
  commitSizeMetric,
  commitFrequencyMetric,
  linesChangedMetric,
  fileChurnMetric,
  authorsPerFileMetric,
  fileOwnershipMetric,
  coChangePairsMetric,
  bugfixRatioMetric,
  revertRateMetric,
  largeCommitsMetric,
  leadTimeMetric,
  deploymentFrequencyMetric,
];

export const listMetrics = (): readonly MetricDefinition[] => METRICS;

export const findMetric = (name: string): MetricDefinition | undefined =>
  METRICS.find((metric) => metric.name === name);

export const metricsForCategory = (category: MetricCategory): readonly MetricDefinition[] =>
  METRICS.filter((metric) => metric.category === category);

export const isMetricCategory = (value: string): value is MetricCategory =>
  Object.prototype.hasOwnProperty.call(METRIC_CATEGORIES, value);

/**
 * Resolves the metrics to run. Explicit names keep the caller's order, duplicates
 * included; metrics of the requested categories not already named follow in registry
 * order. With neither, every metric runs.
 */
export const resolveMetricNames = (
  names: readonly string[] = [],
  categories: readonly MetricCategory[] = [],
): string[] => {
  for (const name of names) {
    if (findMetric(name) === undefined) {
      throw new UnknownMetricError(name);
    }
  }

  if (names.length === 0 && categories.length === 0) {
    return METRICS.map((metric) => metric.name);
  }

  const fromCategories = METRICS.filter(
    (metric) => categories.includes(metric.category) && !names.includes(metric.name),
  ).map((metric) => metric.name);
  return [...names, ...fromCategories];
};
