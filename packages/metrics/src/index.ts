export {
  DEFAULT_METRICS_CONFIG,
  mergeMetricsConfig,
  type CoChangeConfig,
  type CommitSizeConfig,
  type DeploymentConfig,
  type FileChurnConfig,
  type LeadTimeConfig,
  type MetricsConfig,
  type MetricsConfigOverrides,
  type ReliabilityConfig,
  type WorkingHoursConfig,
} from "./config.js";
export type { MetricComputation, MetricDefinition, MetricInput, MetricSource } from "./domain/metric-types.js";
export {
  METRIC_CATEGORIES,
  UnknownMetricError,
  findMetric,
  isMetricCategory,
  listMetrics,
  metricsForCategory,
  resolveMetricNames,
} from "./application/metric-registry.js";
export {
  HistorySnapshot,
  attemptComputation,
  runMetric,
  runMetrics,
  type MetricRunContext,
  type MetricsRunProgressEvent,
  type MetricsRunRequest,
  type RunMetricsDependencies,
} from "./application/run-metrics.js";
export { filterCommits, filterContributors, isBotIdentity, type CommitFilterOptions } from "./application/analysis-filters.js";
export {
  PRODUCTION_TAG_PATTERNS,
  createProductionTagMatcher,
  type ProductionTagMatcher,
} from "./domain/production-tag-matcher.js";
export { median, percentile, populationStandardDeviation } from "./domain/math.js";

export { computeCommitFrequency, type CommitFrequencySummary } from "./domain/commit-activity/commit-frequency.js";
export { classifyCommitSize, computeCommitSize, type CommitSizeSummary } from "./domain/commit-activity/commit-size.js";
export {
  computeCommitsPerDeveloper,
  type CommitsPerDeveloperSummary,
} from "./domain/commit-activity/commits-per-developer.js";
export { computeLinesChanged, type LinesChangedSummary } from "./domain/commit-activity/lines-changed.js";
export { computeAuthorsPerFile, type AuthorsPerFileSummary } from "./domain/code-churn/authors-per-file.js";
export { computeCoChangePairs, type CoChangePairsSummary } from "./domain/code-churn/co-change-pairs.js";
export { computeFileChurn, type FileChurnSummary } from "./domain/code-churn/file-churn.js";
export { computeFileOwnership, type FileOwnershipSummary } from "./domain/code-churn/file-ownership.js";
export { classifyCommitMessage, type CommitKind } from "./domain/reliability/commit-classifier.js";
export { computeBugfixRatio, type BugfixRatioSummary } from "./domain/reliability/bugfix-ratio.js";
export { computeLargeCommits, type LargeCommitsSummary } from "./domain/reliability/large-commits.js";
export { computeRevertRate, type RevertRateSummary } from "./domain/reliability/revert-rate.js";
export {
  computeDeploymentFrequency,
  identifyDeployments,
  isMergeCommit,
  type Deployment,
  type DeploymentFrequencySummary,
} from "./domain/flow/deployment-frequency.js";
export { computeLeadTime, type LeadTimeSummary } from "./domain/flow/lead-time.js";
