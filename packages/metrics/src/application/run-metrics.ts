import {
  createSilentLogger,
  DEFAULT_ANALYSIS_OPTIONS,
  describeError,
  ValidationError,
  type AnalysisOptions,
  type Commit,
  type ComputationResult,
  type Contributor,
  type Logger,
  type MetricCategory,
  type MetricResult,
  type MetricsRunReport,
  type RepositoryHistorySource,
  type Tag,
  type TimeWindow,
} from "@repometrics/core";
import { mergeMetricsConfig, type MetricsConfig, type MetricsConfigOverrides } from "../config.js";
import { round3 } from "../domain/math.js";
import type { MetricDefinition, MetricInput, MetricSource } from "../domain/metric-types.js";
import { filterCommits, filterContributors } from "./analysis-filters.js";
import { findMetric, resolveMetricNames, UnknownMetricError } from "./metric-registry.js";

export type MetricsRunRequest = {
  repository: string;
  timeWindow: TimeWindow;
  metrics?: readonly string[];
  categories?: readonly MetricCategory[];
  options?: Partial<AnalysisOptions>;
  config?: MetricsConfigOverrides;
};

export type MetricsRunProgressEvent =
  | { stage: "source_loaded"; source: MetricSource; records: number }
  | { stage: "metric_started"; metricName: string }
  | { stage: "metric_completed"; metricName: string; ok: boolean; executionTime: number };

export type RunMetricsDependencies = {
  logger?: Logger;
  now?: () => Date;
  onProgress?: (event: MetricsRunProgressEvent) => void;
};

export type MetricRunContext = {
  repository: string;
  timeWindow: TimeWindow;
  history: HistorySnapshot;
  options: AnalysisOptions;
  config: MetricsConfig;
  logger: Logger;
  now: () => Date;
  onProgress?: (event: MetricsRunProgressEvent) => void;
};

/** Wraps a computation so a thrown error becomes a value the caller has to inspect. */
export const attemptComputation = <T>(compute: () => T): ComputationResult<T> => {
  try {
    return { ok: true, value: compute() };
  } catch (error) {
    return { ok: false, failure: describeError(error) };
  }
};

/**
 * Loads each history source at most once per run and shares the records read-only
 * between metrics.
 */
export class HistorySnapshot {
  private commits: readonly Commit[] | undefined;
  private commitStats: readonly Commit[] | undefined;
  private contributors: readonly Contributor[] | undefined;
  private tags: readonly Tag[] | undefined;
  private branches: readonly string[] | undefined;

  constructor(
    private readonly source: RepositoryHistorySource,
    private readonly timeWindow: TimeWindow,
    private readonly onLoaded?: (source: MetricSource, records: number) => void,
  ) {}

  getCommits(): readonly Commit[] {
    this.commits ??= this.track("commits", this.source.getCommits(this.timeWindow));
    return this.commits;
  }

  getCommitStats(): readonly Commit[] {
    this.commitStats ??= this.track("commit_stats", this.source.getCommitStats(this.timeWindow));
    return this.commitStats;
  }

  getContributors(): readonly Contributor[] {
    this.contributors ??= this.track("contributors", this.source.getContributors(this.timeWindow));
    return this.contributors;
  }

  getTags(): readonly Tag[] {
    this.tags ??= this.track("tags", this.source.getTags());
    return this.tags;
  }

  getBranches(): readonly string[] {
    this.branches ??= this.track("branches", this.source.getBranches());
    return this.branches;
  }

  private track<T>(source: MetricSource, records: readonly T[]): readonly T[] {
    this.onLoaded?.(source, records.length);
    return records;
  }
}

const validateTarget = (repository: string, timeWindow: TimeWindow): void => {
  if (repository.trim().length === 0) {
    throw new ValidationError("Repository cannot be empty");
  }

  if (!Number.isFinite(timeWindow.start) || !Number.isFinite(timeWindow.end) || timeWindow.start >= timeWindow.end) {
    throw new ValidationError("Start date must be before end date");
  }
};

const buildInput = (definition: MetricDefinition, context: MetricRunContext): MetricInput => {
  const { history, options, timeWindow } = context;
  const uses = (source: MetricSource): boolean => definition.sources.includes(source);
  const filterOptions = { ...options, keepMergeCommits: definition.requiresMergeCommits };

  let commits: readonly Commit[] = [];
  if (uses("commit_stats")) {
    commits = filterCommits(history.getCommitStats(), timeWindow, filterOptions);
  } else if (uses("commits")) {
    commits = filterCommits(history.getCommits(), timeWindow, filterOptions);
  }

  return {
    commits,
    contributors: uses("contributors") ? filterContributors(history.getContributors(), options) : [],
    tags: uses("tags") ? history.getTags() : [],
    branches: uses("branches") ? history.getBranches() : [],
    timeWindow,
  };
};

export const runMetric = (metricName: string, context: MetricRunContext): MetricResult => {
  validateTarget(context.repository, context.timeWindow);
  const definition = findMetric(metricName);
  if (definition === undefined) {
    throw new UnknownMetricError(metricName);
  }

  context.logger.debug(`running ${definition.name}`);
  context.onProgress?.({ stage: "metric_started", metricName: definition.name });

  const startedAt = performance.now();
  const outcome = attemptComputation(() => definition.compute(buildInput(definition, context), context.config));
  const executionTime = round3((performance.now() - startedAt) / 1000);
  const computedAt = context.now().toISOString();

  context.onProgress?.({ stage: "metric_completed", metricName: definition.name, ok: outcome.ok, executionTime });

  if (!outcome.ok) {
    context.logger.warn(`${definition.name} failed: ${outcome.failure.errorClass}: ${outcome.failure.message}`);
    return {
      ok: false,
      metricName: definition.name,
      value: null,
      repository: context.repository,
      timeWindow: context.timeWindow,
      metadata: {
        category: definition.category,
        dataPoints: 0,
        dataPointsLabel: definition.dataPointsLabel,
        computedAt,
        executionTime,
        errorClass: outcome.failure.errorClass,
      },
      error: outcome.failure.message,
    };
  }

  const { value, dataPoints, summary } = outcome.value;
  context.logger.debug(`${definition.name}: ${dataPoints} ${definition.dataPointsLabel} in ${executionTime}s`);
  return {
    ok: true,
    metricName: definition.name,
    value,
    repository: context.repository,
    timeWindow: context.timeWindow,
    metadata: {
      category: definition.category,
      dataPoints,
      dataPointsLabel: definition.dataPointsLabel,
      computedAt,
      optionsUsed: context.options,
      executionTime,
      ...summary,
    },
    error: null,
  };
};

export const runMetrics = (
  request: MetricsRunRequest,
  source: RepositoryHistorySource,
  dependencies: RunMetricsDependencies = {},
): MetricsRunReport => {
  validateTarget(request.repository, request.timeWindow);
  const metricNames = resolveMetricNames(request.metrics, request.categories);
  const logger = dependencies.logger ?? createSilentLogger();
  const onProgress = dependencies.onProgress;

  const context: MetricRunContext = {
    repository: request.repository,
    timeWindow: request.timeWindow,
    history: new HistorySnapshot(source, request.timeWindow, (loaded, records) => {
      logger.debug(`loaded ${records} ${loaded} records`);
      onProgress?.({ stage: "source_loaded", source: loaded, records });
    }),
    options: { ...DEFAULT_ANALYSIS_OPTIONS, ...request.options },
    config: mergeMetricsConfig(request.config),
    logger,
    now: dependencies.now ?? (() => new Date()),
    ...(onProgress === undefined ? {} : { onProgress }),
  };

  logger.info(`computing ${metricNames.length} metrics for ${request.repository}`);
  const results = metricNames.map((name) => runMetric(name, context));
  const failed = results.filter((result) => !result.ok).length;

  return {
    repository: request.repository,
    timeWindow: request.timeWindow,
    results,
    succeeded: results.length - failed,
    failed,
  };
};
