import type { TimeWindow } from "./time-window.js";

export type FileChange = {
  filename: string;
  additions: number;
  deletions: number;
};

export type Commit = {
  hash: string;
  authorName: string;
  authorEmail: string | null;
  timestamp: number;
  utcOffsetMinutes: number;
  subject: string;
  fileChanges: readonly FileChange[];
  additions: number;
  deletions: number;
};

export type Contributor = {
  name: string;
  email: string | null;
  commitCount: number;
};

export type Tag = {
  name: string;
  timestamp: number;
  utcOffsetMinutes: number;
  commitHash: string | null;
};

export type FileCommitIndex = ReadonlyMap<string, readonly string[]>;

export type Repository = {
  name: string;
  path: string;
};

export type MetricCategory = "commit_activity" | "code_churn" | "reliability" | "flow";

export type ScalarValue = {
  kind: "scalar";
  value: number;
};

export type TableValue<TRow> = {
  kind: "table";
  rows: readonly TRow[];
};

export type KeyedTableEntry<TAttributes> = {
  key: string;
  attributes: TAttributes;
};

export type KeyedTableValue<TAttributes> = {
  kind: "keyed_table";
  entries: readonly KeyedTableEntry<TAttributes>[];
};

export type DistributionBucket = {
  bucket: string;
  count: number;
};

export type DistributionValue = {
  kind: "distribution";
  buckets: readonly DistributionBucket[];
};

export type MetricValue<TRow = unknown> =
  | ScalarValue
  | TableValue<TRow>
  | KeyedTableValue<TRow>
  | DistributionValue;

export type AnalysisOptions = {
  contributors: readonly string[];
  excludeBots: boolean;
  includeMergeCommits: boolean;
};

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
  contributors: [],
  excludeBots: false,
  includeMergeCommits: true,
};

export type MetricMetadata = {
  category: MetricCategory;
  dataPoints: number;
  dataPointsLabel: string;
  computedAt: string;
  optionsUsed: AnalysisOptions;
  executionTime: number;
};

export type FailedMetricMetadata = {
  category: MetricCategory;
  dataPoints: 0;
  dataPointsLabel: string;
  computedAt: string;
  executionTime: number;
  errorClass: string;
};

export type MetricSuccess<TValue extends MetricValue, TSummary extends object> = {
  ok: true;
  metricName: string;
  value: TValue;
  repository: string;
  timeWindow: TimeWindow;
  metadata: MetricMetadata & TSummary;
  error: null;
};

export type MetricFailure = {
  ok: false;
  metricName: string;
  value: null;
  repository: string;
  timeWindow: TimeWindow;
  metadata: FailedMetricMetadata;
  error: string;
};

export type MetricResult<
  TValue extends MetricValue = MetricValue,
  TSummary extends object = object,
> = MetricSuccess<TValue, TSummary> | MetricFailure;

export type ComputationFailure = {
  errorClass: string;
  message: string;
};

export type ComputationResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ComputationFailure };

/**
 * Read side of a repository's history. Implementations return already-parsed
 * records; an empty array means "no data" and a thrown error means the fetch failed.
 */
export interface RepositoryHistorySource {
  getCommits(window: TimeWindow): readonly Commit[];
  getCommitStats(window: TimeWindow): readonly Commit[];
  getContributors(window: TimeWindow): readonly Contributor[];
  getTags(): readonly Tag[];
  getBranches(): readonly string[];
}

export type MetricsRunReport = {
  repository: string;
  timeWindow: TimeWindow;
  results: readonly MetricResult[];
  succeeded: number;
  failed: number;
};

export {
  createTimeWindow,
  timeWindowContains,
  timeWindowDurationDays,
  timeWindowToJSON,
  type TimeInput,
  type TimeWindow,
  type TimeWindowJSON,
} from "./time-window.js";
export { ValidationError, describeError } from "./errors.js";
export {
  createSilentLogger,
  createSinkLogger,
  createStderrLogger,
  formatLogLine,
  parseLogLevel,
  type LogLevel,
  type LogSink,
  type Logger,
} from "./logger.js";
