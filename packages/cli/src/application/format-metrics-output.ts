import {
  timeWindowToJSON,
  type MetricCategory,
  type MetricResult,
  type MetricValue,
  type MetricsRunReport,
  type TimeWindowJSON,
} from "@repometrics/core";

export type AnalyzeOutputMode = "summary" | "json";

type ValueShape =
  | { kind: "scalar"; value: number }
  | { kind: "table"; rows: number }
  | { kind: "keyed_table"; entries: number }
  | { kind: "distribution"; buckets: Record<string, number> };

type MetricSummaryShape = {
  name: string;
  category: MetricCategory;
  ok: boolean;
  dataPoints: string;
  executionTime: number;
  value: ValueShape | null;
  error: string | null;
};

type SummaryShape = {
  repository: string;
  timeWindow: TimeWindowJSON;
  succeeded: number;
  failed: number;
  metrics: MetricSummaryShape[];
};

const createValueShape = (value: MetricValue): ValueShape => {
  switch (value.kind) {
    case "scalar":
      return { kind: "scalar", value: value.value };
    case "table":
      return { kind: "table", rows: value.rows.length };
    case "keyed_table":
      return { kind: "keyed_table", entries: value.entries.length };
    case "distribution":
      return {
        kind: "distribution",
        buckets: Object.fromEntries(value.buckets.map((bucket) => [bucket.bucket, bucket.count])),
      };
  }
};

const createMetricSummaryShape = (result: MetricResult): MetricSummaryShape => ({
  name: result.metricName,
  category: result.metadata.category,
  ok: result.ok,
  dataPoints: `${result.metadata.dataPoints} ${result.metadata.dataPointsLabel}`,
  executionTime: result.metadata.executionTime,
  value: result.ok ? createValueShape(result.value) : null,
  error: result.error,
});

const createSummaryShape = (report: MetricsRunReport): SummaryShape => ({
  repository: report.repository,
  timeWindow: timeWindowToJSON(report.timeWindow),
  succeeded: report.succeeded,
  failed: report.failed,
  metrics: report.results.map(createMetricSummaryShape),
});

const createJsonShape = (report: MetricsRunReport): object => ({
  ...report,
  timeWindow: timeWindowToJSON(report.timeWindow),
  results: report.results.map((result) => ({ ...result, timeWindow: timeWindowToJSON(result.timeWindow) })),
});

export const formatMetricsOutput = (report: MetricsRunReport, mode: AnalyzeOutputMode): string =>
  mode === "json"
    ? JSON.stringify(createJsonShape(report), null, 2)
    : JSON.stringify(createSummaryShape(report), null, 2);
