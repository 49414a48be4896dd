import {
  createSinkLogger,
  createTimeWindow,
  ValidationError,
  type Commit,
  type Contributor,
  type RepositoryHistorySource,
  type Tag,
} from "@repometrics/core";
import { describe, expect, it } from "vitest";
import { UnknownMetricError } from "./metric-registry.js";
import { attemptComputation, runMetrics, type MetricsRunProgressEvent } from "./run-metrics.js";

const at = (iso: string): number => Date.parse(iso) / 1000;

const commit = (hash: string, authorName: string, subject: string, iso: string, additions = 0): Commit => ({
  hash,
  authorName,
  authorEmail: `${authorName.toLowerCase()}@example.com`,
  timestamp: at(iso),
  utcOffsetMinutes: 0,
  subject,
  fileChanges: additions === 0 ? [] : [{ filename: "src/a.ts", additions, deletions: 0 }],
  additions,
  deletions: 0,
});

const COMMITS: readonly Commit[] = [
  commit("c1", "Alice", "feat: add search", "2025-10-02T10:00:00Z", 12),
  commit("c2", "dependabot[bot]", "chore: bump lib", "2025-10-03T10:00:00Z", 2),
  commit("c3", "Bob", "Merge pull request #2 from team/x", "2025-10-04T10:00:00Z"),
  commit("c4", "Alice", "fix: old", "2025-09-15T10:00:00Z", 3),
];

class StubHistorySource implements RepositoryHistorySource {
  readonly calls: string[] = [];

  constructor(private readonly failTags = false) {}

  getCommits(): readonly Commit[] {
    this.calls.push("commits");
    return COMMITS;
  }

  getCommitStats(): readonly Commit[] {
    this.calls.push("commit_stats");
    return COMMITS;
  }

  getContributors(): readonly Contributor[] {
    this.calls.push("contributors");
    return [{ name: "Alice", email: "alice@example.com", commitCount: 2 }];
  }

  getTags(): readonly Tag[] {
    this.calls.push("tags");
    if (this.failTags) {
      throw new TypeError("tag listing failed");
    }
    return [];
  }

  getBranches(): readonly string[] {
    this.calls.push("branches");
    return ["main"];
  }
}

const timeWindow = createTimeWindow("2025-10-01T00:00:00Z", "2025-10-31T00:00:00Z");
const now = (): Date => new Date("2025-11-01T00:00:00Z");

describe("runMetrics", () => {
  it("builds a success envelope with options and summary", () => {
    const report = runMetrics(
      { repository: "demo", timeWindow, metrics: ["commit_size"] },
      new StubHistorySource(),
      { now },
    );

    expect(report).toMatchObject({ repository: "demo", succeeded: 1, failed: 0 });
    const [result] = report.results;
    expect(result).toMatchObject({
      ok: true,
      metricName: "commit_size",
      repository: "demo",
      timeWindow,
      error: null,
      metadata: {
        category: "commit_activity",
        dataPoints: 3,
        dataPointsLabel: "commits",
        computedAt: "2025-11-01T00:00:00.000Z",
        optionsUsed: { contributors: [], excludeBots: false, includeMergeCommits: true },
        totalCommits: 3,
        totalAdditions: 14,
      },
    });
    expect(typeof result?.metadata.executionTime).toBe("number");
  });

  it("loads each source once per run", () => {
    const source = new StubHistorySource();

    runMetrics({ repository: "demo", timeWindow, metrics: ["commit_size", "lines_changed", "file_churn"] }, source);

    expect(source.calls).toEqual(["commit_stats"]);
  });

  it("returns one result per requested name, in the order given", () => {
    const source = new StubHistorySource();
    const report = runMetrics(
      { repository: "demo", timeWindow, metrics: ["lead_time", "file_churn", "commit_size", "file_churn"] },
      source,
      { now },
    );

    expect(report.results.map((result) => result.metricName)).toEqual([
      "lead_time",
      "file_churn",
      "commit_size",
      "file_churn",
    ]);
    expect(report.succeeded).toBe(4);
    expect(source.calls.filter((call) => call === "commit_stats")).toHaveLength(1);
  });

  it("turns a failing source into a failed result and keeps going", () => {
    const logs: string[] = [];
    const logger = createSinkLogger("warn", { write: (line) => logs.push(line) });

    const report = runMetrics(
      { repository: "demo", timeWindow, metrics: ["lead_time", "commit_frequency"] },
      new StubHistorySource(true),
      { now, logger },
    );

    expect(report.succeeded).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.results[0]).toMatchObject({
      ok: false,
      metricName: "lead_time",
      value: null,
      error: "tag listing failed",
      metadata: { category: "flow", dataPoints: 0, dataPointsLabel: "commits", errorClass: "TypeError" },
    });
    expect(report.results[1]?.ok).toBe(true);
    expect(logs).toEqual(["[repometrics] WARN lead_time failed: TypeError: tag listing failed\n"]);
  });

  it("applies bot and merge filters, except where merges are required", () => {
    const report = runMetrics(
      {
        repository: "demo",
        timeWindow,
        metrics: ["commit_frequency", "deployment_frequency"],
        options: { excludeBots: true, includeMergeCommits: false },
      },
      new StubHistorySource(),
    );

    expect(report.results.map((result) => result.metadata.dataPoints)).toEqual([1, 1]);
  });

  it("reports progress in order", () => {
    const events: MetricsRunProgressEvent[] = [];

    runMetrics({ repository: "demo", timeWindow, metrics: ["commits_per_developer"] }, new StubHistorySource(), {
      onProgress: (event) => events.push(event),
    });

    expect(events.map((event) => event.stage)).toEqual(["metric_started", "source_loaded", "metric_completed"]);
    expect(events[1]).toEqual({ stage: "source_loaded", source: "contributors", records: 1 });
  });

  it("validates the target before computing anything", () => {
    const source = new StubHistorySource();

    expect(() => runMetrics({ repository: "  ", timeWindow }, source)).toThrow(ValidationError);
    expect(() => runMetrics({ repository: "demo", timeWindow: { start: 10, end: 5 } }, source)).toThrow(
      "Start date must be before end date",
    );
    expect(source.calls).toEqual([]);
  });

  it("rejects unknown metric names", () => {
    expect(() => runMetrics({ repository: "demo", timeWindow, metrics: ["nope"] }, new StubHistorySource())).toThrow(
      UnknownMetricError,
    );
  });
});

describe("attemptComputation", () => {
  it("captures thrown errors as failures", () => {
    expect(attemptComputation(() => 42)).toEqual({ ok: true, value: 42 });
    expect(
      attemptComputation(() => {
        throw new RangeError("out of range");
      }),
    ).toEqual({ ok: false, failure: { errorClass: "RangeError", message: "out of range" } });
  });
});
