import type { Commit } from "@repometrics/core";
import { describe, expect, it } from "vitest";
import { DEFAULT_METRICS_CONFIG } from "../../config.js";
import {
  computeLargeCommits,
  DEFAULT_SIZE_THRESHOLDS,
  largeCommitsMetric,
  sizeRiskScore,
  sizeThresholds,
  weightedCommitSize,
} from "./large-commits.js";

const commit = (hash: string, authorName: string, additions: number): Commit => ({
  hash,
  authorName,
  authorEmail: null,
  timestamp: 1_759_363_200,
  utcOffsetMinutes: 0,
  subject: `change ${hash}`,
  fileChanges: [{ filename: `src/${hash}.ts`, additions, deletions: 0 }],
  additions,
  deletions: 0,
});

// weighted sizes 20, 40, 60, 80 and 1000
const commits = [
  commit("a1", "Alice", 10),
  commit("a2", "Alice", 30),
  commit("b1", "Bob", 50),
  commit("b2", "Bob", 70),
  commit("c1", "Carol", 990),
];

describe("computeLargeCommits", () => {
  it("derives thresholds from the repository's own sizes", () => {
    const { summary } = computeLargeCommits(commits, DEFAULT_METRICS_CONFIG.reliability);

    expect(summary.thresholds).toEqual({ small: 40, medium: 60, large: 80, huge: 1000 });
  });

  it("lists large commits, largest first", () => {
    const { value } = computeLargeCommits(commits, DEFAULT_METRICS_CONFIG.reliability);

    expect(value.rows).toEqual([
      {
        hash: "c1",
        author: "Carol",
        committedAt: "2025-10-02T00:00:00.000Z",
        subject: "change c1",
        size: 1000,
        additions: 990,
        deletions: 0,
        filesChanged: 1,
        severity: "huge",
      },
      {
        hash: "b2",
        author: "Bob",
        committedAt: "2025-10-02T00:00:00.000Z",
        subject: "change b2",
        size: 80,
        additions: 70,
        deletions: 0,
        filesChanged: 1,
        severity: "large",
      },
    ]);
  });

  it("scores risk overall and per author", () => {
    const { summary } = computeLargeCommits(commits, DEFAULT_METRICS_CONFIG.reliability);

    expect(summary).toMatchObject({
      totalCommits: 5,
      largeCommits: 2,
      hugeCommits: 1,
      largeCommitRatio: 40,
      hugeCommitRatio: 20,
      riskScore: 33.33,
      avgCommitSize: 240,
      sizeDistribution: {
        min: 20,
        max: 1000,
        median: 60,
        p75: 80,
        p90: 1000,
        p95: 1000,
        p99: 1000,
        stdDeviation: 380.53,
      },
      highRiskAuthors: 1,
      largestCommitAuthor: "Carol",
    });
    const risks = summary.byAuthor.map((stats) => [stats.author, stats.largeCommits, stats.hugeCommits, stats.riskScore]);
    expect(risks).toEqual([
      ["Carol", 1, 1, 133.33],
      ["Bob", 1, 0, 16.67],
      ["Alice", 0, 0, 0],
    ]);
    expect(summary.byAuthor[1]).toMatchObject({ avgCommitSize: 70, maxCommitSize: 80, largeCommitRatio: 50 });
  });

  it("falls back to default thresholds without commits", () => {
    const result = largeCommitsMetric.compute(
      { commits: [], contributors: [], tags: [], branches: [], timeWindow: { start: 0, end: 1 } },
      DEFAULT_METRICS_CONFIG,
    );

    expect(result.dataPoints).toBe(0);
    expect(result.value.rows).toEqual([]);
    expect(result.summary.thresholds).toEqual(DEFAULT_SIZE_THRESHOLDS);
    expect(result.summary.sizeDistribution).toBeNull();
    expect(result.summary.riskScore).toBe(0);
  });
});

describe("size helpers", () => {
  it("weighs each touched file as ten lines", () => {
    expect(weightedCommitSize({ ...commit("x", "Alice", 5), deletions: 3 })).toBe(18);
  });

  it("uses defaults for an empty list", () => {
    expect(sizeThresholds([])).toEqual({ small: 50, medium: 200, large: 500, huge: 1000 });
  });

  it("weighs huge commits three times", () => {
    expect(sizeRiskScore(1, 1, 2)).toBe(66.67);
    expect(sizeRiskScore(0, 0, 0)).toBe(0);
  });
});
