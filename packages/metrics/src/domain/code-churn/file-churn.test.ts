import type { Commit, FileChange } from "@repometrics/core";
import { describe, expect, it } from "vitest";
import { DEFAULT_METRICS_CONFIG } from "../../config.js";
import { classifyChurn, computeFileChurn, fileChurnMetric } from "./file-churn.js";

const commit = (hash: string, authorName: string, fileChanges: FileChange[]): Commit => ({
  hash,
  authorName,
  authorEmail: null,
  timestamp: 1_759_363_200,
  utcOffsetMinutes: 0,
  subject: "change",
  fileChanges,
  additions: fileChanges.reduce((total, change) => total + change.additions, 0),
  deletions: fileChanges.reduce((total, change) => total + change.deletions, 0),
});

const commits = [
  commit("c1", "Alice", [
    { filename: "src/a.ts", additions: 100, deletions: 20 },
    { filename: "src/b.ts", additions: 5, deletions: 5 },
  ]),
  commit("c2", "Bob", [{ filename: "src/a.ts", additions: 900, deletions: 10 }]),
  commit("c3", "Alice", [
    { filename: "src/c.ts", additions: 50, deletions: 100 },
    { filename: "src/b.ts", additions: 0, deletions: 3 },
  ]),
];

describe("computeFileChurn", () => {
  it("ranks files by total churn", () => {
    const { value } = computeFileChurn(commits, DEFAULT_METRICS_CONFIG);

    expect(value.rows).toEqual([
      {
        filename: "src/a.ts",
        totalChurn: 1030,
        additions: 1000,
        deletions: 30,
        netChanges: 970,
        commits: 2,
        authorsCount: 2,
        authors: ["Alice", "Bob"],
        avgChurnPerCommit: 515,
        churnRatio: 2.9,
      },
      {
        filename: "src/c.ts",
        totalChurn: 150,
        additions: 50,
        deletions: 100,
        netChanges: -50,
        commits: 1,
        authorsCount: 1,
        authors: ["Alice"],
        avgChurnPerCommit: 150,
        churnRatio: 66.7,
      },
      {
        filename: "src/b.ts",
        totalChurn: 13,
        additions: 5,
        deletions: 8,
        netChanges: -3,
        commits: 2,
        authorsCount: 1,
        authors: ["Alice"],
        avgChurnPerCommit: 6.5,
        churnRatio: 61.5,
      },
    ]);

    const totals = value.rows.map((row) => row.totalChurn);
    expect(totals).toEqual([...totals].sort((a, b) => b - a));
  });

  it("counts churn levels and hotspots", () => {
    const { summary } = computeFileChurn(commits, DEFAULT_METRICS_CONFIG);

    expect(summary).toEqual({
      totalFilesChanged: 3,
      totalFileChanges: 5,
      avgChangesPerFile: 1.67,
      highChurnFiles: 1,
      mediumChurnFiles: 1,
      lowChurnFiles: 1,
      hotspotPercentage: 33.3,
    });
  });

  it("reports files as data points and zero for no commits", () => {
    const input = { contributors: [], tags: [], branches: [], timeWindow: { start: 0, end: 1 } };

    expect(fileChurnMetric.compute({ ...input, commits }, DEFAULT_METRICS_CONFIG).dataPoints).toBe(3);
    expect(fileChurnMetric.compute({ ...input, commits: [] }, DEFAULT_METRICS_CONFIG)).toMatchObject({
      value: { kind: "table", rows: [] },
      dataPoints: 0,
    });
  });
});

describe("classifyChurn", () => {
  it("uses strict thresholds", () => {
    expect(classifyChurn(1000, DEFAULT_METRICS_CONFIG.fileChurn)).toBe("medium");
    expect(classifyChurn(1001, DEFAULT_METRICS_CONFIG.fileChurn)).toBe("high");
    expect(classifyChurn(100, DEFAULT_METRICS_CONFIG.fileChurn)).toBe("low");
  });
});
