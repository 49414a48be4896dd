import type { Commit } from "@repometrics/core";
import { describe, expect, it } from "vitest";
import { DEFAULT_METRICS_CONFIG } from "../../config.js";
import {
  computeRevertRate,
  isRevertCommit,
  referencedHash,
  revertFrequency,
  revertReason,
  stabilityScore,
} from "./revert-rate.js";

const at = (iso: string): number => Date.parse(iso) / 1000;

const commit = (hash: string, authorName: string, subject: string, iso: string): Commit => ({
  hash,
  authorName,
  authorEmail: null,
  timestamp: at(iso),
  utcOffsetMinutes: 0,
  subject,
  fileChanges: [],
  additions: 0,
  deletions: 0,
});

const commits = [
  commit("abc1234def567890abc1234def567890abc12345", "Alice", "feat: add cache layer", "2025-09-01T10:00:00Z"),
  commit("9999999000000000000000000000000000000000", "Bob", "Revert abc1234 because tests failing", "2025-09-02T15:00:00Z"),
  commit("8888888000000000000000000000000000000000", "Carol", "Rollback broken deploy", "2025-09-05T15:00:00Z"),
  commit("7777777000000000000000000000000000000000", "Alice", "fix: typo", "2025-09-06T09:00:00Z"),
];

describe("computeRevertRate", () => {
  it("lists revert commits with the hash they reference", () => {
    const { value } = computeRevertRate(commits, DEFAULT_METRICS_CONFIG.reliability);

    expect(value.rows).toEqual([
      {
        hash: "9999999000000000000000000000000000000000",
        author: "Bob",
        committedAt: "2025-09-02T15:00:00.000Z",
        subject: "Revert abc1234 because tests failing",
        revertedHash: "abc1234",
        reason: "Test issues",
      },
      {
        hash: "8888888000000000000000000000000000000000",
        author: "Carol",
        committedAt: "2025-09-05T15:00:00.000Z",
        subject: "Rollback broken deploy",
        revertedHash: null,
        reason: "Breaking changes",
      },
    ]);
  });

  it("summarizes rates, authors and timing", () => {
    const { summary } = computeRevertRate(commits, DEFAULT_METRICS_CONFIG.reliability);

    expect(summary).toMatchObject({
      totalCommits: 4,
      revertCommits: 2,
      revertedCommits: 1,
      revertRate: 50,
      revertedRate: 25,
      stabilityScore: 0.75,
      highRiskAuthors: 1,
      mostRevertedAuthor: "Alice",
      revertReasons: { "Test issues": 1, "Breaking changes": 1 },
      peakRevertHour: 15,
      peakRevertDay: "Tuesday",
      revertFrequency: 3,
    });
    const rates = summary.byAuthor.map((stats) => [
      stats.author,
      stats.revertRate,
      stats.revertedRate,
      stats.reliabilityScore,
    ]);
    expect(rates).toEqual([
      ["Alice", 0, 50, 0.5],
      ["Bob", 100, 0, 1],
      ["Carol", 100, 0, 1],
    ]);
  });

  it("reports a stable history without reverts", () => {
    const stable = commits.filter((entry) => !isRevertCommit(entry.subject));
    const { value, summary } = computeRevertRate(stable, DEFAULT_METRICS_CONFIG.reliability);

    expect(value.rows).toEqual([]);
    expect(summary.stabilityScore).toBe(1);
    expect(summary.peakRevertHour).toBeNull();
    expect(summary.revertFrequency).toBe(0);
  });
});

describe("revert helpers", () => {
  it.each([
    ["Revert \"Add search\"", true],
    ["This reverts commit abc1234", true],
    ["chore: reverts commit abc1234", true],
    ["Rollback release", true],
    ["Undo config change", true],
    ["Reverting styles", false],
    ["feat: undo button", false],
  ] as const)("detects %j as %s", (subject, expected) => {
    expect(isRevertCommit(subject)).toBe(expected);
  });

  it("extracts the first hex run of seven or more characters", () => {
    expect(referencedHash("Revert ABCDEF1234 and 1234567")).toBe("abcdef1234");
    expect(referencedHash("Revert \"Add feature\"")).toBeNull();
  });

  it("categorizes reasons in order", () => {
    expect(revertReason("Revert: failing test caused by bug")).toBe("Bug fixes");
    expect(revertReason("Rollback slow query")).toBe("Performance issues");
    expect(revertReason("Revert security patch")).toBe("Security concerns");
    expect(revertReason("Undo rename")).toBe("Other");
  });

  it("floors stability at zero", () => {
    expect(stabilityScore(5, 4)).toBe(0);
    expect(stabilityScore(0, 0)).toBe(1);
  });

  it("averages the gaps between reverts", () => {
    expect(
      revertFrequency([
        commit("r2", "Bob", "Revert x", "2025-09-05T00:00:00Z"),
        commit("r1", "Bob", "Revert y", "2025-09-01T00:00:00Z"),
        commit("r3", "Bob", "Revert z", "2025-09-06T00:00:00Z"),
      ]),
    ).toBe(2.5);
  });
});
