import { describe, expect, it } from "vitest";
import type { Logger } from "@repometrics/core";
import {
  parseBranches,
  parseCommitStats,
  parseCommits,
  parseContributors,
  parseFileChanges,
  parseTags,
  splitWithLimit,
} from "./git-log-parser.js";

const HASH_A = "a".repeat(40);
const HASH_B = "b".repeat(40);

const createRecordingLogger = (): Logger & { warnings: string[] } => {
  const warnings: string[] = [];
  return {
    warnings,
    error: () => {},
    warn: (message) => warnings.push(message),
    info: () => {},
    debug: () => {},
  };
};

describe("splitWithLimit", () => {
  it("keeps separators inside the last field", () => {
    expect(splitWithLimit("a|b|c|d|e|f", "|", 5)).toEqual(["a", "b", "c", "d", "e|f"]);
    expect(splitWithLimit("a|b", "|", 5)).toEqual(["a", "b"]);
    expect(splitWithLimit("a|b|c|d|", "|", 5)).toEqual(["a", "b", "c", "d", ""]);
  });
});

describe("parseCommits", () => {
  it("parses header lines and keeps pipes in the subject", () => {
    const raw = [
      `${HASH_A}|Alice|alice@example.com|2025-10-02T14:03:11+02:00|fix: a | b`,
      "",
      `${HASH_B}|Bob||2025-10-02T12:03:11Z|docs\r`,
    ].join("\n");

    expect(parseCommits(raw)).toEqual([
      {
        hash: HASH_A,
        authorName: "Alice",
        authorEmail: "alice@example.com",
        timestamp: 1759406591,
        utcOffsetMinutes: 120,
        subject: "fix: a | b",
        fileChanges: [],
        additions: 0,
        deletions: 0,
      },
      {
        hash: HASH_B,
        authorName: "Bob",
        authorEmail: null,
        timestamp: 1759406591,
        utcOffsetMinutes: 0,
        subject: "docs",
        fileChanges: [],
        additions: 0,
        deletions: 0,
      },
    ]);
  });

  it("skips lines with fewer than five fields", () => {
    expect(parseCommits(`${HASH_A}|Alice|alice@example.com`)).toEqual([]);
  });

  it("returns nothing when any date is unparseable", () => {
    const logger = createRecordingLogger();
    const raw = [
      `${HASH_A}|Alice|alice@example.com|2025-10-02T14:03:11+02:00|ok`,
      `${HASH_B}|Bob|bob@example.com|invalid-date|broken`,
    ].join("\n");

    expect(parseCommits(raw, { logger })).toEqual([]);
    expect(logger.warnings).toEqual(["parse commits: Unparseable git date: invalid-date; discarding output"]);
  });

  it("is idempotent", () => {
    const raw = `${HASH_A}|Alice|alice@example.com|2025-10-02T14:03:11+02:00|ok`;
    expect(parseCommits(raw)).toEqual(parseCommits(raw));
  });
});

describe("parseCommitStats", () => {
  it("attaches numstat lines to the preceding header and accumulates totals", () => {
    const raw = [
      "3\t1\torphan.ts",
      `${HASH_A}|Alice|alice@example.com|2025-10-02T14:03:11+02:00|feat`,
      "10\t2\tsrc/a.ts",
      "-\t-\tassets/logo.png",
      "2\t0\tsrc/{old.ts => new.ts}",
      "",
      `${HASH_B}|Bob|bob@example.com|2025-10-02T12:03:11Z|chore`,
    ].join("\n");

    const commits = parseCommitStats(raw);

    expect(commits).toHaveLength(2);
    expect(commits[0]?.fileChanges).toEqual([
      { filename: "src/a.ts", additions: 10, deletions: 2 },
      { filename: "assets/logo.png", additions: 0, deletions: 0 },
      { filename: "src/new.ts", additions: 2, deletions: 0 },
    ]);
    expect(commits[0]?.additions).toBe(12);
    expect(commits[0]?.deletions).toBe(2);
    expect(commits[1]?.fileChanges).toEqual([]);
    expect(commits[1]?.additions).toBe(0);
  });

  it("returns nothing for a malformed header date", () => {
    const raw = [`${HASH_A}|Alice|alice@example.com|invalid-date|feat`, "10\t2\tsrc/a.ts"].join("\n");
    expect(parseCommitStats(raw)).toEqual([]);
  });
});

describe("parseFileChanges", () => {
  it("indexes filenames by the commits that touched them", () => {
    const raw = ["ignored.ts", HASH_A, "src/a.ts", "src/b.ts", "", HASH_B, "src/a.ts"].join("\n");

    const index = parseFileChanges(raw);

    expect([...index.entries()]).toEqual([
      ["src/a.ts", [HASH_A, HASH_B]],
      ["src/b.ts", [HASH_A]],
    ]);
  });
});

describe("parseContributors", () => {
  it("parses shortlog counts with and without email", () => {
    const raw = ["    12\tAlice Smith <alice@example.com>", "     3\tBuild Robot", "not a count"].join("\n");

    expect(parseContributors(raw)).toEqual([
      { name: "Alice Smith", email: "alice@example.com", commitCount: 12 },
      { name: "Build Robot", email: null, commitCount: 3 },
    ]);
  });
});

describe("parseTags", () => {
  it("parses name, creator date and object hash", () => {
    const raw = ["v1.2.0|2025-10-02T14:03:11+02:00|" + HASH_A, "draft||", "v1.1.0|2025-10-02T12:03:11Z"].join("\n");

    expect(parseTags(raw)).toEqual([
      { name: "v1.2.0", timestamp: 1759406591, utcOffsetMinutes: 120, commitHash: HASH_A },
      { name: "v1.1.0", timestamp: 1759406591, utcOffsetMinutes: 0, commitHash: null },
    ]);
  });

  it("returns nothing when a tag date is unparseable", () => {
    expect(parseTags("v1.0.0|yesterday|abc")).toEqual([]);
  });
});

describe("parseBranches", () => {
  it("normalizes markers and remote prefixes", () => {
    const raw = ["* main", "  feature/x", "remotes/origin/HEAD -> origin/main", "remotes/origin/main", "feature/x"].join(
      "\n",
    );

    expect(parseBranches(raw)).toEqual(["main", "feature/x", "origin/main"]);
  });
});
