import type { Commit } from "@repometrics/core";
import { describe, expect, it } from "vitest";
import { filterCommits, filterContributors, isBotIdentity, type CommitFilterOptions } from "./analysis-filters.js";

const at = (iso: string): number => Date.parse(iso) / 1000;

const commit = (hash: string, authorName: string, authorEmail: string | null, subject: string, iso: string): Commit => ({
  hash,
  authorName,
  authorEmail,
  timestamp: at(iso),
  utcOffsetMinutes: 0,
  subject,
  fileChanges: [],
  additions: 0,
  deletions: 0,
});

const window = { start: at("2025-10-01T00:00:00Z"), end: at("2025-10-31T00:00:00Z") };

const commits = [
  commit("c1", "Alice", "alice@example.com", "feat: add search", "2025-10-02T10:00:00Z"),
  commit("c2", "dependabot[bot]", "bot@example.com", "chore: bump lib", "2025-10-03T10:00:00Z"),
  commit("c3", "Bob", null, "Merge pull request #2 from team/x", "2025-10-04T10:00:00Z"),
  commit("c4", "Alice", "alice@example.com", "fix: old", "2025-09-15T10:00:00Z"),
  commit("c5", "Carol", "carol@example.com", "docs: window end", "2025-10-31T00:00:00Z"),
];

const options = (overrides: Partial<CommitFilterOptions> = {}): CommitFilterOptions => ({
  contributors: [],
  excludeBots: false,
  includeMergeCommits: true,
  keepMergeCommits: false,
  ...overrides,
});

const hashes = (selected: readonly Commit[]): string[] => selected.map((entry) => entry.hash);

describe("isBotIdentity", () => {
  it.each([
    [{ name: "dependabot[bot]", email: null }, true],
    [{ name: "Renovate Bot", email: null }, true],
    [{ name: "Alice", email: "ci-bot@example.com" }, true],
    [{ name: "Abbott", email: "abbott@example.com" }, false],
    [{ name: "Alice", email: "alice@bot.example.com" }, false],
  ])("classifies %j as %s", (identity, expected) => {
    expect(isBotIdentity(identity)).toBe(expected);
  });
});

describe("filterCommits", () => {
  it("keeps commits inside the window, bounds included", () => {
    expect(hashes(filterCommits(commits, window, options()))).toEqual(["c1", "c2", "c3", "c5"]);
  });

  it("drops bots and merges on request", () => {
    expect(hashes(filterCommits(commits, window, options({ excludeBots: true, includeMergeCommits: false })))).toEqual([
      "c1",
      "c5",
    ]);
  });

  it("keeps merges for metrics that need them", () => {
    const selected = filterCommits(commits, window, options({ includeMergeCommits: false, keepMergeCommits: true }));

    expect(hashes(selected)).toEqual(["c1", "c2", "c3", "c5"]);
  });

  it("matches the allow-list by name or email, ignoring case", () => {
    expect(hashes(filterCommits(commits, window, options({ contributors: ["ALICE@example.com", "bob"] })))).toEqual([
      "c1",
      "c3",
    ]);
  });
});

describe("filterContributors", () => {
  it("applies the allow-list and bot exclusion", () => {
    const contributors = [
      { name: "Alice", email: "alice@example.com", commitCount: 4 },
      { name: "build-bot", email: null, commitCount: 9 },
    ];

    expect(
      filterContributors(contributors, { contributors: [], excludeBots: true, includeMergeCommits: true }),
    ).toEqual([contributors[0]]);
  });
});
