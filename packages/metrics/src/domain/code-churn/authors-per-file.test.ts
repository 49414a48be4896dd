import type { Commit } from "@repometrics/core";
import { describe, expect, it } from "vitest";
import { authorshipType, busFactorRisk, collaborationScore, computeAuthorsPerFile } from "./authors-per-file.js";

const commit = (hash: string, authorName: string, filenames: string[]): Commit => ({
  hash,
  authorName,
  authorEmail: null,
  timestamp: 1_759_363_200,
  utcOffsetMinutes: 0,
  subject: "change",
  fileChanges: filenames.map((filename) => ({ filename, additions: 1, deletions: 0 })),
  additions: filenames.length,
  deletions: 0,
});

describe("computeAuthorsPerFile", () => {
  it("lists distinct authors per file with bus-factor risk", () => {
    const { value, summary } = computeAuthorsPerFile([
      commit("c1", "Alice", ["a.ts", "b.ts"]),
      commit("c2", "Bob", ["a.ts"]),
      commit("c3", "Carol", ["a.ts"]),
      commit("c4", "Dave", ["a.ts"]),
      commit("c5", "Bob", ["b.ts"]),
      commit("c6", "Alice", ["c.ts"]),
    ]);

    expect(value.entries).toEqual([
      {
        key: "a.ts",
        attributes: {
          authorCount: 4,
          authors: ["Alice", "Bob", "Carol", "Dave"],
          busFactorRisk: "LOW",
          ownershipType: "COLLABORATIVE",
        },
      },
      {
        key: "b.ts",
        attributes: { authorCount: 2, authors: ["Alice", "Bob"], busFactorRisk: "MEDIUM", ownershipType: "SHARED" },
      },
      {
        key: "c.ts",
        attributes: { authorCount: 1, authors: ["Alice"], busFactorRisk: "HIGH", ownershipType: "SINGLE_OWNER" },
      },
    ]);
    expect(summary).toEqual({
      totalFilesAnalyzed: 3,
      avgAuthorsPerFile: 2.33,
      maxAuthorsPerFile: 4,
      minAuthorsPerFile: 1,
      singleAuthorFiles: 1,
      sharedFiles: 1,
      highlySharedFiles: 1,
      busFactorRiskPercentage: 33.3,
      collaborationScore: 46.7,
    });
  });

  it("handles an empty history", () => {
    const { value, summary } = computeAuthorsPerFile([]);

    expect(value.entries).toEqual([]);
    expect(summary.collaborationScore).toBe(0);
  });
});

describe("authorship classification", () => {
  it.each([
    [1, "HIGH", "SINGLE_OWNER"],
    [3, "MEDIUM", "SHARED"],
    [10, "LOW", "COLLABORATIVE"],
    [11, "LOW", "HIGHLY_COLLABORATIVE"],
  ] as const)("classifies %d authors", (count, risk, type) => {
    expect(busFactorRisk(count)).toBe(risk);
    expect(authorshipType(count)).toBe(type);
  });

  it("clamps the collaboration score at zero", () => {
    expect(collaborationScore([1, 1, 1])).toBe(0);
  });
});
