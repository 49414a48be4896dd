import type { Commit, KeyedTableValue } from "@repometrics/core";
import { average, clamp, maxOf, minOf, percentage, round1, round2 } from "../math.js";
import type { MetricDefinition } from "../metric-types.js";

export type BusFactorRisk = "HIGH" | "MEDIUM" | "LOW";
export type AuthorshipType = "SINGLE_OWNER" | "SHARED" | "COLLABORATIVE" | "HIGHLY_COLLABORATIVE";

export type FileAuthorship = {
  authorCount: number;
  authors: string[];
  busFactorRisk: BusFactorRisk;
  ownershipType: AuthorshipType;
};

export type AuthorsPerFileSummary = {
  totalFilesAnalyzed: number;
  avgAuthorsPerFile: number;
  maxAuthorsPerFile: number;
  minAuthorsPerFile: number;
  singleAuthorFiles: number;
  sharedFiles: number;
  highlySharedFiles: number;
  busFactorRiskPercentage: number;
  collaborationScore: number;
};

export const busFactorRisk = (authorCount: number): BusFactorRisk => {
  if (authorCount <= 1) {
    return "HIGH";
  }

  return authorCount <= 3 ? "MEDIUM" : "LOW";
};

export const authorshipType = (authorCount: number): AuthorshipType => {
  if (authorCount <= 1) {
    return "SINGLE_OWNER";
  }

  if (authorCount <= 3) {
    return "SHARED";
  }

  return authorCount <= 10 ? "COLLABORATIVE" : "HIGHLY_COLLABORATIVE";
};

/** Shared files earn 50, collaborative ones 100, single-owner files cost 10; averaged per file. */
export const collaborationScore = (authorCounts: readonly number[]): number => {
  if (authorCounts.length === 0) {
    return 0;
  }

  const single = authorCounts.filter((count) => count === 1).length;
  const shared = authorCounts.filter((count) => count > 1 && count <= 3).length;
  const collaborative = authorCounts.filter((count) => count > 3).length;
  const score = (shared * 50 + collaborative * 100 - single * 10) / authorCounts.length;
  return round1(clamp(score, 0, 100));
};

export const computeAuthorsPerFile = (
  commits: readonly Commit[],
): { value: KeyedTableValue<FileAuthorship>; summary: AuthorsPerFileSummary } => {
  const fileAuthors = new Map<string, Set<string>>();

  for (const commit of commits) {
    for (const change of commit.fileChanges) {
      const authors = fileAuthors.get(change.filename) ?? new Set<string>();
      authors.add(commit.authorName);
      fileAuthors.set(change.filename, authors);
    }
  }

  const entries = [...fileAuthors.entries()]
    .map(([filename, authors]) => ({
      key: filename,
      attributes: {
        authorCount: authors.size,
        authors: [...authors].sort(),
        busFactorRisk: busFactorRisk(authors.size),
        ownershipType: authorshipType(authors.size),
      },
    }))
    .sort((a, b) => b.attributes.authorCount - a.attributes.authorCount);

  const counts = entries.map((entry) => entry.attributes.authorCount);
  const single = counts.filter((count) => count === 1).length;

  return {
    value: { kind: "keyed_table", entries },
    summary: {
      totalFilesAnalyzed: entries.length,
      avgAuthorsPerFile: round2(average(counts)),
      maxAuthorsPerFile: maxOf(counts),
      minAuthorsPerFile: minOf(counts),
      singleAuthorFiles: single,
      sharedFiles: counts.filter((count) => count > 1 && count <= 3).length,
      highlySharedFiles: counts.filter((count) => count > 3).length,
      busFactorRiskPercentage: round1(percentage(single, entries.length)),
      collaborationScore: collaborationScore(counts),
    },
  };
};

export const authorsPerFileMetric: MetricDefinition<KeyedTableValue<FileAuthorship>, AuthorsPerFileSummary> = {
  name: "authors_per_file",
  category: "code_churn",
  description: "Distinct authors per file with bus-factor risk",
  dataPointsLabel: "files",
  sources: ["commit_stats"],
  requiresMergeCommits: false,
  compute: ({ commits }) => {
    const result = computeAuthorsPerFile(commits);
    return { ...result, dataPoints: result.value.entries.length };
  },
};
