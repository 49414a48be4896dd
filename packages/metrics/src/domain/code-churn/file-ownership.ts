import type { Commit, KeyedTableValue } from "@repometrics/core";
import { toIsoString } from "../calendar.js";
import { average, indexOfFirstMax, maxOf, percentage, round1, round2 } from "../math.js";
import type { MetricDefinition } from "../metric-types.js";

export type OwnershipType =
  | "SINGLE_OWNER"
  | "DOMINANT_OWNER"
  | "PRIMARY_OWNER"
  | "SHARED_OWNERSHIP"
  | "DISTRIBUTED_OWNERSHIP";

export type OwnershipShare = {
  author: string;
  percentage: number;
};

export type FileOwnership = {
  primaryOwner: string;
  primaryOwnerPercentage: number;
  lastModifiedBy: string;
  lastModifiedDate: string;
  totalCommits: number;
  totalChanges: number;
  contributorCount: number;
  ownershipDistribution: OwnershipShare[];
  ownershipConcentration: number;
  ownershipType: OwnershipType;
};

export type FileOwnershipSummary = {
  totalFilesAnalyzed: number;
  avgOwnershipConcentration: number;
  highlyConcentratedFiles: number;
  moderatelyConcentratedFiles: number;
  distributedOwnershipFiles: number;
  singleOwnerFiles: number;
};

type FileTouch = {
  author: string;
  timestamp: number;
  changes: number;
};

/** Herfindahl-Hirschman index of the ownership shares on a 0-100 scale. */
export const ownershipConcentration = (percentages: readonly number[]): number => {
  if (percentages.length <= 1) {
    return 100;
  }

  const hhi = percentages.reduce((total, share) => total + (share / 100) ** 2, 0);
  return round1(hhi * 100);
};

export const ownershipType = (percentages: readonly number[]): OwnershipType => {
  if (percentages.length === 1) {
    return "SINGLE_OWNER";
  }

  const maxShare = maxOf(percentages);
  if (maxShare >= 80) {
    return "DOMINANT_OWNER";
  }

  if (maxShare >= 60) {
    return "PRIMARY_OWNER";
  }

  return maxShare >= 40 ? "SHARED_OWNERSHIP" : "DISTRIBUTED_OWNERSHIP";
};

const describeFile = (touches: readonly FileTouch[]): FileOwnership | null => {
  const totalChanges = touches.reduce((total, touch) => total + touch.changes, 0);
  // Binary-only files change no lines; weigh each commit instead.
  const weight = (touch: FileTouch): number => (totalChanges > 0 ? touch.changes : 1);
  const totalWeight = touches.reduce((total, touch) => total + weight(touch), 0);

  const byAuthor = new Map<string, number>();
  for (const touch of touches) {
    byAuthor.set(touch.author, (byAuthor.get(touch.author) ?? 0) + weight(touch));
  }

  const authorWeights = [...byAuthor.entries()];
  const primary = authorWeights[indexOfFirstMax(authorWeights, ([, value]) => value)];
  const chronological = [...touches].sort((a, b) => a.timestamp - b.timestamp);
  const lastTouch = chronological[chronological.length - 1];
  if (primary === undefined || lastTouch === undefined) {
    return null;
  }

  const shares = authorWeights.map(([author, value]) => ({
    author,
    percentage: round1(percentage(value, totalWeight)),
  }));
  const percentages = shares.map((share) => share.percentage);

  return {
    primaryOwner: primary[0],
    primaryOwnerPercentage: round1(percentage(primary[1], totalWeight)),
    lastModifiedBy: lastTouch.author,
    lastModifiedDate: toIsoString(lastTouch.timestamp),
    totalCommits: touches.length,
    totalChanges,
    contributorCount: byAuthor.size,
    ownershipDistribution: [...shares].sort((a, b) => b.percentage - a.percentage),
    ownershipConcentration: ownershipConcentration(percentages),
    ownershipType: ownershipType(percentages),
  };
};

export const computeFileOwnership = (
  commits: readonly Commit[],
): { value: KeyedTableValue<FileOwnership>; summary: FileOwnershipSummary } => {
  const touchesByFile = new Map<string, FileTouch[]>();

  for (const commit of commits) {
    for (const change of commit.fileChanges) {
      const touches = touchesByFile.get(change.filename) ?? [];
      touches.push({
        author: commit.authorName,
        timestamp: commit.timestamp,
        changes: change.additions + change.deletions,
      });
      touchesByFile.set(change.filename, touches);
    }
  }

  const entries: { key: string; attributes: FileOwnership }[] = [];
  for (const [filename, touches] of touchesByFile) {
    const attributes = describeFile(touches);
    if (attributes !== null) {
      entries.push({ key: filename, attributes });
    }
  }
  entries.sort((a, b) => b.attributes.ownershipConcentration - a.attributes.ownershipConcentration);

  const concentrations = entries.map((entry) => entry.attributes.ownershipConcentration);
  return {
    value: { kind: "keyed_table", entries },
    summary: {
      totalFilesAnalyzed: entries.length,
      avgOwnershipConcentration: round2(average(concentrations)),
      highlyConcentratedFiles: concentrations.filter((value) => value > 80).length,
      moderatelyConcentratedFiles: concentrations.filter((value) => value > 50 && value <= 80).length,
      distributedOwnershipFiles: concentrations.filter((value) => value <= 50).length,
      singleOwnerFiles: entries.filter((entry) => entry.attributes.contributorCount === 1).length,
    },
  };
};

export const fileOwnershipMetric: MetricDefinition<KeyedTableValue<FileOwnership>, FileOwnershipSummary> = {
  name: "file_ownership",
  category: "code_churn",
  description: "Ownership concentration per file by lines changed",
  dataPointsLabel: "files",
  sources: ["commit_stats"],
  requiresMergeCommits: false,
  compute: ({ commits }) => {
    const result = computeFileOwnership(commits);
    return { ...result, dataPoints: result.value.entries.length };
  },
};
