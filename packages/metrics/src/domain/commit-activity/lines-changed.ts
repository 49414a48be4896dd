import type { Commit, KeyedTableValue } from "@repometrics/core";
import { authorIdentity } from "../identity.js";
import { percentage, round1, round2 } from "../math.js";
import type { MetricDefinition } from "../metric-types.js";

export type AuthorLineStats = {
  additions: number;
  deletions: number;
  netChanges: number;
  totalChanges: number;
  commits: number;
  avgChangesPerCommit: number;
  churnRatio: number;
};

export type LinesChangedSummary = {
  totalAdditions: number;
  totalDeletions: number;
  netAdditions: number;
  totalChanges: number;
  overallChurnRatio: number;
  contributingAuthors: number;
  avgChangesPerAuthor: number;
};

type AuthorAccumulator = {
  additions: number;
  deletions: number;
  commits: number;
};

export const computeLinesChanged = (
  commits: readonly Commit[],
): { value: KeyedTableValue<AuthorLineStats>; summary: LinesChangedSummary } => {
  const byAuthor = new Map<string, AuthorAccumulator>();
  let totalAdditions = 0;
  let totalDeletions = 0;

  for (const commit of commits) {
    const key = authorIdentity(commit.authorName, commit.authorEmail);
    const entry = byAuthor.get(key) ?? { additions: 0, deletions: 0, commits: 0 };
    entry.additions += commit.additions;
    entry.deletions += commit.deletions;
    entry.commits += 1;
    byAuthor.set(key, entry);

    totalAdditions += commit.additions;
    totalDeletions += commit.deletions;
  }

  const entries = [...byAuthor.entries()]
    .map(([key, { additions, deletions, commits: commitCount }]) => {
      const totalChanges = additions + deletions;
      return {
        key,
        attributes: {
          additions,
          deletions,
          netChanges: additions - deletions,
          totalChanges,
          commits: commitCount,
          avgChangesPerCommit: commitCount === 0 ? 0 : round2(totalChanges / commitCount),
          churnRatio: round1(percentage(deletions, totalChanges)),
        },
      };
    })
    .sort((a, b) => b.attributes.totalChanges - a.attributes.totalChanges);

  const totalChanges = totalAdditions + totalDeletions;
  return {
    value: { kind: "keyed_table", entries },
    summary: {
      totalAdditions,
      totalDeletions,
      netAdditions: totalAdditions - totalDeletions,
      totalChanges,
      overallChurnRatio: round1(percentage(totalDeletions, totalChanges)),
      contributingAuthors: entries.length,
      avgChangesPerAuthor: entries.length === 0 ? 0 : round2(totalChanges / entries.length),
    },
  };
};

export const linesChangedMetric: MetricDefinition<KeyedTableValue<AuthorLineStats>, LinesChangedSummary> = {
  name: "lines_changed",
  category: "commit_activity",
  description: "Lines added and deleted per author",
  dataPointsLabel: "commits",
  sources: ["commit_stats"],
  requiresMergeCommits: false,
  compute: ({ commits }) => ({
    ...computeLinesChanged(commits),
    dataPoints: commits.length,
  }),
};
