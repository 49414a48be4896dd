import type { Contributor, DistributionValue } from "@repometrics/core";
import { authorIdentity } from "../identity.js";
import { average, indexOfFirstMax, round2, sum } from "../math.js";
import type { MetricDefinition } from "../metric-types.js";

export type CommitsPerDeveloperSummary = {
  totalContributors: number;
  totalCommits: number;
  averageCommitsPerContributor: number;
  topContributor: string | null;
};

export const computeCommitsPerDeveloper = (
  contributors: readonly Contributor[],
): { value: DistributionValue; summary: CommitsPerDeveloperSummary } => {
  // Array.prototype.sort is stable, so equal counts keep shortlog order.
  const ranked = [...contributors].sort((a, b) => b.commitCount - a.commitCount);
  const counts = contributors.map((contributor) => contributor.commitCount);
  const top = contributors[indexOfFirstMax(contributors, (contributor) => contributor.commitCount)];

  return {
    value: {
      kind: "distribution",
      buckets: ranked.map((contributor) => ({
        bucket: authorIdentity(contributor.name, contributor.email),
        count: contributor.commitCount,
      })),
    },
    summary: {
      totalContributors: contributors.length,
      totalCommits: sum(counts),
      averageCommitsPerContributor: round2(average(counts)),
      topContributor: top?.name ?? null,
    },
  };
};

export const commitsPerDeveloperMetric: MetricDefinition<DistributionValue, CommitsPerDeveloperSummary> = {
  name: "commits_per_developer",
  category: "commit_activity",
  description: "Commit counts per contributor",
  dataPointsLabel: "contributors",
  sources: ["contributors"],
  requiresMergeCommits: false,
  compute: ({ contributors }) => ({
    ...computeCommitsPerDeveloper(contributors),
    dataPoints: contributors.length,
  }),
};
