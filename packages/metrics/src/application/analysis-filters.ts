import {
  timeWindowContains,
  type AnalysisOptions,
  type Commit,
  type Contributor,
  type TimeWindow,
} from "@repometrics/core";
import { isMergeCommit } from "../domain/flow/deployment-frequency.js";

type Identity = {
  name: string;
  email: string | null;
};

export const isBotIdentity = ({ name, email }: Identity): boolean => {
  const lowerName = name.toLowerCase();
  const lowerEmail = (email ?? "").toLowerCase();
  if (lowerName.includes("[bot]") || lowerEmail.includes("[bot]")) {
    return true;
  }

  return lowerName.endsWith("bot") || lowerEmail.split("@")[0]?.endsWith("bot") === true;
};

const matchesAllowList = ({ name, email }: Identity, allowList: readonly string[]): boolean => {
  if (allowList.length === 0) {
    return true;
  }

  const lowerName = name.toLowerCase();
  const lowerEmail = email?.toLowerCase() ?? null;
  return allowList.some((entry) => {
    const needle = entry.trim().toLowerCase();
    return needle === lowerName || needle === lowerEmail;
  });
};

const keepIdentity = (identity: Identity, options: AnalysisOptions): boolean =>
  matchesAllowList(identity, options.contributors) && !(options.excludeBots && isBotIdentity(identity));

export type CommitFilterOptions = AnalysisOptions & {
  // deployment detection needs merges whatever the run asked for
  keepMergeCommits: boolean;
};

export const filterCommits = (
  commits: readonly Commit[],
  window: TimeWindow,
  options: CommitFilterOptions,
): Commit[] =>
  commits.filter((commit) => {
    if (!timeWindowContains(window, commit.timestamp)) {
      return false;
    }

    if (!options.includeMergeCommits && !options.keepMergeCommits && isMergeCommit(commit.subject)) {
      return false;
    }

    return keepIdentity({ name: commit.authorName, email: commit.authorEmail }, options);
  });

export const filterContributors = (contributors: readonly Contributor[], options: AnalysisOptions): Contributor[] =>
  contributors.filter((contributor) => keepIdentity(contributor, options));
