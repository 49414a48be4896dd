import type { Commit, DistributionValue } from "@repometrics/core";
import type { ReliabilityConfig } from "../../config.js";
import { toLocalTime } from "../calendar.js";
import { average, indexOfFirstMax, percentage, round1, round2, round3 } from "../math.js";
import type { MetricDefinition } from "../metric-types.js";
import { classifyCommitMessage, COMMIT_KINDS, type CommitKind } from "./commit-classifier.js";

const URGENT_KEYWORDS = ["urgent", "critical", "hotfix", "emergency", "immediate", "asap"] as const;

export type AuthorBugfixStats = {
  author: string;
  totalCommits: number;
  bugfixCommits: number;
  featureCommits: number;
  maintenanceCommits: number;
  bugfixRatio: number;
  featureRatio: number;
  qualityScore: number;
};

export type BugfixTimePatterns = {
  peakHour: number;
  peakDay: string;
  urgentFixes: number;
  urgentRatio: number;
};

export type BugfixRatioSummary = {
  totalCommits: number;
  bugfixCommits: number;
  featureCommits: number;
  maintenanceCommits: number;
  bugfixRatio: number;
  featureRatio: number;
  maintenanceRatio: number;
  qualityScore: number;
  byAuthor: AuthorBugfixStats[];
  highBugfixAuthors: number;
  mostReliableAuthor: string | null;
  bugfixTrend: number;
  timePatterns: BugfixTimePatterns | null;
};

/** Share of feature work among fixes and features, 0..1; 1 when there is neither. */
export const qualityScore = (bugfixCommits: number, featureCommits: number): number => {
  const productive = bugfixCommits + featureCommits;
  return productive === 0 ? 1 : round3(featureCommits / productive);
};

const ratio = (count: number, total: number): number => round2(percentage(count, total));

const countBy = <T>(items: readonly T[], key: (item: T) => string): Map<string, number> => {
  const counts = new Map<string, number>();
  for (const item of items) {
    const current = key(item);
    counts.set(current, (counts.get(current) ?? 0) + 1);
  }
  return counts;
};

const peakKey = (counts: ReadonlyMap<string, number>): string | undefined => {
  const entries = [...counts.entries()];
  return entries[indexOfFirstMax(entries, ([, count]) => count)]?.[0];
};

/**
 * Percent change between the mean monthly bugfix count of the older and the newer half
 * of the months seen. With an odd count the middle month belongs to neither half.
 */
export const bugfixTrend = (bugfixes: readonly Commit[]): number => {
  const monthly = countBy(bugfixes, (commit) => toLocalTime(commit.timestamp, commit.utcOffsetMinutes).date.slice(0, 7));
  const months = [...monthly.keys()].sort();
  if (months.length < 2) {
    return 0;
  }

  const half = Math.floor(months.length / 2);
  const monthAverage = (selected: readonly string[]): number =>
    average(selected.map((month) => monthly.get(month) ?? 0));
  const older = monthAverage(months.slice(0, half));
  const newer = monthAverage(months.slice(months.length - half));

  return older === 0 ? 0 : round1(((newer - older) / older) * 100);
};

const timePatterns = (bugfixes: readonly Commit[]): BugfixTimePatterns | null => {
  if (bugfixes.length === 0) {
    return null;
  }

  const localTimes = bugfixes.map((commit) => toLocalTime(commit.timestamp, commit.utcOffsetMinutes));
  const urgentFixes = bugfixes.reduce((total, commit) => {
    const message = commit.subject.toLowerCase();
    return total + URGENT_KEYWORDS.filter((keyword) => message.includes(keyword)).length;
  }, 0);

  return {
    peakHour: Number(peakKey(countBy(localTimes, (local) => String(local.hour))) ?? 0),
    peakDay: peakKey(countBy(localTimes, (local) => local.weekdayName)) ?? "Sunday",
    urgentFixes,
    urgentRatio: ratio(urgentFixes, bugfixes.length),
  };
};

const authorStats = (commits: readonly Commit[], kinds: readonly CommitKind[]): AuthorBugfixStats[] => {
  const stats = new Map<string, AuthorBugfixStats>();

  commits.forEach((commit, index) => {
    const current = stats.get(commit.authorName) ?? {
      author: commit.authorName,
      totalCommits: 0,
      bugfixCommits: 0,
      featureCommits: 0,
      maintenanceCommits: 0,
      bugfixRatio: 0,
      featureRatio: 0,
      qualityScore: 1,
    };
    current.totalCommits += 1;
    const kind = kinds[index];
    if (kind === "bugfix") {
      current.bugfixCommits += 1;
    } else if (kind === "feature") {
      current.featureCommits += 1;
    } else if (kind === "maintenance") {
      current.maintenanceCommits += 1;
    }
    stats.set(commit.authorName, current);
  });

  return [...stats.values()]
    .map((entry) => ({
      ...entry,
      bugfixRatio: ratio(entry.bugfixCommits, entry.totalCommits),
      featureRatio: ratio(entry.featureCommits, entry.totalCommits),
      qualityScore: qualityScore(entry.bugfixCommits, entry.featureCommits),
    }))
    .sort((left, right) => right.bugfixRatio - left.bugfixRatio);
};

export const computeBugfixRatio = (
  commits: readonly Commit[],
  config: ReliabilityConfig,
): { value: DistributionValue; summary: BugfixRatioSummary } => {
  const kinds = commits.map((commit) => classifyCommitMessage(commit.subject));
  const counts = countBy(kinds, (kind) => kind);
  const count = (kind: CommitKind): number => counts.get(kind) ?? 0;
  const bugfixes = commits.filter((_, index) => kinds[index] === "bugfix");
  const byAuthor = authorStats(commits, kinds);

  return {
    value: {
      kind: "distribution",
      buckets: commits.length === 0 ? [] : COMMIT_KINDS.map((kind) => ({ bucket: kind, count: count(kind) })),
    },
    summary: {
      totalCommits: commits.length,
      bugfixCommits: count("bugfix"),
      featureCommits: count("feature"),
      maintenanceCommits: count("maintenance"),
      bugfixRatio: ratio(count("bugfix"), commits.length),
      featureRatio: ratio(count("feature"), commits.length),
      maintenanceRatio: ratio(count("maintenance"), commits.length),
      qualityScore: qualityScore(count("bugfix"), count("feature")),
      byAuthor,
      highBugfixAuthors: byAuthor.filter((entry) => entry.bugfixRatio > config.highBugfixAuthorRatio).length,
      mostReliableAuthor: byAuthor[indexOfFirstMax(byAuthor, (entry) => entry.qualityScore)]?.author ?? null,
      bugfixTrend: bugfixTrend(bugfixes),
      timePatterns: timePatterns(bugfixes),
    },
  };
};

export const bugfixRatioMetric: MetricDefinition<DistributionValue, BugfixRatioSummary> = {
  name: "bugfix_ratio",
  category: "reliability",
  description: "Proportion of bugfix commits against feature and maintenance work",
  dataPointsLabel: "commits",
  sources: ["commits"],
  requiresMergeCommits: false,
  compute: ({ commits }, config) => ({
    ...computeBugfixRatio(commits, config.reliability),
    dataPoints: commits.length,
  }),
};
