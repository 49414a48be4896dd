import type { Commit, TableValue } from "@repometrics/core";
import type { ReliabilityConfig } from "../../config.js";
import { secondsToDays, toIsoString, toLocalTime } from "../calendar.js";
import { average, indexOfFirstMax, percentage, round1, round2, round3 } from "../math.js";
import type { MetricDefinition } from "../metric-types.js";

const REVERT_PATTERNS: readonly RegExp[] = [
  /^Revert\s+/i,
  /^This reverts commit/i,
  /reverts?\s+commit/i,
  /^Rollback/i,
  /^Undo\s+/i,
];

const REFERENCED_HASH = /([a-f0-9]{7,40})/i;
const SHORT_HASH_LENGTH = 7;
const FREQUENCY_SAMPLE_SIZE = 10;

export type RevertReason =
  | "Bug fixes"
  | "Test issues"
  | "Breaking changes"
  | "Performance issues"
  | "Security concerns"
  | "Other";

// First match wins.
const REASON_PATTERNS: readonly { reason: RevertReason; pattern: RegExp }[] = [
  { reason: "Bug fixes", pattern: /bug|error|fix|issue|problem/ },
  { reason: "Test issues", pattern: /test|spec|failing/ },
  { reason: "Breaking changes", pattern: /break|broken|regression/ },
  { reason: "Performance issues", pattern: /performance|slow|timeout/ },
  { reason: "Security concerns", pattern: /security|vulnerability/ },
];

export type RevertRow = {
  hash: string;
  author: string;
  committedAt: string;
  subject: string;
  revertedHash: string | null;
  reason: RevertReason;
};

export type AuthorRevertStats = {
  author: string;
  totalCommits: number;
  revertsMade: number;
  commitsReverted: number;
  revertRate: number;
  revertedRate: number;
  reliabilityScore: number;
};

export type RevertRateSummary = {
  totalCommits: number;
  revertCommits: number;
  revertedCommits: number;
  revertRate: number;
  revertedRate: number;
  stabilityScore: number;
  byAuthor: AuthorRevertStats[];
  highRiskAuthors: number;
  mostRevertedAuthor: string | null;
  revertReasons: Partial<Record<RevertReason, number>>;
  peakRevertHour: number | null;
  peakRevertDay: string | null;
  revertFrequency: number;
};

export const isRevertCommit = (subject: string): boolean => {
  const message = subject.trim();
  return REVERT_PATTERNS.some((pattern) => pattern.test(message));
};

/** First hex run of 7-40 characters in the message, lowercased. */
export const referencedHash = (subject: string): string | null => {
  const match = REFERENCED_HASH.exec(subject);
  return match?.[1]?.toLowerCase() ?? null;
};

export const revertReason = (subject: string): RevertReason => {
  const message = subject.toLowerCase();
  return REASON_PATTERNS.find(({ pattern }) => pattern.test(message))?.reason ?? "Other";
};

/** 1 minus the reverted share, floored at 0. */
export const stabilityScore = (reverted: number, total: number): number =>
  total === 0 ? 1 : round3(Math.max(1 - reverted / total, 0));

const rate = (count: number, total: number): number => round2(percentage(count, total));

const authorStats = (
  commits: readonly Commit[],
  reverts: readonly Commit[],
  reverted: readonly Commit[],
): AuthorRevertStats[] => {
  const stats = new Map<string, AuthorRevertStats>();
  const entry = (author: string): AuthorRevertStats => {
    const current = stats.get(author) ?? {
      author,
      totalCommits: 0,
      revertsMade: 0,
      commitsReverted: 0,
      revertRate: 0,
      revertedRate: 0,
      reliabilityScore: 1,
    };
    stats.set(author, current);
    return current;
  };

  for (const commit of commits) {
    entry(commit.authorName).totalCommits += 1;
  }
  for (const commit of reverts) {
    entry(commit.authorName).revertsMade += 1;
  }
  for (const commit of reverted) {
    entry(commit.authorName).commitsReverted += 1;
  }

  return [...stats.values()]
    .map((current) => ({
      ...current,
      revertRate: rate(current.revertsMade, current.totalCommits),
      revertedRate: rate(current.commitsReverted, current.totalCommits),
      reliabilityScore: stabilityScore(current.commitsReverted, current.totalCommits),
    }))
    .sort((left, right) => right.revertedRate - left.revertedRate);
};

const peak = <T extends string | number>(values: readonly T[]): T | null => {
  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  const entries = [...counts.entries()];
  return entries[indexOfFirstMax(entries, ([, count]) => count)]?.[0] ?? null;
};

/** Mean gap in days between the first reverts listed, oldest to newest. */
export const revertFrequency = (reverts: readonly Commit[]): number => {
  const timestamps = reverts
    .slice(0, FREQUENCY_SAMPLE_SIZE)
    .map((commit) => commit.timestamp)
    .sort((a, b) => a - b);
  if (timestamps.length < 2) {
    return 0;
  }

  const gaps = timestamps.slice(1).map((timestamp, index) => secondsToDays(timestamp - (timestamps[index] ?? 0)));
  return round1(average(gaps));
};

export const computeRevertRate = (
  commits: readonly Commit[],
  config: ReliabilityConfig,
): { value: TableValue<RevertRow>; summary: RevertRateSummary } => {
  const reverts = commits.filter((commit) => isRevertCommit(commit.subject));
  const referenced = new Set(
    reverts.map((commit) => referencedHash(commit.subject)).filter((hash): hash is string => hash !== null),
  );
  const reverted = commits.filter((commit) => {
    const hash = commit.hash.toLowerCase();
    return referenced.has(hash.slice(0, SHORT_HASH_LENGTH)) || referenced.has(hash);
  });

  const rows = reverts.map(
    (commit): RevertRow => ({
      hash: commit.hash,
      author: commit.authorName,
      committedAt: toIsoString(commit.timestamp),
      subject: commit.subject,
      revertedHash: referencedHash(commit.subject),
      reason: revertReason(commit.subject),
    }),
  );

  const revertReasons: Partial<Record<RevertReason, number>> = {};
  for (const row of rows) {
    revertReasons[row.reason] = (revertReasons[row.reason] ?? 0) + 1;
  }

  const byAuthor = authorStats(commits, reverts, reverted);
  const localTimes = reverts.map((commit) => toLocalTime(commit.timestamp, commit.utcOffsetMinutes));

  return {
    value: { kind: "table", rows },
    summary: {
      totalCommits: commits.length,
      revertCommits: reverts.length,
      revertedCommits: reverted.length,
      revertRate: rate(reverts.length, commits.length),
      revertedRate: rate(reverted.length, commits.length),
      stabilityScore: stabilityScore(reverted.length, commits.length),
      byAuthor,
      highRiskAuthors: byAuthor.filter((entry) => entry.revertedRate > config.highRevertAuthorRatio).length,
      mostRevertedAuthor: byAuthor[indexOfFirstMax(byAuthor, (entry) => entry.revertedRate)]?.author ?? null,
      revertReasons,
      peakRevertHour: peak(localTimes.map((local) => local.hour)),
      peakRevertDay: peak(localTimes.map((local) => local.weekdayName)),
      revertFrequency: revertFrequency(reverts),
    },
  };
};

export const revertRateMetric: MetricDefinition<TableValue<RevertRow>, RevertRateSummary> = {
  name: "revert_rate",
  category: "reliability",
  description: "Share of commits that revert, or were reverted by, other commits",
  dataPointsLabel: "commits",
  sources: ["commits"],
  requiresMergeCommits: false,
  compute: ({ commits }, config) => ({
    ...computeRevertRate(commits, config.reliability),
    dataPoints: commits.length,
  }),
};
