import type { Commit, KeyedTableValue } from "@repometrics/core";
import type { CoChangeConfig, MetricsConfig } from "../../config.js";
import { average, maxOf, round1, round3 } from "../math.js";
import type { MetricDefinition } from "../metric-types.js";

export type CouplingCategory = "HIGH" | "MEDIUM" | "LOW" | "MINIMAL";

export type FilePairStats = {
  file1: string;
  file2: string;
  coChanges: number;
  file1TotalChanges: number;
  file2TotalChanges: number;
  couplingStrength: number;
  couplingPercentage: number;
  couplingCategory: CouplingCategory;
};

export type ArchitecturalHotspot = {
  filename: string;
  coupledFiles: number;
};

export type CoChangePairsSummary = {
  totalFilePairs: number;
  avgCouplingStrength: number;
  maxCouplingStrength: number;
  highCouplingPairs: number;
  mediumCouplingPairs: number;
  lowCouplingPairs: number;
  architecturalHotspots: ArchitecturalHotspot[];
};

const PAIR_SEPARATOR = " <-> ";

export const pairKey = (file1: string, file2: string): string =>
  file1 < file2 ? `${file1}${PAIR_SEPARATOR}${file2}` : `${file2}${PAIR_SEPARATOR}${file1}`;

/** Jaccard similarity of the two files' commit sets. */
export const couplingStrength = (coChanges: number, total1: number, total2: number): number => {
  if (total1 === 0 || total2 === 0) {
    return 0;
  }

  const union = total1 + total2 - coChanges;
  return union === 0 ? 0 : round3(coChanges / union);
};

export const couplingCategory = (strength: number): CouplingCategory => {
  if (strength > 0.5) {
    return "HIGH";
  }

  if (strength >= 0.2) {
    return "MEDIUM";
  }

  return strength >= 0.1 ? "LOW" : "MINIMAL";
};

const findHotspots = (pairs: readonly FilePairStats[], config: CoChangeConfig): ArchitecturalHotspot[] => {
  const coupledCounts = new Map<string, number>();

  for (const pair of pairs) {
    if (pair.couplingStrength <= config.hotspotStrengthThreshold) {
      continue;
    }

    coupledCounts.set(pair.file1, (coupledCounts.get(pair.file1) ?? 0) + 1);
    coupledCounts.set(pair.file2, (coupledCounts.get(pair.file2) ?? 0) + 1);
  }

  return [...coupledCounts.entries()]
    .filter(([, count]) => count >= config.hotspotMinPairs)
    .map(([filename, coupledFiles]) => ({ filename, coupledFiles }))
    .sort((a, b) => b.coupledFiles - a.coupledFiles);
};

export const computeCoChangePairs = (
  commits: readonly Commit[],
  config: MetricsConfig,
): { value: KeyedTableValue<FilePairStats>; summary: CoChangePairsSummary } => {
  const fileTotals = new Map<string, number>();
  const pairCounts = new Map<string, { file1: string; file2: string; count: number }>();

  for (const commit of commits) {
    const files = [...new Set(commit.fileChanges.map((change) => change.filename))].sort();

    for (const file of files) {
      fileTotals.set(file, (fileTotals.get(file) ?? 0) + 1);
    }

    for (let i = 0; i < files.length; i += 1) {
      for (let j = i + 1; j < files.length; j += 1) {
        const file1 = files[i];
        const file2 = files[j];
        if (file1 === undefined || file2 === undefined) {
          continue;
        }

        const key = pairKey(file1, file2);
        const existing = pairCounts.get(key);
        if (existing === undefined) {
          pairCounts.set(key, { file1, file2, count: 1 });
        } else {
          existing.count += 1;
        }
      }
    }
  }

  const entries = [...pairCounts.entries()]
    .map(([key, { file1, file2, count }]) => {
      const total1 = fileTotals.get(file1) ?? 0;
      const total2 = fileTotals.get(file2) ?? 0;
      const strength = couplingStrength(count, total1, total2);
      const smaller = Math.min(total1, total2);

      return {
        key,
        attributes: {
          file1,
          file2,
          coChanges: count,
          file1TotalChanges: total1,
          file2TotalChanges: total2,
          couplingStrength: strength,
          couplingPercentage: smaller === 0 ? 0 : round1((count / smaller) * 100),
          couplingCategory: couplingCategory(strength),
        },
      };
    })
    .sort((a, b) => b.attributes.couplingStrength - a.attributes.couplingStrength);

  const pairs = entries.map((entry) => entry.attributes);
  const strengths = pairs.map((pair) => pair.couplingStrength);

  return {
    value: { kind: "keyed_table", entries },
    summary: {
      totalFilePairs: pairs.length,
      avgCouplingStrength: round3(average(strengths)),
      maxCouplingStrength: maxOf(strengths),
      highCouplingPairs: strengths.filter((value) => value > 0.5).length,
      mediumCouplingPairs: strengths.filter((value) => value > 0.2 && value <= 0.5).length,
      lowCouplingPairs: strengths.filter((value) => value <= 0.2).length,
      architecturalHotspots: findHotspots(pairs, config.coChange),
    },
  };
};

export const coChangePairsMetric: MetricDefinition<KeyedTableValue<FilePairStats>, CoChangePairsSummary> = {
  name: "co_change_pairs",
  category: "code_churn",
  description: "Files that change together, by Jaccard coupling strength",
  dataPointsLabel: "file pairs",
  sources: ["commit_stats"],
  requiresMergeCommits: false,
  compute: ({ commits }, config) => {
    const result = computeCoChangePairs(commits, config);
    return { ...result, dataPoints: result.value.entries.length };
  },
};
