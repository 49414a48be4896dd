import type { Tag } from "@repometrics/core";

export const PRODUCTION_TAG_PATTERNS: readonly RegExp[] = [
  // semantic versions
  /^v?\d+\.\d+\.\d+$/,
  /^v?\d+\.\d+\.\d+[-_](alpha|beta|rc\d*)/i,
  /^release[-_]v?\d+\.\d+/,
  // environment markers
  /^prod[-_]/i,
  /^production[-_]/i,
  /[-_]prod$/i,
  /[-_]release$/i,
  /^deploy[-_]/i,
  /[-_]deploy$/i,
  // calendar versions: v2025.10.02, v2025.10.02.1
  /^v\d{4}\.\d{2}\.\d{2}(\.\d+)?$/,
  /^v\d{4}\.\d{2}\.\d{2}(\.\d+)?[-_](alpha|beta|rc\d*)/i,
  // compact dates: v20250630, v20250630.2, v20241024_1
  /^v\d{8}(\.\d+)?$/,
  /^v\d{8}(\.\d+)?[-_](alpha|beta|rc\d*)/i,
  /^v\d{8}[-_]\d+$/,
  // bare build numbers: v31
  /^v\d+$/,
];

export type ProductionTagMatcher = {
  readonly patterns: readonly RegExp[];
  isProductionTag: (name: string | null | undefined) => boolean;
  filterProductionTags: <T extends Pick<Tag, "name">>(tags: readonly T[]) => T[];
};

export const createProductionTagMatcher = (
  patterns: readonly RegExp[] = PRODUCTION_TAG_PATTERNS,
): ProductionTagMatcher => {
  const isProductionTag = (name: string | null | undefined): boolean => {
    if (name === null || name === undefined || name.length === 0) {
      return false;
    }

    return patterns.some((pattern) => pattern.test(name));
  };

  return {
    patterns,
    isProductionTag,
    filterProductionTags: (tags) => tags.filter((tag) => isProductionTag(tag.name)),
  };
};
