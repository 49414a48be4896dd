export const roundTo = (value: number, digits: number): number =>
  Number.isFinite(value) ? Number(value.toFixed(digits)) : 0;

export const round1 = (value: number): number => roundTo(value, 1);
export const round2 = (value: number): number => roundTo(value, 2);
export const round3 = (value: number): number => roundTo(value, 3);

export const sum = (values: readonly number[]): number => values.reduce((total, current) => total + current, 0);

/** Largest value, or 0 for an empty list. Loops so large inputs never hit the argument limit. */
export const maxOf = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }

  let best = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    if (value > best) {
      best = value;
    }
  }
  return best;
};

/** Smallest value, or 0 for an empty list. */
export const minOf = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }

  let best = Number.POSITIVE_INFINITY;
  for (const value of values) {
    if (value < best) {
      best = value;
    }
  }
  return best;
};

export const average = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }

  return sum(values) / values.length;
};

/** Middle value of the sorted input; the mean of the two middle values for even counts. */
export const median = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return sorted[middle] ?? 0;
  }

  return ((sorted[middle - 1] ?? 0) + (sorted[middle] ?? 0)) / 2;
};

/** Nearest-rank percentile: the element at `round(p / 100 * (n - 1))` of the sorted input. */
export const percentile = (values: readonly number[], p: number): number => {
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const bounded = Math.min(100, Math.max(0, p));
  const index = Math.round((bounded / 100) * (sorted.length - 1));
  return sorted[index] ?? 0;
};

export const populationStandardDeviation = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }

  const mean = average(values);
  const variance = average(values.map((value) => (value - mean) ** 2));
  return Math.sqrt(variance);
};

/** Standard deviation over mean; 0 when the mean is 0. */
export const coefficientOfVariation = (values: readonly number[]): number => {
  const mean = average(values);
  if (mean === 0) {
    return 0;
  }

  return populationStandardDeviation(values) / mean;
};

export const clamp = (value: number, lower: number, upper: number): number => Math.min(upper, Math.max(lower, value));

export const percentage = (part: number, total: number): number => (total === 0 ? 0 : (part / total) * 100);

/**
 * Index of the first maximum, in input order. Returns -1 for an empty list.
 */
export const indexOfFirstMax = <T>(items: readonly T[], score: (item: T) => number): number => {
  let bestIndex = -1;
  let bestScore = Number.NEGATIVE_INFINITY;

  items.forEach((item, index) => {
    const current = score(item);
    if (current > bestScore) {
      bestScore = current;
      bestIndex = index;
    }
  });

  return bestIndex;
};
