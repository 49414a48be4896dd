import { describe, expect, it } from "vitest";
import {
  average,
  coefficientOfVariation,
  indexOfFirstMax,
  maxOf,
  median,
  minOf,
  percentage,
  percentile,
  populationStandardDeviation,
  round2,
} from "./math.js";

describe("math helpers", () => {
  it("picks nearest-rank percentiles", () => {
    expect(percentile([1, 2, 3, 4, 5], 50)).toBe(3);
    expect(percentile([1, 2, 3, 4, 5], 95)).toBe(5);
    expect(percentile([5, 1, 4, 2, 3], 25)).toBe(2);
    expect(percentile([], 50)).toBe(0);
  });

  it("takes the midpoint for even-length medians", () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([7])).toBe(7);
    expect(median([])).toBe(0);
  });

  it("computes population spread", () => {
    expect(populationStandardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
    expect(coefficientOfVariation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(0.4);
    expect(coefficientOfVariation([0, 0])).toBe(0);
  });

  it("guards empty and zero denominators", () => {
    expect(average([])).toBe(0);
    expect(percentage(3, 0)).toBe(0);
    expect(round2(Number.NaN)).toBe(0);
  });

  it("finds extremes of lists too long to spread into arguments", () => {
    const values = Array.from({ length: 300_000 }, (_, index) => (index * 7) % 1_000 - 500);

    expect(maxOf(values)).toBe(499);
    expect(minOf(values)).toBe(-500);
    expect(maxOf([])).toBe(0);
    expect(minOf([])).toBe(0);
  });

  it("returns the first index among equal maxima", () => {
    expect(indexOfFirstMax([1, 3, 2, 3], (value) => value)).toBe(1);
    expect(indexOfFirstMax([], (value: number) => value)).toBe(-1);
  });
});
