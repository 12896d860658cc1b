import { describe, test, expect } from "vitest";
import { calculateStats, median } from "./stats.ts";

describe("median", () => {
  test("odd count takes the middle value", () => {
    expect(median([0.5, 0.3, 0.9])).toBe(0.5);
  });

  test("even count averages the two middle values", () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  test("single value", () => {
    expect(median([7])).toBe(7);
  });

  test("does not reorder its input", () => {
    const values = [3, 1, 2];
    median(values);
    expect(values).toEqual([3, 1, 2]);
  });

  test("empty input throws", () => {
    expect(() => median([])).toThrow("Cannot calculate median from empty array");
  });
});

describe("calculateStats", () => {
  test("summarizes the samples", () => {
    const stats = calculateStats([2, 4, 6]);
    expect(stats.avgTime).toBe(4);
    expect(stats.minTime).toBe(2);
    expect(stats.maxTime).toBe(6);
    expect(stats.p50).toBe(4);
    expect(stats.stdDev).toBeCloseTo(Math.sqrt(8 / 3), 10);
  });

  test("empty input throws", () => {
    expect(() => calculateStats([])).toThrow("Cannot calculate stats from empty array");
  });
});
