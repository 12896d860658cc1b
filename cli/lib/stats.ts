/**
 * Statistical calculation functions for benchmark results.
 * Pure functions with no Effection dependencies.
 *
 * @module
 */

import type { BenchmarkStats } from "./schema.ts";

/**
 * Calculate statistical metrics from an array of timing samples.
 * All time values are in milliseconds.
 *
 * @param times - Array of timing measurements in milliseconds
 * @returns Computed statistics including avg, min, max, stdDev and median
 * @throws Error if times array is empty
 */
export function calculateStats(times: readonly number[]): BenchmarkStats {
  if (times.length === 0) {
    throw new Error("Cannot calculate stats from empty array");
  }

  const sorted = [...times].sort((a, b) => a - b);
  const sum = times.reduce((a, b) => a + b, 0);
  const avg = sum / times.length;
  const variance =
    times.reduce((acc, t) => acc + (t - avg) ** 2, 0) / times.length;

  return {
    avgTime: avg,
    minTime: sorted[0],
    maxTime: sorted[sorted.length - 1],
    stdDev: Math.sqrt(variance),
    p50: median(sorted),
  };
}

/**
 * The middle value of the samples. An even count averages the two
 * middle values.
 *
 * Trial durations are summarized with this rather than the mean so a
 * single preempted trial does not skew the reported time.
 *
 * @throws Error if values array is empty
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new Error("Cannot calculate median from empty array");
  }

  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[middle - 1] + sorted[middle]) / 2;
  }
  return sorted[middle];
}
