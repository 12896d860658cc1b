/**
 * Human-readable formatting of durations and throughput.
 *
 * @module
 */

/**
 * Format a duration given in seconds as milliseconds, e.g. "12.35 ms".
 */
export function formatDuration(seconds: number): string {
  return `${(seconds * 1000).toFixed(2)} ms`;
}

/**
 * Operations per second, or 0 when no time elapsed.
 */
export function opsPerSecond(operationCount: number, seconds: number): number {
  return seconds > 0 ? operationCount / seconds : 0;
}

/**
 * Format throughput with a unit suffix: plain below 1,000,
 * K below 1,000,000, M above.
 */
export function formatOpsPerSecond(operationCount: number, seconds: number): string {
  if (seconds <= 0) {
    return "—";
  }
  const ops = operationCount / seconds;
  if (ops >= 1_000_000) {
    return `${(ops / 1_000_000).toFixed(1)}M ops/s`;
  }
  if (ops >= 1_000) {
    return `${(ops / 1_000).toFixed(1)}K ops/s`;
  }
  return `${ops.toFixed(0)} ops/s`;
}

/**
 * Short label for an operation count tier, e.g. 100 -> "100", 10000 -> "10K".
 */
export function formatTier(operationCount: number): string {
  return operationCount >= 1000 ? `${operationCount / 1000}K` : `${operationCount}`;
}
