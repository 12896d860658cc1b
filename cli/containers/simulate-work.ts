/**
 * Synthetic CPU cost run inside a critical section.
 *
 * @module
 */

/**
 * Iterations of the simulated work loop. Identical for every container.
 */
export const SIMULATED_WORK_ITERATIONS = 100;

/**
 * Sum of squares below {@link SIMULATED_WORK_ITERATIONS}.
 */
export function simulateWork(): number {
  let result = 0;
  for (let i = 0; i < SIMULATED_WORK_ITERATIONS; i++) {
    result += i * i;
  }
  return result;
}
