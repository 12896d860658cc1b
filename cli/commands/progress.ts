/**
 * Progress output shared by the run and battery commands.
 *
 * @module
 */

import type { ProgressUpdate } from "../harness/types.ts";

/**
 * Print a progress update to stderr, keeping stdout for the report.
 */
export function printProgress({ status, step, total }: ProgressUpdate): void {
  console.error(`  [${step}/${total}] ${status}`);
}
