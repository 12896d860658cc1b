/**
 * list command implementation.
 *
 * @module
 */

import type { Operation } from "effection";
import { listScenarios } from "../scenarios/mod.ts";

/**
 * List the workload scenarios.
 */
export function* listCommand(_args: string[]): Operation<number> {
  console.log("\nWorkload scenarios\n");
  for (const scenario of listScenarios()) {
    const count = scenario.fixedOperationCount
      ? ` [${scenario.fixedOperationCount} ops]`
      : "";
    console.log(`  ${scenario.key.padEnd(12)} ${scenario.title}${count}`);
    console.log(`  ${"".padEnd(12)} ${scenario.description}`);
  }
  return 0;
}
