/**
 * battery command implementation.
 *
 * Runs the battery scenarios one after another and reports each scenario
 * on its own.
 *
 * @module
 */

import type { Operation } from "effection";
import { validateBatteryArgs } from "../harness/args.ts";
import { useExecutor } from "../harness/executor.ts";
import { buildBenchmarkReport, renderBatteryReport } from "../harness/report.ts";
import { countBatterySteps, runBattery } from "../harness/runner.ts";
import type { MeasurementResult } from "../harness/types.ts";
import {
  BATTERY_OPERATION_COUNT,
  BATTERY_SCENARIOS,
  getScenario,
  type WorkloadScenario,
} from "../scenarios/mod.ts";
import { printProgress } from "./progress.ts";

/**
 * Run the battery and print one section per scenario.
 */
export function* batteryCommand(args: string[]): Operation<number> {
  const parsed = validateBatteryArgs(args);
  if (!parsed.ok) {
    console.error(`Error parsing ${parsed.context}:`);
    console.error(parsed.error.message);
    return 1;
  }

  const options = parsed.value;

  console.error(`\nRunning battery: ${BATTERY_SCENARIOS.join(", ")}`);
  console.error(`Operations: ${BATTERY_OPERATION_COUNT} per scenario`);
  console.error(
    `Threads: ${options.threads === 0 ? "main thread only" : options.threads}`,
  );
  console.error(`Steps: ${countBatterySteps()}`);
  console.error();

  const executor = yield* useExecutor(options.threads);
  const record = yield* runBattery({ executor, onProgress: printProgress });

  const sections: [WorkloadScenario, MeasurementResult[]][] = [];
  for (const [key, results] of record) {
    sections.push([getScenario(key), results]);
  }

  if (options.json) {
    const report = buildBenchmarkReport("battery", options.threads, sections);
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log();
    for (const line of renderBatteryReport(sections)) {
      console.log(line);
    }
  }

  return 0;
}
