/**
 * run command implementation.
 *
 * Benchmarks every container in one workload scenario.
 *
 * @module
 */

import type { Operation } from "effection";
import { validateRunArgs } from "../harness/args.ts";
import { useExecutor } from "../harness/executor.ts";
import { buildBenchmarkReport, renderScenarioReport } from "../harness/report.ts";
import { runScenario } from "../harness/runner.ts";
import { getScenario, resolveOperationCount } from "../scenarios/mod.ts";
import { printProgress } from "./progress.ts";

/**
 * Run one scenario and print its report.
 */
export function* runCommand(args: string[]): Operation<number> {
  const parsed = validateRunArgs(args);
  if (!parsed.ok) {
    console.error(`Error parsing ${parsed.context}:`);
    console.error(parsed.error.message);
    return 1;
  }

  const options = parsed.value;
  const scenario = getScenario(options.scenario);
  const operations = scenario.isScalingSweep
    ? "100, 1K, 10K, 50K"
    : String(resolveOperationCount(scenario, options.operations));

  console.error(`\nRunning ${scenario.title}`);
  console.error(`Operations: ${operations}`);
  console.error(
    `Threads: ${options.threads === 0 ? "main thread only" : options.threads}`,
  );
  console.error();

  const executor = yield* useExecutor(options.threads);
  const results = yield* runScenario(scenario, options.operations, {
    executor,
    onProgress: printProgress,
  });

  if (options.json) {
    const report = buildBenchmarkReport("run", options.threads, [[scenario, results]]);
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log();
    for (const line of renderScenarioReport(scenario, results)) {
      console.log(line);
    }
  }

  return 0;
}
