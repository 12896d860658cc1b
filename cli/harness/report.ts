/**
 * Results reporting.
 *
 * Results are only ever compared within one scenario: operation counts and
 * workload shapes differ between scenarios.
 *
 * @module
 */

import { arch, platform } from "node:os";
import { CATEGORY_LABELS } from "../containers/mod.ts";
import { formatDuration, formatOpsPerSecond, opsPerSecond } from "../lib/format.ts";
import {
  ContainerCategorySchema,
  SCHEMA_VERSION,
  validateBenchmarkReport,
  type BenchmarkReport,
  type ContainerCategory,
  type ScenarioReport,
} from "../lib/schema.ts";
import { calculateStats } from "../lib/stats.ts";
import type { WorkloadScenario } from "../scenarios/mod.ts";
import type { MeasurementResult } from "./types.ts";

/**
 * Ranking of one scenario's results.
 */
export interface ScenarioSummary {
  /** Results sorted by ascending duration */
  sorted: MeasurementResult[];
  fastest: MeasurementResult;
  slowest: MeasurementResult;
  /** `slowest.seconds / fastest.seconds`; undefined when they are the same entry */
  speedup: number | undefined;
  /** e.g. "Actor is 4.0x faster than Mutex"; undefined without a speedup */
  statement: string | undefined;
}

/**
 * e.g. 4 -> "4.0x faster"
 */
export function formatSpeedup(speedup: number): string {
  return `${speedup.toFixed(1)}x faster`;
}

/**
 * Sort one scenario's results and compare the fastest with the slowest.
 *
 * @throws Error if results is empty
 */
export function summarize(results: readonly MeasurementResult[]): ScenarioSummary {
  if (results.length === 0) {
    throw new Error("Cannot summarize an empty result list");
  }

  const sorted = [...results].sort((a, b) => a.seconds - b.seconds);
  const fastest = sorted[0];
  const slowest = sorted[sorted.length - 1];

  if (fastest.name === slowest.name || fastest.seconds <= 0) {
    return { sorted, fastest, slowest, speedup: undefined, statement: undefined };
  }

  const speedup = slowest.seconds / fastest.seconds;
  return {
    sorted,
    fastest,
    slowest,
    speedup,
    statement: `${fastest.name} is ${formatSpeedup(speedup)} than ${slowest.name}`,
  };
}

/**
 * Results grouped by category, in category order; empty groups are left out.
 */
export function groupByCategory(
  results: readonly MeasurementResult[],
): [ContainerCategory, MeasurementResult[]][] {
  return ContainerCategorySchema.options
    .map((category): [ContainerCategory, MeasurementResult[]] => [
      category,
      results.filter((result) => result.category === category),
    ])
    .filter(([, group]) => group.length > 0);
}

/**
 * One aligned row: name, duration, throughput.
 */
export function formatResultRow(result: MeasurementResult): string {
  const duration = formatDuration(result.seconds).padStart(12);
  const throughput = formatOpsPerSecond(result.operationCount, result.seconds).padStart(16);
  return `  ${result.name.padEnd(30)} ${duration} ${throughput}`;
}

/**
 * Report lines for a single scenario run, grouped by category.
 */
export function renderScenarioReport(
  scenario: WorkloadScenario,
  results: readonly MeasurementResult[],
): string[] {
  const lines = [`${scenario.title}`, ""];
  for (const [category, group] of groupByCategory(results)) {
    lines.push(`${CATEGORY_LABELS[category]}:`);
    for (const result of group) {
      lines.push(formatResultRow(result));
    }
    lines.push("");
  }

  const { statement } = summarize(results);
  if (statement) {
    lines.push(`Analysis: ${statement}`);
  }
  return lines;
}

/**
 * Report lines for the battery: one section per scenario, fastest first.
 */
export function renderBatteryReport(
  sections: readonly [WorkloadScenario, readonly MeasurementResult[]][],
): string[] {
  const lines: string[] = [];
  for (const [scenario, results] of sections) {
    const { sorted, statement } = summarize(results);
    lines.push(`${scenario.title}:`);
    for (const result of sorted) {
      lines.push(formatResultRow(result));
    }
    if (statement) {
      lines.push(`  ${statement}`);
    }
    lines.push("");
  }
  return lines;
}

/**
 * JSON section for one scenario.
 */
export function toScenarioReport(
  scenario: WorkloadScenario,
  results: readonly MeasurementResult[],
): ScenarioReport {
  const { fastest, slowest, speedup } = summarize(results);
  return {
    scenario: scenario.key,
    title: scenario.title,
    results: results.map((result) => ({
      name: result.name,
      category: result.category,
      seconds: result.seconds,
      operationCount: result.operationCount,
      opsPerSecond: opsPerSecond(result.operationCount, result.seconds),
      stats: calculateStats(result.trials.map((seconds) => seconds * 1000)),
    })),
    fastest: fastest.name,
    slowest: slowest.name,
    speedup: speedup ?? null,
  };
}

/**
 * Build and validate the complete JSON report.
 */
export function buildBenchmarkReport(
  command: BenchmarkReport["command"],
  threads: number,
  sections: readonly [WorkloadScenario, readonly MeasurementResult[]][],
): BenchmarkReport {
  return validateBenchmarkReport({
    schemaVersion: SCHEMA_VERSION,
    command,
    timestamp: new Date().toISOString(),
    runner: {
      os: platform(),
      arch: arch(),
      node: process.versions.node,
      threads,
    },
    scenarios: sections.map(([scenario, results]) => toScenarioReport(scenario, results)),
  });
}
