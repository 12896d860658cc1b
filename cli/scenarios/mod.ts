/**
 * Workload scenario table.
 *
 * Each scenario is a fixed policy: the read/write mix, how many
 * operations to run, and how the measurement is shaped.
 *
 * @module
 */

import { SCENARIOS, type ScenarioKey } from "../lib/schema.ts";

/**
 * A named workload policy.
 */
export interface WorkloadScenario {
  /** Scenario key (e.g., "read-heavy") */
  readonly key: ScenarioKey;
  /** Display title (e.g., "Read Heavy (90% reads)") */
  readonly title: string;
  /** One-line description for `list` */
  readonly description: string;
  /** Fraction of operations that are writes, 0.0 to 1.0 */
  readonly writeRatio: number;
  /** Overrides the configured operation count when set */
  readonly fixedOperationCount?: number;
  /** Run the CPU-bound variants of read and write inside the critical section */
  readonly usesSimulatedHeavyWork: boolean;
  /** Measure on one thread of control and add the queue-based containers */
  readonly isSequentialOnly: boolean;
  /** Measure once per tier instead of a median at one operation count */
  readonly isScalingSweep: boolean;
}

function define(scenario: WorkloadScenario): WorkloadScenario {
  return Object.freeze(scenario);
}

/**
 * All scenarios, keyed by scenario key.
 */
export const scenarios: Readonly<Record<ScenarioKey, WorkloadScenario>> = Object.freeze({
  balanced: define({
    key: "balanced",
    title: "Balanced (50/50)",
    description: "Equal mix of reads and writes with full concurrency.",
    writeRatio: 0.5,
    usesSimulatedHeavyWork: false,
    isSequentialOnly: false,
    isScalingSweep: false,
  }),
  "read-heavy": define({
    key: "read-heavy",
    title: "Read Heavy (90% reads)",
    description: "90% reads, 10% writes. Simulates caches and config lookups.",
    writeRatio: 0.1,
    usesSimulatedHeavyWork: false,
    isSequentialOnly: false,
    isScalingSweep: false,
  }),
  "write-heavy": define({
    key: "write-heavy",
    title: "Write Heavy (90% writes)",
    description: "90% writes, 10% reads. Simulates logging and metrics.",
    writeRatio: 0.9,
    usesSimulatedHeavyWork: false,
    isSequentialOnly: false,
    isScalingSweep: false,
  }),
  "heavy-work": define({
    key: "heavy-work",
    title: "Heavy Work Inside Lock",
    description: "CPU-bound work inside the critical section. Tests lock hold time impact.",
    writeRatio: 0.5,
    usesSimulatedHeavyWork: true,
    isSequentialOnly: false,
    isScalingSweep: false,
  }),
  "low-volume": define({
    key: "low-volume",
    title: "Low Volume (100 ops)",
    description: "Only 100 operations. Shows overhead with minimal work.",
    writeRatio: 0.5,
    fixedOperationCount: 100,
    usesSimulatedHeavyWork: false,
    isSequentialOnly: false,
    isScalingSweep: false,
  }),
  serial: define({
    key: "serial",
    title: "Serial (No Concurrency)",
    description: "Sequential execution. Shows raw synchronization overhead.",
    writeRatio: 0.5,
    fixedOperationCount: 1000,
    usesSimulatedHeavyWork: false,
    isSequentialOnly: true,
    isScalingSweep: false,
  }),
  scaling: define({
    key: "scaling",
    title: "Scaling Test",
    description: "Tests at 100, 1K, 10K, 50K ops to show scaling behavior.",
    writeRatio: 0.5,
    usesSimulatedHeavyWork: false,
    isSequentialOnly: false,
    isScalingSweep: true,
  }),
});

/**
 * Operation counts of the scaling sweep, smallest first.
 */
export const SCALING_TIERS = [100, 1_000, 10_000, 50_000] as const;

/**
 * Number of measured trials per container outside the scaling sweep.
 */
export const TRIALS_PER_CONTAINER = 3;

/**
 * Scenarios of the full battery, in run order.
 */
export const BATTERY_SCENARIOS: readonly ScenarioKey[] = [
  "balanced",
  "read-heavy",
  "write-heavy",
  "heavy-work",
  "serial",
];

/**
 * Operation count used for every battery scenario.
 */
export const BATTERY_OPERATION_COUNT = 50_000;

/**
 * Get a scenario by key.
 */
export function getScenario(key: ScenarioKey): WorkloadScenario {
  return scenarios[key];
}

/**
 * All scenarios in display order.
 */
export function listScenarios(): WorkloadScenario[] {
  return SCENARIOS.map((key) => scenarios[key]);
}

/**
 * The operation count a scenario actually runs with.
 */
export function resolveOperationCount(
  scenario: WorkloadScenario,
  requested: number,
): number {
  return scenario.fixedOperationCount ?? requested;
}
