/**
 * Type definitions for the measurement engine.
 *
 * @module
 */

import type { ContainerCategory, ScenarioKey } from "../lib/schema.ts";
import type { FanOutExecutor } from "./executor.ts";

/**
 * The representative duration of one container in one scenario.
 * Immutable once created.
 */
export interface MeasurementResult {
  /** Container name, with a tier suffix in the scaling sweep (e.g., "Mutex (1K)") */
  readonly name: string;
  /** Median trial duration in seconds (the single trial in the scaling sweep) */
  readonly seconds: number;
  readonly operationCount: number;
  readonly category: ContainerCategory;
  /** Raw trial durations in seconds */
  readonly trials: readonly number[];
}

/**
 * Results of the full battery, one list per scenario in run order.
 */
export type BatteryRecord = Map<ScenarioKey, MeasurementResult[]>;

/**
 * A progress notification, emitted as each step completes.
 */
export interface ProgressUpdate {
  status: string;
  step: number;
  total: number;
}

export type ProgressListener = (update: ProgressUpdate) => void;

/**
 * Options for running scenarios.
 */
export interface RunOpts {
  /** Runs the concurrent fan-out of blocking containers */
  executor: FanOutExecutor;
  /** Receives progress updates */
  onProgress?: ProgressListener;
}
