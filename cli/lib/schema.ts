/**
 * Zod schemas for scenario keys, CLI options, worker messages and the
 * JSON report.
 * This is the single source of truth for data crossing a boundary
 * (command line, worker thread, stdout).
 *
 * @module
 */

import { availableParallelism } from "node:os";
import { z } from "zod";

/**
 * Schema version for the JSON report.
 * Increment when making breaking changes to the report format.
 */
export const SCHEMA_VERSION = 1;

/**
 * Workload scenario keys, in display order.
 */
export const SCENARIOS = [
  "balanced",
  "read-heavy",
  "write-heavy",
  "heavy-work",
  "low-volume",
  "serial",
  "scaling",
] as const;

/**
 * Scenario key schema.
 */
export const ScenarioKeySchema = z.enum(SCENARIOS);

/**
 * Scenario key type.
 */
export type ScenarioKey = z.infer<typeof ScenarioKeySchema>;

/**
 * Container categories, used to group results.
 */
export const ContainerCategorySchema = z.enum(["lock", "queue", "cooperative"]);

export type ContainerCategory = z.infer<typeof ContainerCategorySchema>;

/**
 * Shared-memory container kinds that can be rebuilt inside a worker.
 */
export const CounterKindSchema = z.enum([
  "mutex",
  "unfair-lock",
  "allocated-unfair-lock",
  "serial-queue",
  "rw-queue",
]);

export type CounterKind = z.infer<typeof CounterKindSchema>;

/**
 * Everything a worker needs to attach to an existing container: its kind,
 * the buffer holding the synchronization primitive, and the buffer holding
 * the values.
 */
export const CounterHandleSchema = z.object({
  kind: CounterKindSchema,
  lock: z.instanceof(SharedArrayBuffer),
  values: z.instanceof(SharedArrayBuffer),
});

export type CounterHandle = z.infer<typeof CounterHandleSchema>;

/**
 * Message posted to each fan-out worker for one measurement.
 */
export const WorkerRequestSchema = z.object({
  type: z.literal("job"),
  control: z.instanceof(SharedArrayBuffer),
  counter: CounterHandleSchema,
  scenario: ScenarioKeySchema,
  total: z.number().int().nonnegative(),
});

export type WorkerRequest = z.infer<typeof WorkerRequestSchema>;

/**
 * Messages posted back by a fan-out worker.
 */
export const WorkerReplySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ready") }),
  z.object({
    type: z.literal("done"),
    completed: z.number().int().nonnegative(),
  }),
]);

export type WorkerReply = z.infer<typeof WorkerReplySchema>;

/**
 * Bounds of the configurable operation count.
 */
export const MIN_OPERATIONS = 1_000;
export const MAX_OPERATIONS = 50_000;

/**
 * Most worker threads a run may start.
 */
export const MAX_THREADS = availableParallelism() * 4;

/**
 * Options of the `run` command after parsing.
 */
export const RunOptionsSchema = z.object({
  scenario: ScenarioKeySchema,
  operations: z.number().int().min(MIN_OPERATIONS).max(MAX_OPERATIONS),
  threads: z.number().int().min(0).max(MAX_THREADS),
  json: z.boolean(),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

/**
 * Options of the `battery` command after parsing.
 */
export const BatteryOptionsSchema = RunOptionsSchema.pick({
  threads: true,
  json: true,
});

export type BatteryOptions = z.infer<typeof BatteryOptionsSchema>;

/**
 * Spread of the trial durations behind one result.
 * All time values are in milliseconds.
 */
export const BenchmarkStatsSchema = z.object({
  avgTime: z.number().nonnegative(),
  minTime: z.number().nonnegative(),
  maxTime: z.number().nonnegative(),
  stdDev: z.number().nonnegative(),
  p50: z.number().nonnegative(),
});

export type BenchmarkStats = z.infer<typeof BenchmarkStatsSchema>;

/**
 * A single result entry (one container variant).
 */
export const ResultEntrySchema = z.object({
  name: z.string().min(1),
  category: ContainerCategorySchema,
  seconds: z.number().nonnegative().finite(),
  operationCount: z.number().int().positive(),
  opsPerSecond: z.number().nonnegative(),
  stats: BenchmarkStatsSchema,
});

export type ResultEntry = z.infer<typeof ResultEntrySchema>;

/**
 * All results of one scenario, with the fastest/slowest comparison.
 */
export const ScenarioReportSchema = z.object({
  scenario: ScenarioKeySchema,
  title: z.string().min(1),
  results: z.array(ResultEntrySchema).min(1),
  fastest: z.string().min(1),
  slowest: z.string().min(1),
  speedup: z.number().positive().nullable(),
});

export type ScenarioReport = z.infer<typeof ScenarioReportSchema>;

/**
 * Runner environment information.
 */
export const RunnerSchema = z.object({
  os: z.string().min(1),
  arch: z.string().min(1),
  node: z.string().min(1),
  threads: z.number().int().nonnegative(),
});

export type Runner = z.infer<typeof RunnerSchema>;

/**
 * Complete JSON report, validated before it is printed.
 */
export const BenchmarkReportSchema = z.object({
  schemaVersion: z.number().int().min(1),
  command: z.enum(["run", "battery"]),
  timestamp: z.string().datetime(),
  runner: RunnerSchema,
  scenarios: z.array(ScenarioReportSchema).min(1),
});

export type BenchmarkReport = z.infer<typeof BenchmarkReportSchema>;

/**
 * Validate a benchmark report and return the typed report.
 * Throws ZodError if validation fails.
 */
export function validateBenchmarkReport(data: unknown): BenchmarkReport {
  return BenchmarkReportSchema.parse(data);
}
