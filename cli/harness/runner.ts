/**
 * Scenario runs and the full battery.
 *
 * Non-scaling scenarios measure every container three times and keep the
 * median. The scaling sweep measures every container once per tier. The
 * battery runs its scenarios one after another; only the fan-out inside a
 * single measurement is parallel.
 *
 * @module
 */

import type { Operation } from "effection";
import {
  ACTOR_NAME,
  buildContainers,
  withCounterActor,
  type ContainerVariant,
  type IsolatedCounter,
} from "../containers/mod.ts";
import { formatTier } from "../lib/format.ts";
import { median } from "../lib/stats.ts";
import {
  BATTERY_OPERATION_COUNT,
  BATTERY_SCENARIOS,
  SCALING_TIERS,
  TRIALS_PER_CONTAINER,
  getScenario,
  resolveOperationCount,
  type WorkloadScenario,
} from "../scenarios/mod.ts";
import type { FanOutExecutor } from "./executor.ts";
import {
  WARMUP_CYCLES,
  measureConcurrent,
  measureConcurrentIsolated,
  measureSequential,
  measureSequentialIsolated,
  warmup,
} from "./measure.ts";
import type {
  BatteryRecord,
  MeasurementResult,
  ProgressListener,
  RunOpts,
} from "./types.ts";

/**
 * Number of progress steps of a scenario run with `variantCount` blocking
 * containers (the actor is added here). Warm-up is the first step of a
 * standard run; the scaling sweep counts only its measurements.
 */
export function countSteps(scenario: WorkloadScenario, variantCount: number): number {
  const mechanisms = variantCount + 1;
  if (scenario.isScalingSweep) {
    return mechanisms * SCALING_TIERS.length;
  }
  return mechanisms * TRIALS_PER_CONTAINER + 1;
}

/**
 * Number of progress steps of the full battery.
 */
export function countBatterySteps(): number {
  return BATTERY_SCENARIOS.reduce((steps, key) => {
    const scenario = getScenario(key);
    const variants = buildContainers(scenario, 0).length;
    return steps + (variants + 1) * TRIALS_PER_CONTAINER;
  }, 1);
}

/**
 * Emits numbered progress updates against a known total.
 */
class Progress {
  private step = 0;

  constructor(
    readonly total: number,
    private readonly listener?: ProgressListener,
  ) {}

  /** Announce work without completing a step */
  announce(status: string): void {
    this.listener?.({ status, step: this.step, total: this.total });
  }

  /** Mark one step complete */
  complete(status: string): void {
    this.step++;
    this.listener?.({ status, step: this.step, total: this.total });
  }
}

function capacityFor(operationCount: number): number {
  return operationCount + WARMUP_CYCLES;
}

function* measureBlockingTrial(
  executor: FanOutExecutor,
  variant: ContainerVariant,
  scenario: WorkloadScenario,
  total: number,
): Operation<number> {
  variant.counter.reset();
  if (scenario.isSequentialOnly) {
    return measureSequential(variant.counter, scenario, total);
  }
  const { seconds } = yield* measureConcurrent(executor, variant.counter, scenario, total);
  return seconds;
}

function* measureIsolatedTrial(
  actor: IsolatedCounter,
  scenario: WorkloadScenario,
  total: number,
): Operation<number> {
  yield* actor.reset();
  if (scenario.isSequentialOnly) {
    return yield* measureSequentialIsolated(actor, scenario, total);
  }
  return yield* measureConcurrentIsolated(actor, scenario, total);
}

/**
 * Median-of-3 results for every container and the actor.
 *
 * @param label - Prefix for progress statuses (the scenario title in the battery)
 */
function* measureMedians(
  containers: readonly ContainerVariant[],
  scenario: WorkloadScenario,
  total: number,
  executor: FanOutExecutor,
  progress: Progress,
  label = "",
): Operation<MeasurementResult[]> {
  const results: MeasurementResult[] = [];

  for (const variant of containers) {
    const trials: number[] = [];
    for (let trial = 1; trial <= TRIALS_PER_CONTAINER; trial++) {
      progress.announce(`${label}${variant.name} (${trial}/${TRIALS_PER_CONTAINER})`);
      trials.push(yield* measureBlockingTrial(executor, variant, scenario, total));
      progress.complete(`${label}${variant.name} (${trial}/${TRIALS_PER_CONTAINER})`);
    }
    results.push({
      name: variant.name,
      seconds: median(trials),
      operationCount: total,
      category: variant.category,
      trials,
    });
  }

  const actorTrials = yield* withCounterActor(function* (actor) {
    const trials: number[] = [];
    for (let trial = 1; trial <= TRIALS_PER_CONTAINER; trial++) {
      progress.announce(`${label}${ACTOR_NAME} (${trial}/${TRIALS_PER_CONTAINER})`);
      trials.push(yield* measureIsolatedTrial(actor, scenario, total));
      progress.complete(`${label}${ACTOR_NAME} (${trial}/${TRIALS_PER_CONTAINER})`);
    }
    return trials;
  });
  results.push({
    name: ACTOR_NAME,
    seconds: median(actorTrials),
    operationCount: total,
    category: "cooperative",
    trials: actorTrials,
  });

  return results;
}

/**
 * One trial per container and tier; a fresh actor per tier.
 */
function* measureScalingSweep(
  containers: readonly ContainerVariant[],
  scenario: WorkloadScenario,
  executor: FanOutExecutor,
  progress: Progress,
): Operation<MeasurementResult[]> {
  const results: MeasurementResult[] = [];

  for (const total of SCALING_TIERS) {
    const tier = formatTier(total);

    for (const variant of containers) {
      progress.announce(`${variant.name} @ ${tier}`);
      const seconds = yield* measureBlockingTrial(executor, variant, scenario, total);
      results.push({
        name: `${variant.name} (${tier})`,
        seconds,
        operationCount: total,
        category: variant.category,
        trials: [seconds],
      });
      progress.complete(`${variant.name} @ ${tier}`);
    }

    progress.announce(`${ACTOR_NAME} @ ${tier}`);
    const seconds = yield* withCounterActor((actor) =>
      measureConcurrentIsolated(actor, scenario, total),
    );
    results.push({
      name: `${ACTOR_NAME} (${tier})`,
      seconds,
      operationCount: total,
      category: "cooperative",
      trials: [seconds],
    });
    progress.complete(`${ACTOR_NAME} @ ${tier}`);
  }

  return results;
}

/**
 * Run one scenario.
 *
 * @param operationCount - Requested count; ignored for fixed-count scenarios
 *   and for the scaling sweep
 */
export function* runScenario(
  scenario: WorkloadScenario,
  operationCount: number,
  opts: RunOpts,
): Operation<MeasurementResult[]> {
  const total = resolveOperationCount(scenario, operationCount);
  const largest = scenario.isScalingSweep
    ? SCALING_TIERS[SCALING_TIERS.length - 1]
    : total;
  const containers = buildContainers(scenario, capacityFor(largest));
  const progress = new Progress(countSteps(scenario, containers.length), opts.onProgress);

  progress.announce("Warming up...");
  yield* warmup(containers.map(({ counter }) => counter));

  if (scenario.isScalingSweep) {
    return yield* measureScalingSweep(containers, scenario, opts.executor, progress);
  }

  progress.complete("Warm-up complete");
  return yield* measureMedians(containers, scenario, total, opts.executor, progress);
}

/**
 * Run the battery scenarios at the battery operation count.
 */
export function* runBattery(opts: RunOpts): Operation<BatteryRecord> {
  const progress = new Progress(countBatterySteps(), opts.onProgress);
  const capacity = capacityFor(BATTERY_OPERATION_COUNT);

  progress.announce("Warming up...");
  const warmupContainers = buildContainers(getScenario("serial"), capacity);
  yield* warmup(warmupContainers.map(({ counter }) => counter));
  progress.complete("Warm-up complete");

  const record: BatteryRecord = new Map();
  for (const key of BATTERY_SCENARIOS) {
    const scenario = getScenario(key);
    const containers = buildContainers(scenario, capacity);
    const results = yield* measureMedians(
      containers,
      scenario,
      BATTERY_OPERATION_COUNT,
      opts.executor,
      progress,
      `[${scenario.title}] `,
    );
    record.set(key, results);
  }

  return record;
}
