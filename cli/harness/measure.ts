/**
 * Single measurements.
 *
 * Each function times one pass of `total` operations of a scenario over
 * one container and returns the elapsed wall-clock seconds. Callers reset
 * the container first.
 *
 * @module
 */

import { all, type Operation } from "effection";
import type {
  IsolatedCounter,
  SharedCounter,
  SynchronizedCounter,
} from "../containers/mod.ts";
import { withCounterActor } from "../containers/mod.ts";
import type { WorkloadScenario } from "../scenarios/mod.ts";
import {
  performIsolatedOperation,
  performOperation,
  type OperationTally,
} from "./dispatch.ts";
import type { FanOutExecutor, FanOutResult } from "./executor.ts";

/**
 * Write+read cycles run on every container before anything is measured.
 */
export const WARMUP_CYCLES = 50;

function elapsedSeconds(start: number): number {
  return (performance.now() - start) / 1000;
}

/**
 * Run indices `0..total-1` in order on the calling thread.
 */
export function measureSequential(
  counter: SynchronizedCounter,
  scenario: WorkloadScenario,
  total: number,
): number {
  const start = performance.now();
  for (let i = 0; i < total; i++) {
    performOperation(counter, scenario, i);
  }
  return elapsedSeconds(start);
}

/**
 * Run indices `0..total-1` on the actor, awaiting each before the next.
 */
export function* measureSequentialIsolated(
  counter: IsolatedCounter,
  scenario: WorkloadScenario,
  total: number,
): Operation<number> {
  const start = performance.now();
  for (let i = 0; i < total; i++) {
    yield* performIsolatedOperation(counter, scenario, i);
  }
  return elapsedSeconds(start);
}

/**
 * A timed fan-out and the counts observed after it joined.
 */
export interface ConcurrentMeasurement extends FanOutResult {
  seconds: number;
}

/**
 * Fan `total` operations out over the executor and time until all of them
 * have completed.
 */
export function* measureConcurrent(
  executor: FanOutExecutor,
  counter: SharedCounter,
  scenario: WorkloadScenario,
  total: number,
): Operation<ConcurrentMeasurement> {
  const start = performance.now();
  const counts = yield* executor.fanOut({ counter, scenario, total });
  const seconds = elapsedSeconds(start);
  return { seconds, ...counts };
}

/**
 * Spawn `total` concurrent calls on the actor and time until the whole
 * group has completed.
 */
export function* measureConcurrentIsolated(
  counter: IsolatedCounter,
  scenario: WorkloadScenario,
  total: number,
  tally?: OperationTally,
): Operation<number> {
  const operations: Operation<void>[] = [];
  for (let i = 0; i < total; i++) {
    operations.push(performIsolatedOperation(counter, scenario, i, tally));
  }
  const start = performance.now();
  yield* all(operations);
  return elapsedSeconds(start);
}

/**
 * Warm up the given containers and a throw-away actor.
 */
export function* warmup(counters: readonly SynchronizedCounter[]): Operation<void> {
  for (const counter of counters) {
    for (let i = 0; i < WARMUP_CYCLES; i++) {
      counter.write(i);
      counter.read();
    }
  }
  yield* withCounterActor(function* (actor) {
    for (let i = 0; i < WARMUP_CYCLES; i++) {
      yield* actor.write(i);
      yield* actor.read();
    }
  });
}
