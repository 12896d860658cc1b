/**
 * Shared control block of one fan-out job and the loop that drains it.
 *
 * Workers claim operation indices from a shared cursor until it passes the
 * total; each claimed index is one operation. The same loop runs in
 * worker threads and, with the inline executor, on the calling thread.
 *
 * @module
 */

import type { SynchronizedCounter } from "../containers/mod.ts";
import type { WorkloadScenario } from "../scenarios/mod.ts";
import { OperationTally, performOperation } from "./dispatch.ts";

const CURSOR = 0;
const COMPLETED = 1;
const DISPATCHED = 2;
const SLOTS = 3;

/**
 * Counts observed after a fan-out joined.
 */
export interface FanOutResult {
  /** Operations that finished */
  completed: number;
  /** Operations handed to the dispatcher */
  dispatched: number;
}

export function createJobControl(): SharedArrayBuffer {
  return new SharedArrayBuffer(SLOTS * Int32Array.BYTES_PER_ELEMENT);
}

export function readJobControl(control: SharedArrayBuffer): FanOutResult {
  const view = new Int32Array(control);
  return {
    completed: Atomics.load(view, COMPLETED),
    dispatched: Atomics.load(view, DISPATCHED),
  };
}

/**
 * Claim and perform operations until none are left.
 *
 * @returns How many operations this caller performed
 */
export function drainJob(
  control: SharedArrayBuffer,
  counter: SynchronizedCounter,
  scenario: WorkloadScenario,
  total: number,
): number {
  const view = new Int32Array(control);
  const tally = new OperationTally(view, DISPATCHED);
  let performed = 0;
  for (;;) {
    const index = Atomics.add(view, CURSOR, 1);
    if (index >= total) {
      return performed;
    }
    performOperation(counter, scenario, index, tally);
    Atomics.add(view, COMPLETED, 1);
    performed++;
  }
}
