/**
 * Operation dispatcher.
 *
 * Decides, per scenario and operation index, whether an operation is a
 * read or a write and which pair of calls to use. The decision is a
 * repeating pattern over blocks of ten indices, so every container sees the
 * same sequence of reads and writes for a given scenario and count.
 *
 * There are two code paths: one for blocking containers, one for the
 * suspending actor.
 *
 * @module
 */

import type { Operation } from "effection";
import type { IsolatedCounter, SynchronizedCounter } from "../containers/mod.ts";
import type { WorkloadScenario } from "../scenarios/mod.ts";

/**
 * Counts dispatched operations, independently of any container state.
 */
export class OperationTally {
  constructor(
    private readonly view: Int32Array,
    private readonly slot: number,
  ) {}

  /**
   * A tally with its own shared counter word.
   */
  static create(): OperationTally {
    return new OperationTally(new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)), 0);
  }

  get count(): number {
    return Atomics.load(this.view, this.slot);
  }

  record(): void {
    Atomics.add(this.view, this.slot, 1);
  }
}

/**
 * `(index mod 10) < floor(writeRatio * 10)`
 */
export function isWriteOperation(
  scenario: Pick<WorkloadScenario, "writeRatio">,
  index: number,
): boolean {
  return index % 10 < Math.floor(scenario.writeRatio * 10);
}

/**
 * The read/write decisions for indices `0..count-1`.
 */
export function writePattern(
  scenario: Pick<WorkloadScenario, "writeRatio">,
  count: number,
): boolean[] {
  return Array.from({ length: count }, (_, index) => isWriteOperation(scenario, index));
}

/**
 * Perform operation `index` of `scenario` on a blocking container.
 * A write stores the operation index.
 */
export function performOperation(
  counter: SynchronizedCounter,
  scenario: WorkloadScenario,
  index: number,
  tally?: OperationTally,
): void {
  tally?.record();
  const isWrite = isWriteOperation(scenario, index);
  if (scenario.usesSimulatedHeavyWork) {
    if (isWrite) {
      counter.writeWithSimulatedWork(index);
    } else {
      counter.readWithSimulatedWork();
    }
  } else if (isWrite) {
    counter.write(index);
  } else {
    counter.read();
  }
}

/**
 * Perform operation `index` of `scenario` on the actor, suspending until
 * it has been processed.
 */
export function* performIsolatedOperation(
  counter: IsolatedCounter,
  scenario: WorkloadScenario,
  index: number,
  tally?: OperationTally,
): Operation<void> {
  tally?.record();
  const isWrite = isWriteOperation(scenario, index);
  if (scenario.usesSimulatedHeavyWork) {
    if (isWrite) {
      yield* counter.writeWithSimulatedWork(index);
    } else {
      yield* counter.readWithSimulatedWork();
    }
  } else if (isWrite) {
    yield* counter.write(index);
  } else {
    yield* counter.read();
  }
}
