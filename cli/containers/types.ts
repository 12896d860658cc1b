/**
 * Counter capability shared by every container variant.
 *
 * @module
 */

import type { Operation } from "effection";
import type { CounterHandle, CounterKind } from "../lib/schema.ts";

/**
 * A counter with a blocking calling convention. Every operation holds the
 * container's synchronization primitive for its whole duration.
 *
 * The backing state is an ordered sequence of integers; `read` returns the
 * most recently written value, or 0 when nothing has been written.
 */
export interface SynchronizedCounter {
  write(value: number): void;
  read(): number;
  /** `write` with the simulated CPU work done while holding the primitive */
  writeWithSimulatedWork(value: number): void;
  /** `read` with the simulated CPU work done while holding the primitive */
  readWithSimulatedWork(): number;
  reset(): void;
}

/**
 * A synchronized counter whose state lives in shared memory, so the same
 * container can be attached from a worker thread.
 */
export interface SharedCounter extends SynchronizedCounter {
  readonly kind: CounterKind;
  share(): CounterHandle;
}

/**
 * A counter with a suspending calling convention. Callers are never
 * blocked; they wait for their turn with the single owner of the state.
 */
export interface IsolatedCounter {
  write(value: number): Operation<void>;
  read(): Operation<number>;
  writeWithSimulatedWork(value: number): Operation<void>;
  readWithSimulatedWork(): Operation<number>;
  reset(): Operation<void>;
}
