/**
 * Wrapped unfair lock container.
 *
 * Same primitive as the unfair lock container, behind a wrapper that owns
 * the protected state and only hands it out inside `withLock`.
 *
 * @module
 */

import type { CounterHandle } from "../lib/schema.ts";
import { SharedSequence } from "./shared-sequence.ts";
import { simulateWork } from "./simulate-work.ts";
import type { SharedCounter } from "./types.ts";
import {
  allocateUnfairLock,
  sharedBufferOf,
  unfairLockLock,
  unfairLockUnlock,
  type UnfairLock,
} from "./unfair-lock.ts";

/**
 * An unfair lock that owns the state it protects.
 */
export class AllocatedUnfairLock<State> {
  constructor(
    readonly word: UnfairLock,
    private readonly state: State,
  ) {}

  static create<State>(initialState: State): AllocatedUnfairLock<State> {
    return new AllocatedUnfairLock(allocateUnfairLock(), initialState);
  }

  withLock<R>(body: (state: State) => R): R {
    unfairLockLock(this.word);
    try {
      return body(this.state);
    } finally {
      unfairLockUnlock(this.word);
    }
  }
}

export class AllocatedUnfairLockCounter implements SharedCounter {
  readonly kind = "allocated-unfair-lock";

  private readonly lock: AllocatedUnfairLock<SharedSequence>;
  private readonly valuesBuffer: SharedArrayBuffer;

  constructor(word: UnfairLock, values: SharedSequence) {
    this.lock = new AllocatedUnfairLock(word, values);
    this.valuesBuffer = values.buffer;
  }

  static create(capacity: number): AllocatedUnfairLockCounter {
    return new AllocatedUnfairLockCounter(allocateUnfairLock(), SharedSequence.allocate(capacity));
  }

  static attach(handle: CounterHandle): AllocatedUnfairLockCounter {
    return new AllocatedUnfairLockCounter(new Int32Array(handle.lock), new SharedSequence(handle.values));
  }

  write(value: number): void {
    this.lock.withLock((values) => values.append(value));
  }

  read(): number {
    return this.lock.withLock((values) => values.last());
  }

  writeWithSimulatedWork(value: number): void {
    this.lock.withLock((values) => {
      simulateWork();
      values.append(value);
    });
  }

  readWithSimulatedWork(): number {
    return this.lock.withLock((values) => {
      simulateWork();
      return values.last();
    });
  }

  reset(): void {
    this.lock.withLock((values) => values.clear());
  }

  share(): CounterHandle {
    return { kind: this.kind, lock: sharedBufferOf(this.lock.word), values: this.valuesBuffer };
  }
}
