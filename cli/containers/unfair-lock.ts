/**
 * Unfair lock container.
 *
 * The lock is a single Int32 word with three states (unlocked, locked,
 * locked with waiters). A caller first tries to take it with a
 * compare-exchange and a short spin, then parks with `Atomics.wait`.
 * Arriving callers may take the lock ahead of parked ones, so there is
 * no ordering or starvation guarantee.
 *
 * The word lives in its own SharedArrayBuffer, allocated once per
 * container. Everything that uses the lock (including worker threads
 * attaching to the container) refers to that same buffer; the lock is
 * never copied into another buffer.
 *
 * @module
 */

import type { CounterHandle } from "../lib/schema.ts";
import { SharedSequence } from "./shared-sequence.ts";
import { simulateWork } from "./simulate-work.ts";
import type { SharedCounter } from "./types.ts";

const UNLOCKED = 0;
const LOCKED = 1;
const CONTENDED = 2;

const SPIN_LIMIT = 64;

/**
 * A view of the out-of-line lock word.
 */
export type UnfairLock = Int32Array;

/**
 * Allocate a new, unlocked lock word in its own buffer.
 */
export function allocateUnfairLock(): UnfairLock {
  return new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
}

export function unfairLockLock(lock: UnfairLock): void {
  let state = Atomics.compareExchange(lock, 0, UNLOCKED, LOCKED);
  for (let spin = 0; state !== UNLOCKED && spin < SPIN_LIMIT; spin++) {
    state = Atomics.compareExchange(lock, 0, UNLOCKED, LOCKED);
  }
  if (state === UNLOCKED) {
    return;
  }

  if (state !== CONTENDED) {
    state = Atomics.exchange(lock, 0, CONTENDED);
  }
  while (state !== UNLOCKED) {
    Atomics.wait(lock, 0, CONTENDED);
    state = Atomics.exchange(lock, 0, CONTENDED);
  }
}

export function unfairLockUnlock(lock: UnfairLock): void {
  if (Atomics.sub(lock, 0, 1) !== LOCKED) {
    Atomics.store(lock, 0, UNLOCKED);
    Atomics.notify(lock, 0, 1);
  }
}

export class UnfairLockCounter implements SharedCounter {
  readonly kind = "unfair-lock";

  constructor(
    private readonly lock: UnfairLock,
    private readonly values: SharedSequence,
  ) {}

  static create(capacity: number): UnfairLockCounter {
    return new UnfairLockCounter(allocateUnfairLock(), SharedSequence.allocate(capacity));
  }

  static attach(handle: CounterHandle): UnfairLockCounter {
    return new UnfairLockCounter(new Int32Array(handle.lock), new SharedSequence(handle.values));
  }

  write(value: number): void {
    unfairLockLock(this.lock);
    try {
      this.values.append(value);
    } finally {
      unfairLockUnlock(this.lock);
    }
  }

  read(): number {
    unfairLockLock(this.lock);
    try {
      return this.values.last();
    } finally {
      unfairLockUnlock(this.lock);
    }
  }

  writeWithSimulatedWork(value: number): void {
    unfairLockLock(this.lock);
    try {
      simulateWork();
      this.values.append(value);
    } finally {
      unfairLockUnlock(this.lock);
    }
  }

  readWithSimulatedWork(): number {
    unfairLockLock(this.lock);
    try {
      simulateWork();
      return this.values.last();
    } finally {
      unfairLockUnlock(this.lock);
    }
  }

  reset(): void {
    unfairLockLock(this.lock);
    try {
      this.values.clear();
    } finally {
      unfairLockUnlock(this.lock);
    }
  }

  share(): CounterHandle {
    return { kind: this.kind, lock: sharedBufferOf(this.lock), values: this.values.buffer };
  }
}

/**
 * The SharedArrayBuffer behind a lock word.
 */
export function sharedBufferOf(lock: UnfairLock): SharedArrayBuffer {
  const { buffer } = lock;
  if (!(buffer instanceof SharedArrayBuffer)) {
    throw new TypeError("Unfair lock word is not backed by shared memory");
  }
  return buffer;
}
