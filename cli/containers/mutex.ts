/**
 * Fair mutex container.
 *
 * A ticket lock: every caller takes the next ticket and is admitted in
 * ticket order, so waiters are woken first-in, first-out.
 *
 * @module
 */

import type { CounterHandle } from "../lib/schema.ts";
import { SharedSequence } from "./shared-sequence.ts";
import { simulateWork } from "./simulate-work.ts";
import type { SharedCounter } from "./types.ts";

const NEXT_TICKET = 0;
const NOW_SERVING = 1;

/**
 * FIFO mutex over two Int32 words of shared memory.
 */
export class TicketMutex {
  private readonly view: Int32Array;

  constructor(readonly buffer: SharedArrayBuffer) {
    this.view = new Int32Array(buffer);
  }

  static allocate(): TicketMutex {
    return new TicketMutex(new SharedArrayBuffer(2 * Int32Array.BYTES_PER_ELEMENT));
  }

  lock(): void {
    const ticket = Atomics.add(this.view, NEXT_TICKET, 1);
    for (;;) {
      const serving = Atomics.load(this.view, NOW_SERVING);
      if (serving === ticket) {
        return;
      }
      Atomics.wait(this.view, NOW_SERVING, serving);
    }
  }

  unlock(): void {
    Atomics.add(this.view, NOW_SERVING, 1);
    // Every waiter re-checks its own ticket.
    Atomics.notify(this.view, NOW_SERVING);
  }
}

export class MutexCounter implements SharedCounter {
  readonly kind = "mutex";

  constructor(
    private readonly mutex: TicketMutex,
    private readonly values: SharedSequence,
  ) {}

  static create(capacity: number): MutexCounter {
    return new MutexCounter(TicketMutex.allocate(), SharedSequence.allocate(capacity));
  }

  static attach(handle: CounterHandle): MutexCounter {
    return new MutexCounter(new TicketMutex(handle.lock), new SharedSequence(handle.values));
  }

  write(value: number): void {
    this.mutex.lock();
    try {
      this.values.append(value);
    } finally {
      this.mutex.unlock();
    }
  }

  read(): number {
    this.mutex.lock();
    try {
      return this.values.last();
    } finally {
      this.mutex.unlock();
    }
  }

  writeWithSimulatedWork(value: number): void {
    this.mutex.lock();
    try {
      simulateWork();
      this.values.append(value);
    } finally {
      this.mutex.unlock();
    }
  }

  readWithSimulatedWork(): number {
    this.mutex.lock();
    try {
      simulateWork();
      return this.values.last();
    } finally {
      this.mutex.unlock();
    }
  }

  reset(): void {
    this.mutex.lock();
    try {
      this.values.clear();
    } finally {
      this.mutex.unlock();
    }
  }

  share(): CounterHandle {
    return { kind: this.kind, lock: this.mutex.buffer, values: this.values.buffer };
  }
}
