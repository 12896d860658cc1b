/**
 * Reader/writer queue container.
 *
 * Reads are submitted with `sync` and run concurrently with other reads.
 * Writes are submitted with `barrierSync`: the barrier waits for in-flight
 * work to drain, runs alone, then concurrency resumes. While a barrier is
 * waiting, new reads hold back so barriers are not starved.
 *
 * @module
 */

import type { CounterHandle } from "../lib/schema.ts";
import { SharedSequence } from "./shared-sequence.ts";
import { simulateWork } from "./simulate-work.ts";
import type { SharedCounter } from "./types.ts";

/** Index of the word counting in-flight reads, or EXCLUSIVE. */
const STATE = 0;
/** Index of the word counting barriers waiting to run. */
const WAITING_BARRIERS = 1;

const IDLE = 0;
const EXCLUSIVE = -1;

/**
 * A concurrent queue with barrier submissions.
 */
export class ConcurrentQueue {
  private readonly view: Int32Array;

  constructor(
    readonly label: string,
    readonly buffer: SharedArrayBuffer,
  ) {
    this.view = new Int32Array(buffer);
  }

  static allocate(label: string): ConcurrentQueue {
    return new ConcurrentQueue(label, new SharedArrayBuffer(2 * Int32Array.BYTES_PER_ELEMENT));
  }

  /**
   * Run `work` concurrently with other non-barrier submissions.
   */
  sync<T>(work: () => T): T {
    this.enterShared();
    try {
      return work();
    } finally {
      this.leaveShared();
    }
  }

  /**
   * Run `work` alone, after everything submitted before it has finished.
   */
  barrierSync<T>(work: () => T): T {
    this.enterExclusive();
    try {
      return work();
    } finally {
      this.leaveExclusive();
    }
  }

  private enterShared(): void {
    for (;;) {
      const waiting = Atomics.load(this.view, WAITING_BARRIERS);
      if (waiting > 0) {
        Atomics.wait(this.view, WAITING_BARRIERS, waiting);
        continue;
      }
      const state = Atomics.load(this.view, STATE);
      if (state === EXCLUSIVE) {
        Atomics.wait(this.view, STATE, EXCLUSIVE);
        continue;
      }
      if (Atomics.compareExchange(this.view, STATE, state, state + 1) === state) {
        return;
      }
    }
  }

  private leaveShared(): void {
    if (Atomics.sub(this.view, STATE, 1) === 1) {
      Atomics.notify(this.view, STATE);
    }
  }

  private enterExclusive(): void {
    Atomics.add(this.view, WAITING_BARRIERS, 1);
    for (;;) {
      const state = Atomics.compareExchange(this.view, STATE, IDLE, EXCLUSIVE);
      if (state === IDLE) {
        break;
      }
      Atomics.wait(this.view, STATE, state);
    }
    if (Atomics.sub(this.view, WAITING_BARRIERS, 1) === 1) {
      Atomics.notify(this.view, WAITING_BARRIERS);
    }
  }

  private leaveExclusive(): void {
    Atomics.store(this.view, STATE, IDLE);
    Atomics.notify(this.view, STATE);
  }
}

export class ReaderWriterQueueCounter implements SharedCounter {
  readonly kind = "rw-queue";

  constructor(
    private readonly queue: ConcurrentQueue,
    private readonly values: SharedSequence,
  ) {}

  static create(capacity: number): ReaderWriterQueueCounter {
    return new ReaderWriterQueueCounter(
      ConcurrentQueue.allocate("container.rwqueue"),
      SharedSequence.allocate(capacity),
    );
  }

  static attach(handle: CounterHandle): ReaderWriterQueueCounter {
    return new ReaderWriterQueueCounter(
      new ConcurrentQueue("container.rwqueue", handle.lock),
      new SharedSequence(handle.values),
    );
  }

  write(value: number): void {
    this.queue.barrierSync(() => this.values.append(value));
  }

  read(): number {
    return this.queue.sync(() => this.values.last());
  }

  writeWithSimulatedWork(value: number): void {
    this.queue.barrierSync(() => {
      simulateWork();
      this.values.append(value);
    });
  }

  readWithSimulatedWork(): number {
    return this.queue.sync(() => {
      simulateWork();
      return this.values.last();
    });
  }

  reset(): void {
    this.queue.barrierSync(() => this.values.clear());
  }

  share(): CounterHandle {
    return { kind: this.kind, lock: this.queue.buffer, values: this.values.buffer };
  }
}
