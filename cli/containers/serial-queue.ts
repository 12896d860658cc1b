/**
 * Serial queue container.
 *
 * Every operation is submitted to a single exclusive queue and the caller
 * blocks until it has run. Submissions run one at a time in submission
 * order. As with a synchronous dispatch onto an idle serial queue, the
 * work item runs on the submitting thread once its turn comes.
 *
 * @module
 */

import type { CounterHandle } from "../lib/schema.ts";
import { TicketMutex } from "./mutex.ts";
import { SharedSequence } from "./shared-sequence.ts";
import { simulateWork } from "./simulate-work.ts";
import type { SharedCounter } from "./types.ts";

/**
 * A FIFO queue of synchronous submissions.
 */
export class SerialQueue {
  constructor(
    readonly label: string,
    private readonly turn: TicketMutex,
  ) {}

  get buffer(): SharedArrayBuffer {
    return this.turn.buffer;
  }

  /**
   * Submit `work` and block until it has run, returning its result.
   */
  sync<T>(work: () => T): T {
    this.turn.lock();
    try {
      return work();
    } finally {
      this.turn.unlock();
    }
  }
}

export class SerialQueueCounter implements SharedCounter {
  readonly kind = "serial-queue";

  private readonly queue: SerialQueue;

  constructor(
    turn: TicketMutex,
    private readonly values: SharedSequence,
  ) {
    this.queue = new SerialQueue("container.queue", turn);
  }

  static create(capacity: number): SerialQueueCounter {
    return new SerialQueueCounter(TicketMutex.allocate(), SharedSequence.allocate(capacity));
  }

  static attach(handle: CounterHandle): SerialQueueCounter {
    return new SerialQueueCounter(new TicketMutex(handle.lock), new SharedSequence(handle.values));
  }

  write(value: number): void {
    this.queue.sync(() => this.values.append(value));
  }

  read(): number {
    return this.queue.sync(() => this.values.last());
  }

  writeWithSimulatedWork(value: number): void {
    this.queue.sync(() => {
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
    this.queue.sync(() => this.values.clear());
  }

  share(): CounterHandle {
    return { kind: this.kind, lock: this.queue.buffer, values: this.values.buffer };
  }
}
