/**
 * Container registry.
 *
 * Builds the container variants measured for a scenario and re-attaches
 * shared containers inside worker threads.
 *
 * @module
 */

import type { ContainerCategory, CounterHandle } from "../lib/schema.ts";
import type { WorkloadScenario } from "../scenarios/mod.ts";
import { AllocatedUnfairLockCounter } from "./allocated-unfair-lock.ts";
import { MutexCounter } from "./mutex.ts";
import { ReaderWriterQueueCounter } from "./rw-queue.ts";
import { SerialQueueCounter } from "./serial-queue.ts";
import type { SharedCounter } from "./types.ts";
import { UnfairLockCounter } from "./unfair-lock.ts";

export type { IsolatedCounter, SharedCounter, SynchronizedCounter } from "./types.ts";
export { useCounterActor, withCounterActor } from "./actor.ts";

/**
 * One blocking container measured in a run.
 */
export interface ContainerVariant {
  /** Display name (e.g., "Mutex") */
  name: string;
  counter: SharedCounter;
  category: Exclude<ContainerCategory, "cooperative">;
}

/**
 * Display name of the cooperative-scheduling variant.
 */
export const ACTOR_NAME = "Actor";

/**
 * Section headings for each category.
 */
export const CATEGORY_LABELS: Record<ContainerCategory, string> = {
  lock: "Locks",
  queue: "Queues",
  cooperative: "Cooperative Scheduling",
};

/**
 * Build fresh blocking containers for a scenario.
 * The queue-based containers only take part in sequential-only scenarios.
 *
 * @param capacity - Most values any single measurement will write
 */
export function buildContainers(
  scenario: WorkloadScenario,
  capacity: number,
): ContainerVariant[] {
  const containers: ContainerVariant[] = [
    { name: "Mutex", counter: MutexCounter.create(capacity), category: "lock" },
    { name: "Unfair Lock", counter: UnfairLockCounter.create(capacity), category: "lock" },
    {
      name: "Allocated Unfair Lock",
      counter: AllocatedUnfairLockCounter.create(capacity),
      category: "lock",
    },
  ];

  if (scenario.isSequentialOnly) {
    containers.push(
      { name: "Serial Queue", counter: SerialQueueCounter.create(capacity), category: "queue" },
      { name: "RW Queue", counter: ReaderWriterQueueCounter.create(capacity), category: "queue" },
    );
  }

  return containers;
}

/**
 * Rebuild a shared container from its handle.
 * Uses exhaustive switch for type safety.
 */
export function attachCounter(handle: CounterHandle): SharedCounter {
  switch (handle.kind) {
    case "mutex":
      return MutexCounter.attach(handle);
    case "unfair-lock":
      return UnfairLockCounter.attach(handle);
    case "allocated-unfair-lock":
      return AllocatedUnfairLockCounter.attach(handle);
    case "serial-queue":
      return SerialQueueCounter.attach(handle);
    case "rw-queue":
      return ReaderWriterQueueCounter.attach(handle);
    default: {
      const exhaustive: never = handle.kind;
      throw new Error(`Unknown container kind: ${String(exhaustive)}`);
    }
  }
}
