/**
 * Fan-out executors.
 *
 * An executor runs every operation of a job and returns once all of them
 * have completed. The worker pool spreads a job over worker threads; the
 * inline executor drains it on the calling thread.
 *
 * @module
 */

import { Worker } from "node:worker_threads";
import { all, call, createQueue, resource, type Operation } from "effection";
import type { SharedCounter } from "../containers/mod.ts";
import { toError } from "../lib/result.ts";
import { WorkerReplySchema, type WorkerReply, type WorkerRequest } from "../lib/schema.ts";
import type { WorkloadScenario } from "../scenarios/mod.ts";
import { createJobControl, drainJob, readJobControl, type FanOutResult } from "./drain.ts";

export type { FanOutResult } from "./drain.ts";

// Bootstrap that registers tsx and then loads fan-out-worker.ts.
const WORKER_URL = new URL("./fan-out-worker.mjs", import.meta.url);

/**
 * One fan-out: `total` operations of `scenario` against `counter`.
 */
export interface FanOutJob {
  counter: SharedCounter;
  scenario: WorkloadScenario;
  total: number;
}

export interface FanOutExecutor {
  /** Worker threads in use; 0 for the inline executor */
  readonly threads: number;
  fanOut(job: FanOutJob): Operation<FanOutResult>;
}

/**
 * Executor that drains every job on the calling thread.
 */
export function inlineExecutor(): FanOutExecutor {
  return {
    threads: 0,
    *fanOut({ counter, scenario, total }) {
      const control = createJobControl();
      drainJob(control, counter, scenario, total);
      return readJobControl(control);
    },
  };
}

type PoolEvent = WorkerReply | { type: "failed"; error: Error };

/**
 * A worker thread whose replies are buffered until they are expected.
 */
class PoolWorker {
  readonly worker: Worker;
  private readonly events = createQueue<PoolEvent, never>();

  constructor(readonly id: number) {
    this.worker = new Worker(WORKER_URL);
    this.worker.on("message", (data: unknown) => {
      const reply = WorkerReplySchema.safeParse(data);
      this.events.add(
        reply.success
          ? reply.data
          : { type: "failed", error: new Error(`Invalid reply from worker ${id}: ${reply.error.message}`) },
      );
    });
    this.worker.on("error", (error: unknown) => {
      this.events.add({ type: "failed", error: toError(error) });
    });
    this.worker.on("exit", (code: number) => {
      if (code !== 0) {
        this.events.add({ type: "failed", error: new Error(`Worker ${id} exited with code ${code}`) });
      }
    });
  }

  post(request: WorkerRequest): void {
    this.worker.postMessage(request);
  }

  /**
   * Wait for the next reply, which must be of type `type`.
   * @throws the worker's error if it failed instead
   */
  *expect(type: WorkerReply["type"]): Operation<WorkerReply> {
    const { value: event } = yield* this.events.next();
    if (event.type === "failed") {
      throw event.error;
    }
    if (event.type !== type) {
      throw new Error(`Worker ${this.id} replied "${event.type}", expected "${type}"`);
    }
    return event;
  }
}

/**
 * Start `threads` worker threads as a resource.
 *
 * Start-up is awaited before the executor is provided, so no measurement
 * pays for it. The workers are terminated when the enclosing scope exits.
 */
export function useWorkerPool(threads: number): Operation<FanOutExecutor> {
  return resource(function* (provide) {
    const workers: PoolWorker[] = [];
    try {
      for (let id = 0; id < threads; id++) {
        workers.push(new PoolWorker(id));
      }
      yield* all(workers.map((worker) => worker.expect("ready")));

      yield* provide({
        threads,
        *fanOut({ counter, scenario, total }) {
          const control = createJobControl();
          const request: WorkerRequest = {
            type: "job",
            control,
            counter: counter.share(),
            scenario: scenario.key,
            total,
          };
          for (const worker of workers) {
            worker.post(request);
          }
          yield* all(workers.map((worker) => worker.expect("done")));
          return readJobControl(control);
        },
      });
    } finally {
      yield* call(() => Promise.all(workers.map(({ worker }) => worker.terminate())));
    }
  });
}

/**
 * The worker pool, or the inline executor when `threads` is 0.
 */
export function* useExecutor(threads: number): Operation<FanOutExecutor> {
  if (threads === 0) {
    return inlineExecutor();
  }
  return yield* useWorkerPool(threads);
}
