/**
 * Fan-out worker thread entry point.
 *
 * Attaches to the container named in each job and drains the job's shared
 * cursor, then reports how many operations it performed.
 *
 * @module
 */

import { parentPort } from "node:worker_threads";
import { attachCounter } from "../containers/mod.ts";
import { WorkerRequestSchema, type WorkerReply } from "../lib/schema.ts";
import { getScenario } from "../scenarios/mod.ts";
import { drainJob } from "./drain.ts";

if (!parentPort) {
  throw new Error("fan-out-worker must run inside a worker thread");
}
const port = parentPort;

port.on("message", (data: unknown) => {
  // A malformed job throws here and surfaces as the worker's "error" event.
  const request = WorkerRequestSchema.parse(data);
  const counter = attachCounter(request.counter);
  const completed = drainJob(request.control, counter, getScenario(request.scenario), request.total);
  const reply: WorkerReply = { type: "done", completed };
  port.postMessage(reply);
});

const ready: WorkerReply = { type: "ready" };
port.postMessage(ready);
