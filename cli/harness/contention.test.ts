import { describe, test, expect } from "vitest";
import { run } from "effection";
import { buildContainers } from "../containers/mod.ts";
import { SharedSequence } from "../containers/shared-sequence.ts";
import { scenarios } from "../scenarios/mod.ts";
import { writePattern } from "./dispatch.ts";
import { useWorkerPool } from "./executor.ts";

const THREADS = 4;
const TRIALS = 3;
const TOTAL = 5_000;

describe("containers under contention", () => {
  for (const key of ["balanced", "read-heavy", "write-heavy", "heavy-work"] as const) {
    test(`${key} across ${THREADS} worker threads`, async () => {
      const scenario = scenarios[key];
      const pattern = writePattern(scenario, TOTAL);
      const writes = pattern.filter(Boolean).length;
      // Every container, the queues included.
      const containers = buildContainers(scenarios.serial, TOTAL);

      await run(function* () {
        const executor = yield* useWorkerPool(THREADS);

        for (const { name, counter } of containers) {
          for (let trial = 1; trial <= TRIALS; trial++) {
            counter.reset();
            const result = yield* executor.fanOut({ counter, scenario, total: TOTAL });
            const stored = new SharedSequence(counter.share().values).length;
            const last = counter.read();

            expect({ name, trial, ...result, stored, lastIsWrite: pattern[last] }).toEqual({
              name,
              trial,
              completed: TOTAL,
              dispatched: TOTAL,
              stored: writes,
              lastIsWrite: true,
            });
          }
        }
      });
    });
  }
});
