import { describe, test, expect } from "vitest";
import { run } from "effection";
import { buildContainers } from "../containers/mod.ts";
import { SharedSequence } from "../containers/shared-sequence.ts";
import { scenarios } from "../scenarios/mod.ts";
import { writePattern } from "./dispatch.ts";
import { inlineExecutor, useExecutor, useWorkerPool } from "./executor.ts";

describe("inlineExecutor", () => {
  test("drains the whole job on the calling thread", async () => {
    const [{ counter }] = buildContainers(scenarios["write-heavy"], 100);
    const result = await run(() =>
      inlineExecutor().fanOut({ counter, scenario: scenarios["write-heavy"], total: 100 }),
    );
    expect(result).toEqual({ completed: 100, dispatched: 100 });
    expect(new SharedSequence(counter.share().values).length).toBe(90);
  });

  test("is chosen for zero threads", async () => {
    const executor = await run(() => useExecutor(0));
    expect(executor.threads).toBe(0);
  });
});

describe("useWorkerPool", () => {
  test("fans a job out over worker threads", async () => {
    const scenario = scenarios["write-heavy"];
    const total = 2_000;
    const writes = writePattern(scenario, total).filter(Boolean).length;

    for (const { name, counter } of buildContainers(scenario, total)) {
      const result = await run(function* () {
        const executor = yield* useWorkerPool(2);
        return yield* executor.fanOut({ counter, scenario, total });
      });

      expect({ name, ...result }).toEqual({ name, completed: total, dispatched: total });
      expect(new SharedSequence(counter.share().values).length).toBe(writes);
      expect(writePattern(scenario, total)[counter.read()]).toBe(true);
    }
  });
});
