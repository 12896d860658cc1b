import { describe, test, expect } from "vitest";
import { run, type Operation } from "effection";
import type { IsolatedCounter, SynchronizedCounter } from "../containers/mod.ts";
import { MutexCounter } from "../containers/mutex.ts";
import { scenarios } from "../scenarios/mod.ts";
import {
  OperationTally,
  isWriteOperation,
  performIsolatedOperation,
  performOperation,
  writePattern,
} from "./dispatch.ts";

type Call = "write" | "read" | "heavy-write" | "heavy-read";

class RecordingCounter implements SynchronizedCounter {
  readonly calls: Call[] = [];
  write(): void {
    this.calls.push("write");
  }
  read(): number {
    this.calls.push("read");
    return 0;
  }
  writeWithSimulatedWork(): void {
    this.calls.push("heavy-write");
  }
  readWithSimulatedWork(): number {
    this.calls.push("heavy-read");
    return 0;
  }
  reset(): void {}
}

class RecordingActor implements IsolatedCounter {
  readonly calls: Call[] = [];
  *write(): Operation<void> {
    this.calls.push("write");
  }
  *read(): Operation<number> {
    this.calls.push("read");
    return 0;
  }
  *writeWithSimulatedWork(): Operation<void> {
    this.calls.push("heavy-write");
  }
  *readWithSimulatedWork(): Operation<number> {
    this.calls.push("heavy-read");
    return 0;
  }
  *reset(): Operation<void> {}
}

function writes(pattern: boolean[]): number {
  return pattern.filter(Boolean).length;
}

describe("dispatch", () => {
  test("writes are the low indices of each block of ten", () => {
    const scenario = scenarios.balanced;
    expect(writePattern(scenario, 10)).toEqual([
      true, true, true, true, true, false, false, false, false, false,
    ]);
    expect(isWriteOperation(scenario, 15)).toBe(false);
    expect(isWriteOperation(scenario, 20)).toBe(true);
  });

  test("write share follows the ratio", () => {
    expect(writes(writePattern(scenarios["read-heavy"], 100))).toBe(10);
    expect(writes(writePattern(scenarios.balanced, 100))).toBe(50);
    expect(writes(writePattern(scenarios["write-heavy"], 100))).toBe(90);
  });

  for (const key of ["read-heavy", "balanced", "write-heavy"] as const) {
    test(`${key} pattern is the same on every call`, () => {
      expect(writePattern(scenarios[key], 100)).toEqual(writePattern(scenarios[key], 100));
    });

    test(`${key} sends the same calls to blocking and suspending counters`, async () => {
      const scenario = scenarios[key];
      const blocking = new RecordingCounter();
      const again = new RecordingCounter();
      const actor = new RecordingActor();
      for (let i = 0; i < 100; i++) {
        performOperation(blocking, scenario, i);
        performOperation(again, scenario, i);
      }
      await run(function* () {
        for (let i = 0; i < 100; i++) {
          yield* performIsolatedOperation(actor, scenario, i);
        }
      });

      const expected = writePattern(scenario, 100).map((isWrite): Call => (isWrite ? "write" : "read"));
      expect(blocking.calls).toEqual(expected);
      expect(again.calls).toEqual(expected);
      expect(actor.calls).toEqual(expected);
    });
  }

  test("heavy work routes to the simulated work calls", () => {
    const counter = new RecordingCounter();
    for (let i = 0; i < 10; i++) {
      performOperation(counter, scenarios["heavy-work"], i);
    }
    expect(counter.calls).toEqual([
      "heavy-write", "heavy-write", "heavy-write", "heavy-write", "heavy-write",
      "heavy-read", "heavy-read", "heavy-read", "heavy-read", "heavy-read",
    ]);
  });

  test("a write stores the operation index", () => {
    const counter = MutexCounter.create(10);
    performOperation(counter, scenarios.balanced, 3);
    expect(counter.read()).toBe(3);
    performOperation(counter, scenarios.balanced, 7);
    expect(counter.read()).toBe(3);
  });

  test("heavy work uses the same read/write decision", () => {
    const counter = MutexCounter.create(10);
    performOperation(counter, scenarios["heavy-work"], 2);
    performOperation(counter, scenarios["heavy-work"], 8);
    expect(counter.read()).toBe(2);
  });

  test("tally counts every dispatched operation", () => {
    const counter = MutexCounter.create(100);
    const tally = OperationTally.create();
    for (let i = 0; i < 100; i++) {
      performOperation(counter, scenarios["read-heavy"], i, tally);
    }
    expect(tally.count).toBe(100);
  });
});
