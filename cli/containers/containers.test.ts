import { describe, test, expect } from "vitest";
import { run } from "effection";
import { scenarios } from "../scenarios/mod.ts";
import { AllocatedUnfairLock } from "./allocated-unfair-lock.ts";
import { attachCounter, buildContainers, withCounterActor } from "./mod.ts";
import { ConcurrentQueue } from "./rw-queue.ts";
import { SharedSequence } from "./shared-sequence.ts";
import { SIMULATED_WORK_ITERATIONS, simulateWork } from "./simulate-work.ts";

const variants = buildContainers(scenarios.serial, 16);

describe("blocking containers", () => {
  test("serial scenario builds all five", () => {
    expect(variants.map((v) => v.name)).toEqual([
      "Mutex",
      "Unfair Lock",
      "Allocated Unfair Lock",
      "Serial Queue",
      "RW Queue",
    ]);
    expect(variants.map((v) => v.category)).toEqual(["lock", "lock", "lock", "queue", "queue"]);
  });

  test("concurrent scenarios build only the locks", () => {
    expect(buildContainers(scenarios.balanced, 16).map((v) => v.name)).toEqual([
      "Mutex",
      "Unfair Lock",
      "Allocated Unfair Lock",
    ]);
  });

  for (const { name, counter } of variants) {
    describe(name, () => {
      test("read is 0 when empty", () => {
        counter.reset();
        expect(counter.read()).toBe(0);
      });

      test("read returns the last write", () => {
        counter.reset();
        counter.write(1);
        counter.write(2);
        counter.write(3);
        expect(counter.read()).toBe(3);
      });

      test("reset empties the sequence", () => {
        counter.write(9);
        counter.reset();
        expect(counter.read()).toBe(0);
      });

      test("simulated work variants store and read the same way", () => {
        counter.reset();
        counter.writeWithSimulatedWork(42);
        expect(counter.readWithSimulatedWork()).toBe(42);
      });

      test("an attached handle sees the same state", () => {
        counter.reset();
        counter.write(5);
        const attached = attachCounter(counter.share());
        expect(attached.kind).toBe(counter.kind);
        expect(attached.read()).toBe(5);
        attached.write(6);
        expect(counter.read()).toBe(6);
      });
    });
  }
});

describe("Actor", () => {
  test("read returns the last write and reset empties it", async () => {
    const [afterWrites, afterReset] = await run(() =>
      withCounterActor(function* (actor) {
        yield* actor.write(1);
        yield* actor.write(2);
        yield* actor.write(3);
        const last = yield* actor.read();
        yield* actor.reset();
        return [last, yield* actor.read()];
      }),
    );
    expect(afterWrites).toBe(3);
    expect(afterReset).toBe(0);
  });

  test("simulated work variants", async () => {
    const value = await run(() =>
      withCounterActor(function* (actor) {
        yield* actor.writeWithSimulatedWork(7);
        return yield* actor.readWithSimulatedWork();
      }),
    );
    expect(value).toBe(7);
  });
});

describe("SharedSequence", () => {
  test("writing past capacity throws", () => {
    const sequence = SharedSequence.allocate(2);
    sequence.append(1);
    sequence.append(2);
    expect(() => sequence.append(3)).toThrow(RangeError);
    expect(sequence.length).toBe(2);
    expect(sequence.last()).toBe(2);
  });

  test("clear keeps capacity", () => {
    const sequence = SharedSequence.allocate(2);
    sequence.append(1);
    sequence.clear();
    expect(sequence.length).toBe(0);
    expect(sequence.capacity).toBe(2);
  });
});

describe("AllocatedUnfairLock", () => {
  test("withLock hands out the owned state and returns the body's result", () => {
    const lock = AllocatedUnfairLock.create({ hits: 0 });
    const hits = lock.withLock((state) => ++state.hits);
    expect(hits).toBe(1);
    expect(lock.withLock((state) => state.hits)).toBe(1);
  });

  test("the lock is released when the body throws", () => {
    const lock = AllocatedUnfairLock.create(0);
    expect(() =>
      lock.withLock(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(lock.withLock((state) => state)).toBe(0);
    expect(Atomics.load(lock.word, 0)).toBe(0);
  });
});

describe("ConcurrentQueue", () => {
  test("reads nest while barriers run alone", () => {
    const queue = ConcurrentQueue.allocate("test.queue");
    const nested = queue.sync(() => queue.sync(() => "inner"));
    expect(nested).toBe("inner");
    expect(queue.barrierSync(() => "barrier")).toBe("barrier");
  });
});

test("simulateWork sums the first squares", () => {
  expect(SIMULATED_WORK_ITERATIONS).toBe(100);
  expect(simulateWork()).toBe(328350);
});
