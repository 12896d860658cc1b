import { describe, test, expect } from "vitest";
import { SCENARIOS } from "../lib/schema.ts";
import {
  BATTERY_SCENARIOS,
  getScenario,
  listScenarios,
  resolveOperationCount,
  scenarios,
} from "./mod.ts";

describe("scenarios", () => {
  test("every key resolves to its own scenario", () => {
    for (const key of SCENARIOS) {
      expect(getScenario(key).key).toBe(key);
    }
  });

  test("list keeps display order", () => {
    expect(listScenarios().map((s) => s.key)).toEqual([...SCENARIOS]);
  });

  test("write ratios", () => {
    expect(scenarios.balanced.writeRatio).toBe(0.5);
    expect(scenarios["read-heavy"].writeRatio).toBe(0.1);
    expect(scenarios["write-heavy"].writeRatio).toBe(0.9);
  });

  test("fixed operation counts override the requested count", () => {
    expect(resolveOperationCount(scenarios["low-volume"], 20_000)).toBe(100);
    expect(resolveOperationCount(scenarios.serial, 20_000)).toBe(1000);
    expect(resolveOperationCount(scenarios.balanced, 20_000)).toBe(20_000);
  });

  test("only heavy-work simulates work", () => {
    const heavy = listScenarios().filter((s) => s.usesSimulatedHeavyWork);
    expect(heavy.map((s) => s.key)).toEqual(["heavy-work"]);
  });

  test("only serial is sequential", () => {
    const sequential = listScenarios().filter((s) => s.isSequentialOnly);
    expect(sequential.map((s) => s.key)).toEqual(["serial"]);
  });

  test("scenarios are frozen", () => {
    expect(Object.isFrozen(scenarios.balanced)).toBe(true);
  });

  test("battery order", () => {
    expect(BATTERY_SCENARIOS).toEqual(["balanced", "read-heavy", "write-heavy", "heavy-work", "serial"]);
  });
});
