import { describe, test, expect } from "vitest";
import { MAX_THREADS } from "../lib/schema.ts";
import { DEFAULT_OPERATIONS, defaultThreads, parseArgs, validateBatteryArgs, validateRunArgs } from "./args.ts";

describe("parseArgs", () => {
  test("long and short flags", () => {
    expect(parseArgs(["-s", "serial", "--operations", "2000", "-t", "4", "--json"])).toEqual({
      scenario: "serial",
      operations: "2000",
      threads: "4",
      json: true,
      unknown: [],
    });
  });

  test("collects unrecognized arguments", () => {
    expect(parseArgs(["--fast", "x"]).unknown).toEqual(["--fast", "x"]);
  });
});

describe("validateRunArgs", () => {
  test("defaults", () => {
    const result = validateRunArgs([]);
    expect(result).toEqual({
      ok: true,
      value: {
        scenario: "balanced",
        operations: DEFAULT_OPERATIONS,
        threads: defaultThreads(),
        json: false,
      },
    });
  });

  test("explicit options", () => {
    const result = validateRunArgs(["--scenario", "heavy-work", "-n", "50000", "-t", "0"]);
    expect(result.ok && result.value).toEqual({
      scenario: "heavy-work",
      operations: 50_000,
      threads: 0,
      json: false,
    });
  });

  test("operation count below the minimum", () => {
    const result = validateRunArgs(["-n", "999"]);
    expect(result.ok).toBe(false);
    expect(!result.ok && result.context).toBe("run arguments");
  });

  test("operation count above the maximum", () => {
    expect(validateRunArgs(["-n", "50001"]).ok).toBe(false);
  });

  test("non-numeric operation count", () => {
    expect(validateRunArgs(["-n", "ten"]).ok).toBe(false);
  });

  test("thread count is capped", () => {
    expect(validateRunArgs(["-t", String(MAX_THREADS)]).ok).toBe(true);
    expect(validateRunArgs(["-t", String(MAX_THREADS + 1)]).ok).toBe(false);
  });

  test("unknown scenario", () => {
    expect(validateRunArgs(["-s", "bursty"]).ok).toBe(false);
  });

  test("unknown argument", () => {
    const result = validateRunArgs(["--fast"]);
    expect(!result.ok && result.error.message).toBe("  Unknown argument(s): --fast");
  });
});

describe("validateBatteryArgs", () => {
  test("threads and json", () => {
    const result = validateBatteryArgs(["-t", "2", "--json"]);
    expect(result.ok && result.value).toEqual({ threads: 2, json: true });
  });

  test("rejects a scenario or operation count", () => {
    expect(validateBatteryArgs(["-s", "serial"]).ok).toBe(false);
    expect(validateBatteryArgs(["-n", "2000"]).ok).toBe(false);
  });
});
