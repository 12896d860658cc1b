import { afterEach, describe, test, expect, vi } from "vitest";
import { run } from "effection";
import { dispatch } from "./mod.ts";

describe("dispatch", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("run reports which arguments failed to parse", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const code = await run(() => dispatch(["run", "--operations", "5"]));
    expect(code).toBe(1);
    expect(error.mock.calls[0]).toEqual(["Error parsing run arguments:"]);
  });

  test("battery reports which arguments failed to parse", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const code = await run(() => dispatch(["battery", "--scenario", "serial"]));
    expect(code).toBe(1);
    expect(error.mock.calls[0]).toEqual(["Error parsing battery arguments:"]);
  });

  test("unknown command prints help and fails", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    const code = await run(() => dispatch(["bench"]));
    expect(code).toBe(1);
    expect(error.mock.calls[0]).toEqual(["Unknown command: bench"]);
  });

  test("list succeeds", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const code = await run(() => dispatch(["list"]));
    expect(code).toBe(0);
    expect(log.mock.calls.some(([line]) => line === `  ${"serial".padEnd(12)} Serial (No Concurrency) [1000 ops]`)).toBe(true);
  });
});
