import { describe, test, expect } from "vitest";
import { formatDuration, formatOpsPerSecond, formatTier, opsPerSecond } from "./format.ts";

describe("formatDuration", () => {
  test("milliseconds with two decimals", () => {
    expect(formatDuration(0.0125)).toBe("12.50 ms");
    expect(formatDuration(1)).toBe("1000.00 ms");
  });
});

describe("formatOpsPerSecond", () => {
  test("millions", () => {
    expect(formatOpsPerSecond(10_000, 0.004)).toBe("2.5M ops/s");
  });

  test("thousands", () => {
    expect(formatOpsPerSecond(1_500, 1)).toBe("1.5K ops/s");
  });

  test("below a thousand", () => {
    expect(formatOpsPerSecond(100, 1)).toBe("100 ops/s");
  });

  test("no elapsed time", () => {
    expect(formatOpsPerSecond(100, 0)).toBe("—");
    expect(opsPerSecond(100, 0)).toBe(0);
  });
});

describe("formatTier", () => {
  test("short tier labels", () => {
    expect(formatTier(100)).toBe("100");
    expect(formatTier(1_000)).toBe("1K");
    expect(formatTier(50_000)).toBe("50K");
  });
});
