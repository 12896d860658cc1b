import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cli/**/*.test.ts"],
    pool: "forks",
    testTimeout: 60_000,
    teardownTimeout: 5_000,
  },
});
