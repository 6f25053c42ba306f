import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // the DuckDB native binding is loaded once per forked worker
    pool: "forks",
    testTimeout: 30_000,
  },
});
