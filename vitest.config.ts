import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // Native grammar bindings load per process, not per worker thread
    pool: "forks",
    testTimeout: 20000,
  },
});
