import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "bin/**/*.test.ts"],

    // Use forks instead of threads - the command tests patch process.exit
    // and signal handlers
    pool: "forks",

    testTimeout: 10000,
  },
});
