import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    testTimeout: 60_000, // CLI tests spawn tsx
    pool: "forks",
    fileParallelism: false, // Tests share tmp/ — must run sequentially
  },
});
