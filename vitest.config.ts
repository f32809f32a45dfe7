import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // CLI tests spawn tsx for every case
    testTimeout: 30_000
  }
});
