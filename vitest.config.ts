import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
    env: {
      TASKWEAVE_LOG_LEVEL: "error",
    },
  },
});
