import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/*/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 30000,
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
