import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    env: {
      // テスト中はwarn未満のログを抑制
      TODO_COLLECTOR_LOG_LEVEL: "error",
    },
    testTimeout: 10000,
  },
});
