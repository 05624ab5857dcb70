import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "providers/*/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 10000,
    env: {
      LOG_LEVEL: "silent",
    },
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts", "providers/*/src/**/*.ts"],
      thresholds: { statements: 70, branches: 70, functions: 70, lines: 70 },
    },
  },
});
