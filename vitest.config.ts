import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    globals: false,
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      all: true,
      thresholds: {
        lines: 80,
        statements: 80,
        functions: 75,
        branches: 65
      }
    }
  }
});
