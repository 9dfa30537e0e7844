import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],

    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts", "src/cli/main.ts"],

      // Current levels (prevent regression)
      thresholds: {
        branches: 65,
        functions: 80,
        lines: 80,
        statements: 80,
      },

      reporter: ["text", "html", "json"],
    },

    // Tests spawn real child processes and work in temp directories
    pool: "forks",

    testTimeout: 30000,
  },
});
