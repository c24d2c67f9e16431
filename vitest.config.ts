/**
 * Vitest multi-project configuration
 *
 * Uses the 'projects' format to split unit tests from the integration tests
 * that load the bundled target catalog.
 *
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Global test configuration
    globals: true,
    environment: "node",
    disableConsoleIntercept: true,
    testTimeout: 30_000,

    // Global coverage configuration for all projects
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "lcov", "json-summary"],
      reportsDirectory: "./coverage",
      skipFull: true,
      exclude: ["node_modules/", "tests/", "dist/", "**/*.d.ts", "**/*.config.*", "src/index.ts"],
      thresholds: {
        lines: 90,
        branches: 85,
        functions: 90,
        statements: 90,
        "src/services/targets/dispatcher.ts": {
          lines: 95,
          functions: 100,
          branches: 90,
          statements: 95,
        },
      },
    },

    projects: [
      // Unit tests project
      {
        extends: true,
        test: {
          name: "unit",
          include: ["tests/unit/**/*.test.ts"],
          setupFiles: ["./tests/setup.ts"],
        },
      },

      // Integration tests project
      {
        extends: true,
        test: {
          name: "integration",
          include: ["tests/integration/**/*.test.ts"],
          setupFiles: ["./tests/setup.ts"],
          // Commands share process-level signal handlers
          pool: "forks",
          poolOptions: {
            forks: {
              singleFork: true,
            },
          },
        },
      },
    ],
  },
});
