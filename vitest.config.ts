import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // CLI tests
      {
        test: {
          name: "cli",
          environment: "node",
          include: ["tests/**/*.test.ts"],
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    testTimeout: 30000,
  },
});
