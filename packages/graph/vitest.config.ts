import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@procflow/graph",
    environment: "node",
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
  },
});
