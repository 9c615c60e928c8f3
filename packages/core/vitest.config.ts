import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@procflow/core",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
