import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "pipeline",
    environment: "node",
    include: ["tests/**/*.test.ts"],
    testTimeout: 20000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts", "src/bin/**"],
    },
  },
});
