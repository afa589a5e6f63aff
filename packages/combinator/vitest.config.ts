import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "combinator",
    environment: "node",
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["src/**/*.ts"],
      exclude: ["src/types.ts", "src/index.ts"],
    },
  },
});
