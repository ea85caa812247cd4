import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["__tests__/**/*.{test,spec}.ts", "src/**/*.{test,spec}.ts"],
    testTimeout: 10000,
  },
});
