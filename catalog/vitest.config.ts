import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "catalog",
    include: ["tests/**/*.test.ts"],
    globals: false,
    testTimeout: 10000,
  },
});
