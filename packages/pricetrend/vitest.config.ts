import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.spec.ts"],
    testTimeout: 10_000,
    env: {
      LOG_LEVEL: "silent",
      PRICE_SOURCE: "synthetic",
    },
  },
});
