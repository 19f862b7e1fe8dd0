import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
    // live-engine and scheduler tests wait on real confirmation and reconcile timers
    testTimeout: 15_000,
    coverage: {
      provider: "v8",
      reporter: ["text"],
      include: ["src/**/*.ts"],
      exclude: ["src/__tests__/**", "src/index.ts", "src/scripts/**", "src/runtime.ts"],
    },
  },
});
