import { defineConfig } from "vitest/config";

// Time-of-day and solar tests build dates with local-time constructors.
process.env.TZ = "UTC";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    env: { TZ: "UTC" },
    testTimeout: 10000,
  },
});
