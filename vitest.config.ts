import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/**/*.test.ts", "src/**/*.test.ts", "cli/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    testTimeout: 10_000,
  },
});
