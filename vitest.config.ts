import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["linesec-ts/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 30_000
  }
});
