import { defineConfig } from "vitest/config";

// PGlite boots a full Postgres in WebAssembly, which takes a few seconds per instance
const TEST_TIMEOUT = 30000;

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    testTimeout: TEST_TIMEOUT,
    hookTimeout: TEST_TIMEOUT,
  },
});
