import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    // PGlite boots a WASM Postgres per file
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
