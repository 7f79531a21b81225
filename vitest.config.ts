import { defineConfig } from "vitest/config";

/**
 * Tests run in Node against temp directories and an in-process fetch stub.
 * Nothing here talks to the TMDB API.
 */
export default defineConfig({
  test: {
    include: ["lib/**/*.test.ts", "scripts/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    environment: "node",
    testTimeout: 10_000,
  },
});
