/**
 * Vitest Configuration — @schemata/contracts
 *
 * Pure TypeScript tests. No database, no network.
 * These tests validate Zod schemas and type definitions.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
