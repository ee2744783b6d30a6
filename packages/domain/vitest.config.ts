/**
 * Vitest Configuration — @schemata/domain
 *
 * Loads the sample schema tree end to end against the in-memory connector.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
