/**
 * Vitest Configuration — @schemata/platform
 *
 * Unit tests for the metadata engine and entity runtime.
 * Filesystem tests work in a fresh temp directory; nothing needs a database.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
