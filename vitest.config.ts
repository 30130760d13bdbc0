/**
 * @file Vitest testing framework configuration
 *
 * Specs sit next to their sources as *.spec.ts and use the global
 * describe/it/expect.
 */

import { defineConfig } from "vitest/config";
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.ts"],
    setupFiles: [],
  },
});
