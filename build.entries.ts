/**
 * @file Build entry catalog - Defines all entry points and their target environments
 *
 * Single source of truth for the Vite build configuration (entry points and
 * externals).
 *
 * Target types:
 * - "node": Can only run in Node.js environment
 * - "universal": Can run in both Node.js and browsers
 *
 * Adding a new entry:
 * ```typescript
 * "my-module/index": {
 *   path: "src/my-module/index.ts",
 *   targets: ["universal"],
 *   description: "My module description",
 * }
 * ```
 */

export type BuildTarget = "node" | "universal";

export type EntryConfig = {
  /**
   * Entry file path relative to project root
   */
  path: string;
  /**
   * Target environments where this entry can run
   */
  targets: BuildTarget[];
  description?: string;
  /**
   * External dependencies for this entry (passed to Rollup)
   */
  external?: string[];
};

export type EntryCatalog = {
  [entryName: string]: EntryConfig;
};

/**
 * Catalog of all build entries with their target environments
 */
export const entries: EntryCatalog = {
  // Main entry - universal
  index: {
    path: "src/index.ts",
    targets: ["universal"],
    description: "Main library entry point",
  },

  // Map and name text codec
  "enum_names/index": {
    path: "src/enum_names/index.ts",
    targets: ["universal"],
    description: "Enum name maps and name text codec",
  },
};

/**
 * Get all external dependencies for all entries
 */
export function getAllExternals(): Array<string | RegExp> {
  const externals = new Set<string | RegExp>();

  // Node.js built-ins
  externals.add(/node:.+/);

  for (const config of Object.values(entries)) {
    if (config.external) {
      config.external.forEach((ext) => externals.add(ext));
    }
  }

  return Array.from(externals);
}

/**
 * Convert entries to Vite lib entry format
 */
export function getViteEntries(): Record<string, string> {
  const viteEntries: Record<string, string> = {};

  for (const [name, config] of Object.entries(entries)) {
    viteEntries[name] = config.path;
  }

  return viteEntries;
}
