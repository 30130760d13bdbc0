/**
 * @file Vite build configuration
 */

import { defineConfig } from "vite";
import dts from "vite-plugin-dts";
import { getViteEntries, getAllExternals } from "./build.entries";
export default defineConfig({
  plugins: [
    dts({
      entryRoot: "src",
      outDir: "dist",
      include: ["src"],
      exclude: ["**/*.spec.*", "node_modules", "dist"],
      tsconfigPath: "tsconfig.json",
      rollupTypes: false,
    }),
  ],
  build: {
    outDir: "dist",
    target: "node20",
    lib: {
      entry: getViteEntries(),
      formats: ["cjs", "es"],
    },
    rollupOptions: {
      external: getAllExternals(),
    },
  },
});
