import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "packages/parser/src/index.ts",
  },
  outDir: "dist/bundle",
  format: ["cjs", "esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  external: ["cosmiconfig"],
  // import.meta / __dirname shims for the CJS build
  shims: true,
});
