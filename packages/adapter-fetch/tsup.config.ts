import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  outDir: "./dist",
  target: "es2022",
  external: ["@stepwire/core"],
  splitting: false,
  treeshake: true,
});
