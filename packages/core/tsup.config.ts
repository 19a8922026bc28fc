import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/transport.ts", "src/models/request-params.ts"],
  format: ["esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  outDir: "./dist",
  target: "es2022",
  splitting: false,
  treeshake: true,
});
