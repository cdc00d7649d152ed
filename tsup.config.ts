import { defineConfig } from "tsup";

// `@/` imports resolve through the `paths` entry in tsconfig.json
export default defineConfig({
  entry: ["src/index.ts", "src/main.ts"],
  format: ["esm", "cjs"],
  dts: { entry: "src/index.ts" },
  clean: true,
  sourcemap: true,
});
