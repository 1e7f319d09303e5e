import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/server.ts"],
  format: ["esm"],
  target: "node20",
  clean: true,
  sourcemap: true,
  // workspace packages export TypeScript sources, so they are bundled in
  noExternal: [/^@codegraph\//],
});
