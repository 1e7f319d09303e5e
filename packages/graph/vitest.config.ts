import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "graph",
    include: ["test/**/*.test.ts"],
    environment: "node",
    globals: true,
  },
});
