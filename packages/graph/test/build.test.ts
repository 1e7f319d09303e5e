import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import config from "../tsup.config.js";

function read(relative: string): string {
  return readFileSync(new URL(relative, import.meta.url), "utf8");
}

describe("server bundle", () => {
  it("points the bin at the bundled server", () => {
    expect(JSON.parse(read("../package.json"))).toMatchObject({
      bin: { "codegraph-graph": "./dist/server.js" },
      scripts: { build: "tsup" },
    });
    expect(JSON.parse(read("../../../package.json"))).toMatchObject({
      bin: { "codegraph-graph": "packages/graph/dist/server.js" },
    });
  });

  it("bundles the workspace packages into the server entry", () => {
    if (typeof config === "function" || Array.isArray(config)) {
      throw new Error("expected a single tsup options object");
    }
    expect(config.entry).toEqual(["src/server.ts"]);
    expect(config.format).toEqual(["esm"]);

    const noExternal = config.noExternal ?? [];
    const bundled = (name: string): boolean =>
      noExternal.some((p) => (typeof p === "string" ? p === name : p.test(name)));
    expect(bundled("@codegraph/core")).toBe(true);
    expect(bundled("@codegraph/recorder")).toBe(true);
    expect(bundled("zod")).toBe(false);
  });

  it("keeps the shebang on the entry", () => {
    expect(read("../src/server.ts").startsWith("#!/usr/bin/env node\n")).toBe(true);
  });
});
