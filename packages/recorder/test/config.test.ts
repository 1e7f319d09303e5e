import { describe, it, expect } from "vitest";
import { delimiter } from "node:path";
import { optionsFromEnv, parseRecorderOptions } from "../src/config.js";

describe("parseRecorderOptions", () => {
  it("fills in defaults", () => {
    expect(parseRecorderOptions({ output: "graph.jsonl" })).toEqual({
      ok: true,
      value: { output: "graph.jsonl", paths: [], mode: "truncate" },
    });
  });

  it("keeps explicit values", () => {
    const result = parseRecorderOptions({ output: "stdout", paths: ["/proj"], mode: "append" });
    expect(result).toEqual({
      ok: true,
      value: { output: "stdout", paths: ["/proj"], mode: "append" },
    });
  });

  it("rejects an empty output", () => {
    const result = parseRecorderOptions({ output: "" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INVALID_OPTIONS");
      expect(result.error.message).toMatch(/^Invalid recorder options: output: /);
    }
  });

  it("rejects empty filter roots", () => {
    const result = parseRecorderOptions({ output: "g.jsonl", paths: ["/proj", ""] });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toMatch(/paths\.1: /);
    }
  });
});

describe("optionsFromEnv", () => {
  it("is undefined without an output", () => {
    expect(optionsFromEnv({})).toBeUndefined();
    expect(optionsFromEnv({ CODEGRAPH_OUTPUT: "", CODEGRAPH_PATHS: "/proj" })).toBeUndefined();
  });

  it("reads output and splits paths on the path delimiter", () => {
    expect(
      optionsFromEnv({
        CODEGRAPH_OUTPUT: "stdout",
        CODEGRAPH_PATHS: ["/proj/src", "", " /proj/lib "].join(delimiter),
      })
    ).toEqual({ output: "stdout", paths: ["/proj/src", "/proj/lib"], mode: "truncate" });
  });

  it("switches to append mode", () => {
    expect(optionsFromEnv({ CODEGRAPH_OUTPUT: "g.jsonl", CODEGRAPH_APPEND: "true" })).toEqual({
      output: "g.jsonl",
      paths: [],
      mode: "append",
    });
    expect(optionsFromEnv({ CODEGRAPH_OUTPUT: "g.jsonl", CODEGRAPH_APPEND: "0" })?.mode).toBe("truncate");
  });
});
