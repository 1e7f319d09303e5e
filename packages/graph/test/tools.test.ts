import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { GraphService } from "../src/GraphService.js";
import { handleLoad } from "../src/tools/load.js";
import { handleGetStats } from "../src/tools/getStats.js";
import { handleGetCallers, formatCallers } from "../src/tools/getCallers.js";
import { handleGetCallees } from "../src/tools/getCallees.js";
import { handleGetImports } from "../src/tools/getImports.js";
import { handleGetClassRefs } from "../src/tools/getClassRefs.js";
import { handleFindDefinitions } from "../src/tools/findDefinitions.js";
import { handleGetSymbol } from "../src/tools/getSymbol.js";
import { handleGetModule } from "../src/tools/getModule.js";
import { handleListModules } from "../src/tools/listModules.js";

const RECORDS = [
  { type: "module", module: "app.models", file: "/app/models.py" },
  { type: "module", module: "app.views", file: "/app/views.py" },
  { type: "import", importer: "app.views", importee: "app.models", file: "/app/views.py" },
  { type: "class_def", fullname: "app.models.User", file: "/app/models.py" },
  { type: "function_def", fullname: "app.models.User.save", file: "/app/models.py" },
  { type: "class_def", fullname: "app.views.UserView", file: "/app/views.py" },
  { type: "function_def", fullname: "app.views.UserView.post", file: "/app/views.py" },
  { type: "class_ref", src: "app.views.UserView.post", dst: "app.models.User", kind: "INSTANTIATION", file: "/app/views.py" },
  { type: "call", caller: "app.views.UserView.post", callee: "app.models.User.save", file: "/app/views.py" },
];

function text(response: { content: { text: string }[] }): string {
  return response.content[0].text;
}

describe("graph tools", () => {
  let dir: string;
  let file: string;
  let service: GraphService;

  beforeAll(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    dir = mkdtempSync(join(tmpdir(), "codegraph-tools-"));
    file = join(dir, "graph.jsonl");
    writeFileSync(file, RECORDS.map((r) => JSON.stringify(r) + "\n").join("") + "not json\n");
    service = new GraphService();
  });

  afterAll(() => {
    service.dispose();
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("reports errors before anything is loaded", () => {
    const response = handleGetCallers(service, { symbol: "app.models.User.save" });
    expect(response.isError).toBe(true);
    expect(text(response)).toBe("Error: Graph not loaded. Call graph_load first.");
  });

  it("graph_load summarizes the graph and bad lines", () => {
    const response = handleLoad(service, { path: file });

    expect(response.isError).toBeUndefined();
    const lines = text(response).split("\n");
    expect(lines.slice(0, 10)).toEqual([
      "## Graph Loaded",
      "",
      `**File:** ${file}`,
      "**Records:** 9",
      "**Modules:** 2",
      "**Definitions:** 4",
      "**Edges:** 3",
      "",
      "### Skipped 1 invalid line(s)",
      "",
    ]);
    expect(lines).toHaveLength(11);
    expect(lines[10].startsWith("- line 10: Invalid JSON: ")).toBe(true);
    expect(response.structuredContent).toMatchObject({ file, records: 9, invalidLines: 1, following: false });
  });

  it("graph_load fails for a missing file", () => {
    const other = new GraphService();
    const response = handleLoad(other, { path: join(dir, "missing.jsonl") });
    expect(response.isError).toBe(true);
    expect(text(response).startsWith(`Error: Cannot load ${join(dir, "missing.jsonl")}: `)).toBe(true);
  });

  it("graph_get_stats lists counts", () => {
    const response = handleGetStats(service);
    expect(text(response)).toBe(
      [
        "## Graph Statistics",
        "",
        "**Modules:** 2",
        "**Files:** 2",
        "**Imports:** 1",
        "**Classes:** 2",
        "**Functions:** 2",
        "**Class references:** 1",
        "**Calls:** 1",
        "**Invalidations seen:** 0",
      ].join("\n")
    );
  });

  it("graph_get_callers lists callers with their files", () => {
    const response = handleGetCallers(service, { symbol: "app.models.User.save" });
    expect(text(response)).toBe(
      [
        "## Callers of app.models.User.save",
        "",
        "Found 1 caller(s):",
        "",
        "- **app.views.UserView.post** - /app/views.py",
      ].join("\n")
    );
  });

  it("formats an empty caller list", () => {
    expect(formatCallers("x.y", [])).toBe("No callers recorded for: x.y");
  });

  it("graph_get_callees lists callees", () => {
    const response = handleGetCallees(service, { symbol: "app.views.UserView.post" });
    expect(text(response)).toBe(
      ["## Callees of app.views.UserView.post", "", "Found 1 callee(s):", "", "- **app.models.User.save**"].join("\n")
    );
  });

  it("graph_get_imports works in both directions", () => {
    expect(text(handleGetImports(service, { module: "app.views" }))).toBe(
      "## Imports of app.views\n\n- app.models"
    );
    expect(text(handleGetImports(service, { module: "app.models", direction: "importers" }))).toBe(
      "## Modules importing app.models\n\n- app.views"
    );
    expect(text(handleGetImports(service, { module: "app.models" }))).toBe(
      "No imports recorded for: app.models"
    );
  });

  it("graph_get_class_refs groups by kind", () => {
    expect(text(handleGetClassRefs(service, { symbol: "app.models.User" }))).toBe(
      ["## References to app.models.User", "", "### INSTANTIATION (1)", "", "- **app.views.UserView.post** - /app/views.py"].join("\n")
    );
    expect(text(handleGetClassRefs(service, { symbol: "app.models.User", kinds: ["INHERITANCE"] }))).toBe(
      "No class references recorded to app.models.User"
    );
  });

  it("graph_find_definitions groups by file", () => {
    const response = handleFindDefinitions(service, { pattern: "user", kind: "class" });
    expect(text(response)).toBe(
      [
        "## Found 2 definition(s)",
        "",
        "### /app/models.py",
        "",
        "- class **app.models.User**",
        "",
        "### /app/views.py",
        "",
        "- class **app.views.UserView**",
      ].join("\n")
    );
  });

  it("graph_get_symbol describes a function", () => {
    expect(text(handleGetSymbol(service, { symbol: "app.models.User.save" }))).toBe(
      [
        "## app.models.User.save",
        "",
        "**Kind:** function",
        "**File:** /app/models.py",
        "**Callers:** 1",
        "**Callees:** 0",
      ].join("\n")
    );
  });

  it("graph_get_symbol describes a class", () => {
    const response = handleGetSymbol(service, { symbol: "app.models.User" });
    expect(text(response)).toBe(
      ["## app.models.User", "", "**Kind:** class", "**File:** /app/models.py", "**References:** 1"].join("\n")
    );
    expect(response.structuredContent).toEqual({
      definition: { fullname: "app.models.User", kind: "class", file: "/app/models.py" },
      callers: 0,
      callees: 0,
      references: 1,
      subclasses: [],
    });
  });

  it("graph_get_symbol reports an unknown name", () => {
    const response = handleGetSymbol(service, { symbol: "app.nope" });
    expect(response.isError).toBe(true);
    expect(text(response)).toBe("Error: Symbol not found: app.nope");
  });

  it("graph_get_module shows imports and definitions", () => {
    expect(text(handleGetModule(service, { module: "app.views" }))).toBe(
      [
        "## Module app.views",
        "",
        "**File:** /app/views.py",
        "**Imports:** app.models",
        "**Imported by:** none",
        "",
        "### Definitions (2)",
        "",
        "- class **app.views.UserView**",
        "- function **app.views.UserView.post**",
      ].join("\n")
    );
    expect(text(handleGetModule(service, { module: "app.missing" }))).toBe(
      "Error: Module not recorded: app.missing"
    );
  });

  it("graph_list_modules sorts and filters", () => {
    expect(text(handleListModules(service, {}))).toBe(
      ["## Modules (2)", "", "- **app.models** - /app/models.py", "- **app.views** - /app/views.py"].join("\n")
    );
    expect(text(handleListModules(service, { pattern: "VIEWS" }))).toBe(
      ["## Modules (1)", "", "- **app.views** - /app/views.py"].join("\n")
    );
    expect(text(handleListModules(service, { pattern: "zzz" }))).toBe("No modules match: zzz");
    expect(handleListModules(service, { pattern: "(" }).isError).toBe(true);
  });
});
