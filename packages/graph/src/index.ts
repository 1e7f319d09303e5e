/**
 * @codegraph/graph
 * Deduplicated code graph built from recorder output, with MCP tools.
 */

// Model
export type {
  DefinitionKind,
  ModuleInfo,
  Definition,
  ImportEdge,
  CallEdge,
  ClassRefEdge,
  GraphStats,
  InvalidLine,
  LoadSummary,
  SymbolInfo,
  ModuleDetails,
} from "./model.js";

// Store and loading
export { GraphStore } from "./GraphStore.js";
export { GraphService, type LoadOptions } from "./GraphService.js";
export { parseRecordLine, readRecords, type ParsedStream } from "./reader.js";

// Tools
export { registerAllTools, type Services } from "./tools/index.js";
