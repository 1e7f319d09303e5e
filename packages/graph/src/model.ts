/**
 * Deduplicated view of a recorded code graph.
 * Every fact remembers the file whose records produced it, so a recheck of
 * that file can replace its facts wholesale.
 */

import type { ClassRefKind } from "@codegraph/recorder";

export type DefinitionKind = "class" | "function";

export interface ModuleInfo {
  name: string;
  file: string;
}

export interface Definition {
  fullname: string;
  kind: DefinitionKind;
  /** File that recorded the definition */
  file: string;
}

export interface ImportEdge {
  importer: string;
  importee: string;
  file: string;
}

export interface CallEdge {
  caller: string;
  callee: string;
  /** File containing the call site */
  file: string;
}

export interface ClassRefEdge {
  src: string;
  dst: string;
  kind: ClassRefKind;
  /** File containing the reference */
  file: string;
}

export interface GraphStats {
  modules: number;
  imports: number;
  classDefs: number;
  functionDefs: number;
  classRefs: number;
  calls: number;
  files: number;
  invalidations: number;
}

/** A definition together with the edges recorded around it */
export interface SymbolInfo {
  definition: Definition;
  callers: CallEdge[];
  callees: CallEdge[];
  references: ClassRefEdge[];
  subclasses: string[];
}

export interface ModuleDetails {
  module: ModuleInfo;
  imports: string[];
  importers: string[];
  definitions: Definition[];
}

export interface InvalidLine {
  /** 1-based line number in the stream */
  line: number;
  error: string;
}

export interface LoadSummary {
  file: string;
  records: number;
  invalid: InvalidLine[];
  loadMs: number;
}

export type { Result } from "@codegraph/core";
export { Ok, Err } from "@codegraph/core";
