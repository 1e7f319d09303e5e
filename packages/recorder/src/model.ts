/**
 * Event model for the incremental code graph.
 * One event per instrumentation point in the host pipeline; each is
 * serialized as one JSON Lines record with the emitting file attached.
 */

/**
 * How a class is referenced. Wire values are the names below.
 * Only INHERITANCE and INSTANTIATION are populated by current hooks;
 * the rest are reserved until the host instruments them.
 */
export const CLASS_REF_KINDS = [
  "INHERITANCE",
  "INSTANTIATION",
  "TYPE_IN_FUNCTION_PROTOTYPE", // arg or return type in a function signature
  "IVAR_TYPE",                  // type of an instance variable
  "CVAR_TYPE",                  // type of a class variable
] as const;

export type ClassRefKind = (typeof CLASS_REF_KINDS)[number];

export interface ModuleEvent {
  type: "module";
  module: string;
}

export interface ImportEvent {
  type: "import";
  importer: string;
  importee: string;
}

export interface InvalidateEvent {
  type: "invalidate";
  module: string;
}

export interface ClassDefEvent {
  type: "class_def";
  fullname: string;
}

export interface ClassRefEvent {
  type: "class_ref";
  src: string;
  dst: string;
  kind: ClassRefKind;
}

export interface FunctionDefEvent {
  type: "function_def";
  fullname: string;
}

export interface FunctionCallEvent {
  type: "call";
  caller: string;
  callee: string;
}

export type GraphEvent =
  | ModuleEvent
  | ImportEvent
  | InvalidateEvent
  | ClassDefEvent
  | ClassRefEvent
  | FunctionDefEvent
  | FunctionCallEvent;

export type GraphEventType = GraphEvent["type"];

export const GRAPH_EVENT_TYPES: readonly GraphEventType[] = [
  "module",
  "import",
  "invalidate",
  "class_def",
  "class_ref",
  "function_def",
  "call",
];

/**
 * A serialized event: the event plus the file of the code unit that emitted it.
 */
export type GraphRecord = GraphEvent & { file: string };

/**
 * The unit the host is processing when it calls a hook.
 * `path` is the emitting file for every record produced by that call.
 */
export interface CodeUnit {
  module: string;
  path: string;
}

