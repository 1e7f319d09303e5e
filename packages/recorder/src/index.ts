/**
 * @codegraph/recorder
 * Incremental code-graph recording hooks for a type-checking pipeline.
 */

// Model
export {
  type ClassRefKind,
  type CodeUnit,
  type GraphEvent,
  type GraphEventType,
  type GraphRecord,
  type ModuleEvent,
  type ImportEvent,
  type InvalidateEvent,
  type ClassDefEvent,
  type ClassRefEvent,
  type FunctionDefEvent,
  type FunctionCallEvent,
  CLASS_REF_KINDS,
  GRAPH_EVENT_TYPES,
} from "./model.js";
export { GraphRecordSchema, ClassRefKindSchema, type GraphRecordInput } from "./schema.js";

// Scoping
export { PathFilter, canonicalize, isWithin } from "./PathFilter.js";
export { ModuleResolver, type ResolvedSymbol } from "./ModuleResolver.js";

// Output
export {
  type Sink,
  type SinkMode,
  FileSink,
  StdoutSink,
  MemorySink,
  openSink,
  STDOUT_DESTINATION,
} from "./sinks.js";
export { EventWriter, serializeRecord } from "./EventWriter.js";
export { SinkWriteError, type RecorderError, type RecorderErrorCode } from "./errors.js";

// Recorder
export {
  type RecorderOptions,
  type ResolvedRecorderOptions,
  RecorderOptionsSchema,
  parseRecorderOptions,
  optionsFromEnv,
} from "./config.js";
export { GraphRecorder, recorderFromEnv } from "./GraphRecorder.js";
