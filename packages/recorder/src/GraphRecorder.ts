/**
 * Graph recorder: the hooks a type-checking pipeline calls while it loads,
 * invalidates and checks modules.
 *
 * Def, module, import and invalidate events are scoped by the file that
 * emits them. Class references and calls are scoped by the file of the
 * referenced symbol's module, which must already be registered: library
 * code calling into the filtered project is kept, and an in-scope call site
 * alone never admits an edge into unknown or out-of-scope code.
 *
 * The stream is append-only. A module that is rechecked re-emits its
 * events after an `invalidate` record; readers deduplicate.
 */

import { type Result, Ok, Err } from "@codegraph/core";
import type { ClassRefKind, CodeUnit, GraphEvent } from "./model.js";
import { ModuleResolver } from "./ModuleResolver.js";
import { PathFilter, canonicalize } from "./PathFilter.js";
import { EventWriter } from "./EventWriter.js";
import { type Sink, openSink } from "./sinks.js";
import { type RecorderOptions, optionsFromEnv, parseRecorderOptions } from "./config.js";
import type { RecorderError } from "./errors.js";

export class GraphRecorder {
  private readonly resolver = new ModuleResolver();
  private readonly writer = new EventWriter();

  get enabled(): boolean {
    return this.writer.enabled;
  }

  /** Modules registered so far */
  get modules(): ModuleResolver {
    return this.resolver;
  }

  get filterRoots(): readonly string[] {
    return this.writer.pathFilter.roots;
  }

  /**
   * Validate options, open the output and start recording.
   * A second call while enabled is ignored.
   */
  enable(options: RecorderOptions): Result<void, RecorderError> {
    if (this.enabled) {
      console.error("[codegraph] Recording already enabled; ignoring second activation");
      return Ok(undefined);
    }

    const parsed = parseRecorderOptions(options);
    if (!parsed.ok) return parsed;

    const { output, paths, mode } = parsed.value;
    const sink = openSink(output, mode);
    if (!sink.ok) return Err(sink.error);

    this.attach(sink.value, paths);
    console.error(
      `[codegraph] Recording to ${output}` +
        (paths.length > 0 ? ` (filter: ${paths.join(", ")})` : " (unfiltered)")
    );
    return Ok(undefined);
  }

  /**
   * Start recording into an already-open sink.
   * Returns false if recording was already enabled.
   */
  attach(sink: Sink, paths: readonly string[] = []): boolean {
    return this.writer.configure(sink, new PathFilter(paths));
  }

  close(): void {
    if (!this.enabled) return;
    this.writer.close();
    console.error(`[codegraph] Recording closed (${this.resolver.size} modules seen)`);
  }

  /**
   * A module's file is known. Registers it for later reference scoping
   * before anything else can point into it.
   */
  recordModule(unit: CodeUnit): void {
    if (!this.enabled) return;
    this.resolver.register(unit.module, canonicalize(unit.path));
    this.emit(unit, { type: "module", module: unit.module });
  }

  /**
   * An import edge. Called while the import graph is built, before SCCs
   * and staleness are computed from it.
   */
  recordImport(unit: CodeUnit, importer: string, importee: string): void {
    if (!this.enabled) return;
    this.emit(unit, { type: "import", importer, importee });
  }

  /**
   * `module` is stale and about to be rechecked. Scoped by the module's own
   * file when it is registered, else by the unit's file.
   */
  recordInvalidate(unit: CodeUnit, module: string): void {
    if (!this.enabled) return;
    const scope = this.resolver.resolve(module) ?? unit.path;
    this.writer.emit({ type: "invalidate", module }, scope, unit.path);
  }

  recordClassDef(unit: CodeUnit, fullname: string): void {
    if (!this.enabled) return;
    this.emit(unit, { type: "class_def", fullname });
  }

  recordClassRef(unit: CodeUnit, src: string, dst: string, kind: ClassRefKind): void {
    if (!this.enabled) return;
    this.emitReference(unit, dst, { type: "class_ref", src, dst, kind });
  }

  recordFunctionDef(unit: CodeUnit, fullname: string): void {
    if (!this.enabled) return;
    this.emit(unit, { type: "function_def", fullname });
  }

  recordFunctionCall(unit: CodeUnit, caller: string, callee: string): void {
    if (!this.enabled) return;
    this.emitReference(unit, callee, { type: "call", caller, callee });
  }

  private emit(unit: CodeUnit, event: GraphEvent): void {
    this.writer.emit(event, unit.path, unit.path);
  }

  // Targets in modules not registered yet are dropped and never replayed.
  private emitReference(unit: CodeUnit, target: string, event: GraphEvent): void {
    const resolved = this.resolver.resolveSymbol(target);
    if (resolved === undefined) return;
    this.writer.emit(event, resolved.file, unit.path);
  }
}

/**
 * Recorder configured from CODEGRAPH_* variables. Without CODEGRAPH_OUTPUT
 * the recorder stays disabled and every hook is a no-op.
 */
export function recorderFromEnv(
  env: Record<string, string | undefined> = process.env
): Result<GraphRecorder, RecorderError> {
  const recorder = new GraphRecorder();
  const options = optionsFromEnv(env);
  if (options === undefined) return Ok(recorder);

  const enabled = recorder.enable(options);
  return enabled.ok ? Ok(recorder) : Err(enabled.error);
}
