/**
 * GraphService - loads a recorder stream into a GraphStore and keeps it
 * current while the recorder appends to it.
 */

import { closeSync, fstatSync, openSync, readSync, watch, type FSWatcher } from "node:fs";
import { resolve } from "node:path";
import { toError, tryCatch } from "@codegraph/core";
import type { ClassRefKind } from "@codegraph/recorder";
import { GraphStore } from "./GraphStore.js";
import { readRecords } from "./reader.js";
import {
  type CallEdge,
  type ClassRefEdge,
  type Definition,
  type DefinitionKind,
  type GraphStats,
  type LoadSummary,
  type ModuleDetails,
  type ModuleInfo,
  type SymbolInfo,
  type Result,
  Ok,
  Err,
} from "./model.js";

export interface LoadOptions {
  /** Watch the file and apply records appended after the initial load */
  follow?: boolean;
}

const NOT_LOADED = "Graph not loaded. Call graph_load first.";

export class GraphService {
  private file: string | null = null;
  private offset = 0;
  private lineNumber = 0;
  // last complete line consumed, ending at `offset`
  private lastLine: Buffer = Buffer.alloc(0);

  private watcher: FSWatcher | null = null;
  private catchUpTimer: NodeJS.Timeout | null = null;
  private readonly catchUpDebounceMs = 200;

  constructor(readonly store: GraphStore = new GraphStore()) {}

  /**
   * Replace the graph with the contents of `file`.
   */
  load(file: string, options: LoadOptions = {}): Result<LoadSummary, Error> {
    this.stopWatcher();
    this.store.clear();
    this.file = resolve(file);
    this.resetPosition();

    const result = this.catchUp();
    if (!result.ok) {
      this.file = null;
      return result;
    }

    if (options.follow) this.startWatcher();
    return result;
  }

  isLoaded(): boolean {
    return this.file !== null;
  }

  get loadedFile(): string | null {
    return this.file;
  }

  /**
   * Apply the complete lines appended since the last read. A trailing line
   * without its newline stays unread until the rest of it arrives. A file
   * that shrank, or whose bytes before the read position no longer end with
   * the last line consumed, was rewritten by a new recording run, so the
   * graph is rebuilt from scratch.
   */
  catchUp(): Result<LoadSummary, Error> {
    const file = this.file;
    if (file === null) return Err(new Error(NOT_LOADED));

    const start = performance.now();
    let text: string;
    try {
      text = this.readCompleteLines(file);
    } catch (e) {
      return Err(toError(e));
    }

    const { records, invalid } = readRecords(text, this.lineNumber + 1);
    this.lineNumber += text.split("\n").length - 1;
    this.store.applyAll(records);

    return Ok({ file, records: records.length, invalid, loadMs: performance.now() - start });
  }

  dispose(): void {
    this.stopWatcher();
  }

  private readCompleteLines(file: string): string {
    const fd = openSync(file, "r");
    try {
      const size = fstatSync(fd).size;
      if (size < this.offset || !this.endsWithLastLine(fd)) {
        console.error(`[graph] ${file} was rewritten, reloading`);
        this.store.clear();
        this.resetPosition();
      }

      const buffer = readAt(fd, size - this.offset, this.offset);

      // 0x0a never occurs inside a multi-byte UTF-8 sequence
      const end = buffer.lastIndexOf(0x0a) + 1;
      if (end > 0) {
        const start = end >= 2 ? buffer.lastIndexOf(0x0a, end - 2) + 1 : 0;
        this.lastLine = Buffer.from(buffer.subarray(start, end));
      }
      this.offset += end;
      return buffer.subarray(0, end).toString("utf8");
    } finally {
      closeSync(fd);
    }
  }

  private endsWithLastLine(fd: number): boolean {
    const length = this.lastLine.length;
    if (length === 0) return true;
    return readAt(fd, length, this.offset - length).equals(this.lastLine);
  }

  private resetPosition(): void {
    this.offset = 0;
    this.lineNumber = 0;
    this.lastLine = Buffer.alloc(0);
  }

  // --- Follow mode ---

  private startWatcher(): void {
    if (this.file === null || this.watcher) return;

    try {
      this.watcher = watch(this.file, () => this.scheduleCatchUp());
      this.watcher.on("error", (error) => {
        console.error("[graph] Watch error:", error.message);
      });
      console.error(`[graph] Following ${this.file}`);
    } catch (error) {
      console.error("[graph] Failed to start watcher:", error);
    }
  }

  private stopWatcher(): void {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.catchUpTimer) {
      clearTimeout(this.catchUpTimer);
      this.catchUpTimer = null;
    }
  }

  private scheduleCatchUp(): void {
    if (this.catchUpTimer) return;

    this.catchUpTimer = setTimeout(() => {
      this.catchUpTimer = null;
      const result = this.catchUp();
      if (!result.ok) {
        console.error("[graph] Failed to read appended records:", result.error.message);
      } else if (result.value.records > 0 || result.value.invalid.length > 0) {
        console.error(
          `[graph] Applied ${result.value.records} record(s)` +
            (result.value.invalid.length > 0 ? `, ${result.value.invalid.length} invalid` : "")
        );
      }
    }, this.catchUpDebounceMs);
  }

  // --- Query API ---

  getStats(): Result<GraphStats, Error> {
    if (!this.isLoaded()) return Err(new Error(NOT_LOADED));
    return Ok(this.store.stats());
  }

  getCallers(symbol: string): Result<CallEdge[], Error> {
    if (!this.isLoaded()) return Err(new Error(NOT_LOADED));
    return Ok(this.store.getCallers(symbol));
  }

  getCallees(symbol: string): Result<CallEdge[], Error> {
    if (!this.isLoaded()) return Err(new Error(NOT_LOADED));
    return Ok(this.store.getCallees(symbol));
  }

  getImports(
    module: string,
    direction: "imports" | "importers" = "imports"
  ): Result<string[], Error> {
    if (!this.isLoaded()) return Err(new Error(NOT_LOADED));
    return Ok(direction === "imports" ? this.store.getImports(module) : this.store.getImporters(module));
  }

  getClassRefs(
    symbol: string,
    direction: "to" | "from" = "to",
    kinds?: ClassRefKind[]
  ): Result<ClassRefEdge[], Error> {
    if (!this.isLoaded()) return Err(new Error(NOT_LOADED));
    return Ok(
      direction === "to"
        ? this.store.getClassRefsTo(symbol, kinds)
        : this.store.getClassRefsFrom(symbol, kinds)
    );
  }

  getSymbol(fullname: string): Result<SymbolInfo, Error> {
    if (!this.isLoaded()) return Err(new Error(NOT_LOADED));

    const definition = this.store.getDefinition(fullname);
    if (definition === null) return Err(new Error(`Symbol not found: ${fullname}`));

    return Ok({
      definition,
      callers: this.store.getCallers(fullname),
      callees: this.store.getCallees(fullname),
      references: this.store.getClassRefsTo(fullname),
      subclasses: this.store.getSubclasses(fullname),
    });
  }

  getModule(name: string): Result<ModuleDetails, Error> {
    if (!this.isLoaded()) return Err(new Error(NOT_LOADED));

    const module = this.store.getModule(name);
    if (module === null) return Err(new Error(`Module not recorded: ${name}`));

    return Ok({
      module,
      imports: this.store.getImports(name),
      importers: this.store.getImporters(name),
      definitions: this.store.definitionsInFile(module.file),
    });
  }

  /** Recorded modules sorted by name, optionally filtered by a case-insensitive regex */
  listModules(pattern?: string): Result<ModuleInfo[], Error> {
    if (!this.isLoaded()) return Err(new Error(NOT_LOADED));

    let modules = this.store.listModules();
    if (pattern !== undefined) {
      const regex = compilePattern(pattern);
      if (!regex.ok) return regex;
      modules = modules.filter((m) => regex.value.test(m.name));
    }
    return Ok(modules.sort((a, b) => a.name.localeCompare(b.name)));
  }

  findDefinitions(options: {
    pattern: string;
    kind?: DefinitionKind;
    limit?: number;
  }): Result<Definition[], Error> {
    if (!this.isLoaded()) return Err(new Error(NOT_LOADED));

    const regex = compilePattern(options.pattern);
    if (!regex.ok) return regex;
    return Ok(this.store.findDefinitions(regex.value, options.kind, options.limit));
  }
}

function compilePattern(pattern: string): Result<RegExp, Error> {
  return tryCatch(
    () => new RegExp(pattern, "i"),
    (e) => new Error(`Invalid pattern: ${e.message}`)
  );
}

function readAt(fd: number, length: number, position: number): Buffer {
  const buffer = Buffer.alloc(length);
  let read = 0;
  while (read < length) {
    const n = readSync(fd, buffer, read, length - read, position + read);
    if (n === 0) break;
    read += n;
  }
  return buffer.subarray(0, read);
}
