/**
 * In-memory graph built from recorder records.
 *
 * The record stream is append-only, so the store deduplicates:
 * - every logical edge or definition has one key; the last record wins
 * - `invalidate` drops the defs, refs and calls previously recorded from the
 *   module's file, because the recheck that follows re-emits whatever survived
 * - `module` drops that module's imports; its imports are re-recorded while
 *   the import graph is rebuilt, before any invalidation
 */

import type { ClassRefKind, GraphRecord } from "@codegraph/recorder";
import type {
  CallEdge,
  ClassRefEdge,
  Definition,
  DefinitionKind,
  GraphStats,
  ImportEdge,
  ModuleInfo,
} from "./model.js";

type FileFact =
  | { kind: "def"; key: string }
  | { kind: "call"; key: string }
  | { kind: "ref"; key: string };

function addToIndex(index: Map<string, Set<string>>, name: string, key: string): void {
  let keys = index.get(name);
  if (!keys) {
    keys = new Set();
    index.set(name, keys);
  }
  keys.add(key);
}

function removeFromIndex(index: Map<string, Set<string>>, name: string, key: string): void {
  const keys = index.get(name);
  if (!keys) return;
  keys.delete(key);
  if (keys.size === 0) index.delete(name);
}

function factId(fact: FileFact): string {
  return `${fact.kind}\0${fact.key}`;
}

export class GraphStore {
  private modules = new Map<string, string>(); // module -> file
  private imports = new Map<string, Map<string, ImportEdge>>(); // importer -> importee -> edge
  private importers = new Map<string, Set<string>>(); // importee -> importers

  private definitions = new Map<string, Definition>(); // "kind:fullname" -> def
  private calls = new Map<string, CallEdge>();
  private callsByCaller = new Map<string, Set<string>>();
  private callsByCallee = new Map<string, Set<string>>();
  private refs = new Map<string, ClassRefEdge>();
  private refsBySrc = new Map<string, Set<string>>();
  private refsByDst = new Map<string, Set<string>>();

  // file -> facts recorded from it in the current generation
  private fileFacts = new Map<string, Map<string, FileFact>>();
  private invalidations = 0;

  /**
   * Apply one record from the stream.
   */
  apply(record: GraphRecord): void {
    switch (record.type) {
      case "module":
        this.modules.set(record.module, record.file);
        this.dropImports(record.module);
        break;
      case "import":
        this.addImport({ importer: record.importer, importee: record.importee, file: record.file });
        break;
      case "invalidate":
        this.invalidate(this.modules.get(record.module) ?? record.file);
        break;
      case "class_def":
        this.addDefinition({ fullname: record.fullname, kind: "class", file: record.file });
        break;
      case "function_def":
        this.addDefinition({ fullname: record.fullname, kind: "function", file: record.file });
        break;
      case "class_ref":
        this.addClassRef({ src: record.src, dst: record.dst, kind: record.kind, file: record.file });
        break;
      case "call":
        this.addCall({ caller: record.caller, callee: record.callee, file: record.file });
        break;
    }
  }

  applyAll(records: Iterable<GraphRecord>): number {
    let count = 0;
    for (const record of records) {
      this.apply(record);
      count++;
    }
    return count;
  }

  clear(): void {
    this.modules.clear();
    this.imports.clear();
    this.importers.clear();
    this.definitions.clear();
    this.calls.clear();
    this.callsByCaller.clear();
    this.callsByCallee.clear();
    this.refs.clear();
    this.refsBySrc.clear();
    this.refsByDst.clear();
    this.fileFacts.clear();
    this.invalidations = 0;
  }

  // --- Mutation ---

  private addImport(edge: ImportEdge): void {
    let edges = this.imports.get(edge.importer);
    if (!edges) {
      edges = new Map();
      this.imports.set(edge.importer, edges);
    }
    edges.set(edge.importee, edge);
    addToIndex(this.importers, edge.importee, edge.importer);
  }

  private dropImports(importer: string): void {
    const edges = this.imports.get(importer);
    if (!edges) return;
    for (const importee of edges.keys()) {
      removeFromIndex(this.importers, importee, importer);
    }
    this.imports.delete(importer);
  }

  private addDefinition(def: Definition): void {
    const key = `${def.kind}:${def.fullname}`;
    const previous = this.definitions.get(key);
    if (previous) this.untrack(previous.file, { kind: "def", key });
    this.definitions.set(key, def);
    this.track(def.file, { kind: "def", key });
  }

  private addCall(edge: CallEdge): void {
    const key = `${edge.caller}\0${edge.callee}`;
    const previous = this.calls.get(key);
    if (previous) this.untrack(previous.file, { kind: "call", key });
    this.calls.set(key, edge);
    addToIndex(this.callsByCaller, edge.caller, key);
    addToIndex(this.callsByCallee, edge.callee, key);
    this.track(edge.file, { kind: "call", key });
  }

  private addClassRef(edge: ClassRefEdge): void {
    const key = `${edge.src}\0${edge.dst}\0${edge.kind}`;
    const previous = this.refs.get(key);
    if (previous) this.untrack(previous.file, { kind: "ref", key });
    this.refs.set(key, edge);
    addToIndex(this.refsBySrc, edge.src, key);
    addToIndex(this.refsByDst, edge.dst, key);
    this.track(edge.file, { kind: "ref", key });
  }

  private invalidate(file: string): void {
    this.invalidations++;
    const facts = this.fileFacts.get(file);
    if (!facts) return;

    for (const fact of facts.values()) {
      switch (fact.kind) {
        case "def":
          this.definitions.delete(fact.key);
          break;
        case "call": {
          const edge = this.calls.get(fact.key);
          if (!edge) break;
          this.calls.delete(fact.key);
          removeFromIndex(this.callsByCaller, edge.caller, fact.key);
          removeFromIndex(this.callsByCallee, edge.callee, fact.key);
          break;
        }
        case "ref": {
          const edge = this.refs.get(fact.key);
          if (!edge) break;
          this.refs.delete(fact.key);
          removeFromIndex(this.refsBySrc, edge.src, fact.key);
          removeFromIndex(this.refsByDst, edge.dst, fact.key);
          break;
        }
      }
    }
    this.fileFacts.delete(file);
  }

  private track(file: string, fact: FileFact): void {
    let facts = this.fileFacts.get(file);
    if (!facts) {
      facts = new Map();
      this.fileFacts.set(file, facts);
    }
    facts.set(factId(fact), fact);
  }

  private untrack(file: string, fact: FileFact): void {
    const facts = this.fileFacts.get(file);
    if (!facts) return;
    facts.delete(factId(fact));
    if (facts.size === 0) this.fileFacts.delete(file);
  }

  // --- Queries ---

  getModule(name: string): ModuleInfo | null {
    const file = this.modules.get(name);
    return file === undefined ? null : { name, file };
  }

  listModules(): ModuleInfo[] {
    return Array.from(this.modules, ([name, file]) => ({ name, file }));
  }

  /** Modules imported by `module` */
  getImports(module: string): string[] {
    return Array.from(this.imports.get(module)?.keys() ?? []);
  }

  /** Modules that import `module` */
  getImporters(module: string): string[] {
    return Array.from(this.importers.get(module) ?? []);
  }

  getDefinition(fullname: string, kind?: DefinitionKind): Definition | null {
    if (kind) return this.definitions.get(`${kind}:${fullname}`) ?? null;
    return (
      this.definitions.get(`class:${fullname}`) ??
      this.definitions.get(`function:${fullname}`) ??
      null
    );
  }

  findDefinitions(pattern: RegExp, kind?: DefinitionKind, limit: number = 100): Definition[] {
    const results: Definition[] = [];
    for (const def of this.definitions.values()) {
      if (results.length >= limit) break;
      if (kind && def.kind !== kind) continue;
      if (pattern.test(def.fullname)) results.push(def);
    }
    return results;
  }

  definitionsInFile(file: string): Definition[] {
    const results: Definition[] = [];
    for (const def of this.definitions.values()) {
      if (def.file === file) results.push(def);
    }
    return results;
  }

  /** Call edges landing on `callee` */
  getCallers(callee: string): CallEdge[] {
    return this.collect(this.calls, this.callsByCallee.get(callee));
  }

  /** Call edges leaving `caller` */
  getCallees(caller: string): CallEdge[] {
    return this.collect(this.calls, this.callsByCaller.get(caller));
  }

  getClassRefsTo(dst: string, kinds?: ClassRefKind[]): ClassRefEdge[] {
    const edges = this.collect(this.refs, this.refsByDst.get(dst));
    return kinds ? edges.filter((e) => kinds.includes(e.kind)) : edges;
  }

  getClassRefsFrom(src: string, kinds?: ClassRefKind[]): ClassRefEdge[] {
    const edges = this.collect(this.refs, this.refsBySrc.get(src));
    return kinds ? edges.filter((e) => kinds.includes(e.kind)) : edges;
  }

  /** Classes recorded as inheriting from `fullname` */
  getSubclasses(fullname: string): string[] {
    return this.getClassRefsTo(fullname, ["INHERITANCE"]).map((e) => e.src);
  }

  stats(): GraphStats {
    let imports = 0;
    for (const edges of this.imports.values()) imports += edges.size;

    let classDefs = 0;
    let functionDefs = 0;
    const files = new Set<string>(this.modules.values());
    for (const def of this.definitions.values()) {
      if (def.kind === "class") classDefs++;
      else functionDefs++;
    }
    for (const file of this.fileFacts.keys()) files.add(file);

    return {
      modules: this.modules.size,
      imports,
      classDefs,
      functionDefs,
      classRefs: this.refs.size,
      calls: this.calls.size,
      files: files.size,
      invalidations: this.invalidations,
    };
  }

  isEmpty(): boolean {
    return (
      this.modules.size === 0 &&
      this.imports.size === 0 &&
      this.definitions.size === 0 &&
      this.calls.size === 0 &&
      this.refs.size === 0
    );
  }

  private collect<T>(edges: Map<string, T>, keys: Set<string> | undefined): T[] {
    const result: T[] = [];
    for (const key of keys ?? []) {
      const edge = edges.get(key);
      if (edge) result.push(edge);
    }
    return result;
  }
}
