/**
 * Module table: fully-qualified module name -> defining source file.
 * Filled as the host reports modules; entries are never removed within a run.
 */

export interface ResolvedSymbol {
  module: string;
  file: string;
}

export class ModuleResolver {
  private readonly table: Map<string, string> = new Map();

  /**
   * Bind a module to its file. Re-registering is allowed; the last path wins.
   */
  register(moduleName: string, filePath: string): void {
    this.table.set(moduleName, filePath);
  }

  resolve(moduleName: string): string | undefined {
    return this.table.get(moduleName);
  }

  has(moduleName: string): boolean {
    return this.table.has(moduleName);
  }

  /**
   * Find the module defining a dotted symbol name: the longest strict prefix
   * of `fullname` that is registered. `pkg.mod.Cls.meth` resolves through
   * `pkg.mod` when `pkg.mod.Cls` is not itself a module.
   */
  resolveSymbol(fullname: string): ResolvedSymbol | undefined {
    let end = fullname.lastIndexOf(".");
    while (end > 0) {
      const candidate = fullname.slice(0, end);
      const file = this.table.get(candidate);
      if (file !== undefined) {
        return { module: candidate, file };
      }
      end = fullname.lastIndexOf(".", end - 1);
    }
    return undefined;
  }

  get size(): number {
    return this.table.size;
  }

  entries(): IterableIterator<[string, string]> {
    return this.table.entries();
  }
}
