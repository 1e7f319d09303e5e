/**
 * Decides whether a source file lies under one of the configured filter roots.
 */

import { realpathSync } from "node:fs";
import * as path from "node:path";

/**
 * Absolute, normalized form of `p` with symlinks resolved as far as the path
 * exists. A missing tail is appended as-is, so files that are not on disk
 * (yet) still canonicalize.
 */
export function canonicalize(p: string): string {
  const absolute = path.resolve(p);
  const missing: string[] = [];
  let current = absolute;

  for (;;) {
    try {
      const real = realpathSync.native(current);
      return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
    } catch {
      const parent = path.dirname(current);
      if (parent === current) {
        return absolute;
      }
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

/**
 * True when `child` is `root` itself or nested below it.
 * Both arguments must already be canonical.
 */
export function isWithin(root: string, child: string): boolean {
  const rel = path.relative(root, child);
  if (rel === "") return true;
  if (path.isAbsolute(rel)) return false;
  return rel !== ".." && !rel.startsWith(`..${path.sep}`);
}

export class PathFilter {
  private readonly canonicalRoots: readonly string[];

  /**
   * An empty root list disables filtering: every path is in scope.
   */
  constructor(roots: readonly string[] = []) {
    this.canonicalRoots = roots.map(canonicalize);
  }

  get roots(): readonly string[] {
    return this.canonicalRoots;
  }

  get isFiltering(): boolean {
    return this.canonicalRoots.length > 0;
  }

  inScope(file: string): boolean {
    if (!this.isFiltering) return true;
    const canonical = canonicalize(file);
    return this.canonicalRoots.some((root) => isWithin(root, canonical));
  }
}
