import type { ContentHandle } from './output-tree.js';

export interface MergedEntry {
  readonly path: string;
  readonly content: ContentHandle;
  readonly part: string;
  readonly sourcePath: string;
}

/**
 * Read-only view over the assembled bundle. Instances are created by the tree merger once every
 * part has been folded in and cannot be changed afterwards.
 */
export class MergedTree {
  private readonly byPath: ReadonlyMap<string, MergedEntry>;
  private readonly sortedPaths: readonly string[];

  private constructor(entries: ReadonlyMap<string, MergedEntry>) {
    this.byPath = entries;
    this.sortedPaths = Object.freeze([...entries.keys()].sort(comparePaths));
    Object.freeze(this);
  }

  static fromEntries(entries: Iterable<MergedEntry>): MergedTree {
    const byPath = new Map<string, MergedEntry>();
    for (const entry of entries) {
      byPath.set(entry.path, Object.freeze({ ...entry }));
    }
    return new MergedTree(byPath);
  }

  get size(): number {
    return this.byPath.size;
  }

  get(path: string): MergedEntry | undefined {
    return this.byPath.get(path);
  }

  has(path: string): boolean {
    return this.byPath.has(path);
  }

  paths(): readonly string[] {
    return this.sortedPaths;
  }

  entries(): readonly MergedEntry[] {
    return this.sortedPaths.flatMap((path) => {
      const entry = this.byPath.get(path);
      return entry ? [entry] : [];
    });
  }

  /** Number of files each part contributes to the final tree. */
  countByPart(): ReadonlyMap<string, number> {
    const counts = new Map<string, number>();
    for (const entry of this.byPath.values()) {
      counts.set(entry.part, (counts.get(entry.part) ?? 0) + 1);
    }
    return counts;
  }
}

export function comparePaths(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}
