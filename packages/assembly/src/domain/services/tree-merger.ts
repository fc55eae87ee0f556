import { ConflictError, ManifestError } from '../errors.js';
import { comparePaths, MergedTree, type MergedEntry } from '../model/index.js';
import type { ResolvedPartOutput } from './part-output-resolver.js';
import { ancestorPaths } from './relative-path.js';

export type ConflictPolicy = 'last-writer-wins' | 'strict';

export interface MergeOptions {
  readonly policy?: ConflictPolicy;
  /** Paths allowed to collide under the strict policy. */
  readonly acknowledgedConflicts?: readonly string[];
}

export interface FileProvenance {
  readonly part: string;
  /** Destination of the file in the bundle. */
  readonly path: string;
  readonly sourcePath: string;
}

/**
 * `overwrite` when both parts stage the same path, `file-directory` when one part stages a file
 * where another part needs a directory.
 */
export type ConflictKind = 'overwrite' | 'file-directory';

export interface ConflictRecord {
  /** Path of the losing file, which is no longer part of the tree. */
  readonly path: string;
  readonly kind: ConflictKind;
  readonly loser: FileProvenance;
  readonly winner: FileProvenance;
  readonly acknowledged: boolean;
}

export interface MergeResult {
  readonly tree: MergedTree;
  readonly conflicts: readonly ConflictRecord[];
  readonly partOrder: readonly string[];
}

/**
 * Folds resolved part outputs into one tree in declared order. A later part overwrites the files
 * of earlier parts and every overwrite lands in the conflict log. A file staged where an earlier
 * part placed a directory, or beneath an earlier part's file, displaces the earlier files the same
 * way, so the merged tree can always be written to disk.
 *
 * @param outputs - Resolved outputs in declared part order.
 * @param options - Conflict policy and the collisions acknowledged under `strict`.
 * @throws {ManifestError} When two outputs carry the same part name.
 * @throws {ConflictError} Under `strict`, on the first unacknowledged collision.
 */
export function mergePartOutputs(
  outputs: readonly ResolvedPartOutput[],
  options: MergeOptions = {},
): MergeResult {
  const policy = options.policy ?? 'last-writer-wins';
  const acknowledged = new Set(options.acknowledgedConflicts ?? []);
  const seenParts = new Set<string>();
  const entries = new MergedEntries();
  const conflicts: ConflictRecord[] = [];

  for (const output of outputs) {
    if (seenParts.has(output.part)) {
      throw new ManifestError(`Part "${output.part}" is declared more than once.`, [
        { path: `parts.${output.part}`, message: 'Duplicate part name.' },
      ]);
    }
    seenParts.add(output.part);

    for (const file of output.files) {
      const winner = provenance(file);
      for (const { kind, loser } of entries.collisions(file.path)) {
        const isAcknowledged = acknowledged.has(loser.path) || acknowledged.has(file.path);
        if (policy === 'strict' && !isAcknowledged) {
          throw new ConflictError(loser.path, [loser.part, file.part], file.path);
        }
        entries.delete(loser.path);
        conflicts.push(
          Object.freeze({
            path: loser.path,
            kind,
            loser: provenance(loser),
            winner,
            acknowledged: isAcknowledged,
          }),
        );
      }
      entries.set({
        path: file.path,
        content: file.content,
        part: file.part,
        sourcePath: file.sourcePath,
      });
    }
  }

  return Object.freeze({
    tree: MergedTree.fromEntries(entries.values()),
    conflicts: Object.freeze(conflicts),
    partOrder: Object.freeze([...seenParts]),
  });
}

function provenance(entry: Pick<MergedEntry, 'part' | 'path' | 'sourcePath'>): FileProvenance {
  return Object.freeze({ part: entry.part, path: entry.path, sourcePath: entry.sourcePath });
}

/** Entries keyed by path, plus the number of files beneath each directory. */
class MergedEntries {
  private readonly byPath = new Map<string, MergedEntry>();
  private readonly fileCounts = new Map<string, number>();

  /** Existing files that cannot stay once a file is placed at `path`. */
  collisions(path: string): readonly { kind: ConflictKind; loser: MergedEntry }[] {
    const same = this.byPath.get(path);
    if (same) {
      return [{ kind: 'overwrite', loser: same }];
    }
    const clashing: MergedEntry[] = ancestorPaths(path).flatMap((ancestor) => {
      const entry = this.byPath.get(ancestor);
      return entry ? [entry] : [];
    });
    if (this.fileCounts.has(path)) {
      const prefix = `${path}/`;
      for (const [candidate, entry] of this.byPath) {
        if (candidate.startsWith(prefix)) {
          clashing.push(entry);
        }
      }
    }
    return clashing
      .sort((left, right) => comparePaths(left.path, right.path))
      .map((loser) => ({ kind: 'file-directory' as const, loser }));
  }

  set(entry: MergedEntry): void {
    if (!this.byPath.has(entry.path)) {
      this.adjustCounts(entry.path, 1);
    }
    this.byPath.set(entry.path, entry);
  }

  delete(path: string): void {
    if (this.byPath.delete(path)) {
      this.adjustCounts(path, -1);
    }
  }

  values(): Iterable<MergedEntry> {
    return this.byPath.values();
  }

  private adjustCounts(path: string, delta: number): void {
    for (const directory of ancestorPaths(path)) {
      const count = (this.fileCounts.get(directory) ?? 0) + delta;
      if (count === 0) {
        this.fileCounts.delete(directory);
      } else {
        this.fileCounts.set(directory, count);
      }
    }
  }
}
