/**
 * Opaque reference to built content. The engine re-paths handles but never reads, copies or
 * mutates the content behind them.
 */
export interface ContentHandle {
  readonly uri: string;
  readonly size?: number;
}

/**
 * Files produced by one part's build, keyed by their path relative to the part's install root.
 */
export type OutputTree = ReadonlyMap<string, ContentHandle>;

export interface StagedFile {
  /** Destination path relative to the logical root of the bundle. */
  readonly path: string;
  readonly content: ContentHandle;
  readonly part: string;
  /** Path of the file in the part's output tree before organize rules were applied. */
  readonly sourcePath: string;
}

/**
 * Builds an immutable output tree from path/handle pairs.
 */
export function createOutputTree(
  entries: Iterable<readonly [string, ContentHandle]>,
): OutputTree {
  const tree = new Map<string, ContentHandle>();
  for (const [path, content] of entries) {
    tree.set(path, Object.freeze({ ...content }));
  }
  return tree;
}
