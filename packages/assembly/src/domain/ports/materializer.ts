import type { MergedTree } from '../model/index.js';
import type { LinkedApp } from '../services/index.js';

export interface MaterializedBundle {
  readonly directory: string;
  readonly fileCount: number;
  readonly descriptorPath: string;
}

/**
 * Writes an assembled tree and its app descriptors somewhere persistent.
 */
export interface TreeMaterializerPort {
  materialize(tree: MergedTree, apps: readonly LinkedApp[]): Promise<MaterializedBundle>;
}
