import { copyFile, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { runTaskQueue } from '@partkit/core/concurrency';
import stringify from 'safe-stable-stringify';

import type { MergedTree } from '../../domain/model/index.js';
import type { MaterializedBundle, TreeMaterializerPort } from '../../domain/ports/index.js';
import type { LinkedApp } from '../../domain/services/index.js';

export const APP_DESCRIPTOR_PATH = 'meta/apps.json';

export interface FileSystemTreeMaterializerOptions {
  readonly outDir: string;
  readonly concurrency?: number;
}

/**
 * Copies every file of a merged tree to `<outDir>/<path>` and writes the linked app descriptors
 * to `<outDir>/meta/apps.json` with a stable key order.
 */
export class FileSystemTreeMaterializer implements TreeMaterializerPort {
  private readonly outDir: string;
  private readonly concurrency: number | undefined;

  constructor(options: FileSystemTreeMaterializerOptions) {
    this.outDir = path.resolve(options.outDir);
    this.concurrency = options.concurrency;
  }

  async materialize(tree: MergedTree, apps: readonly LinkedApp[]): Promise<MaterializedBundle> {
    const tasks = tree.entries().map((entry) => ({
      id: entry.path,
      run: async () => {
        const target = path.join(this.outDir, ...entry.path.split('/'));
        await mkdir(path.dirname(target), { recursive: true });
        await copyFile(toFilePath(entry.content.uri), target);
        return target;
      },
    }));

    await runTaskQueue(tasks, {
      ...(this.concurrency === undefined ? {} : { concurrency: this.concurrency }),
    });

    const descriptorPath = path.join(this.outDir, ...APP_DESCRIPTOR_PATH.split('/'));
    await mkdir(path.dirname(descriptorPath), { recursive: true });
    await writeFile(descriptorPath, `${stringify({ apps }, null, 2)}\n`, 'utf8');

    return {
      directory: this.outDir,
      fileCount: tasks.length,
      descriptorPath,
    } satisfies MaterializedBundle;
  }
}

function toFilePath(uri: string): string {
  if (!uri.startsWith('file:')) {
    throw new Error(`Cannot materialize content from "${uri}": only file URLs are supported.`);
  }
  return fileURLToPath(uri);
}
