import type { Stats } from 'node:fs';
import { stat } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import fg from 'fast-glob';

import type { PartDeclaration } from '../../config/index.js';
import { PartOutputNotFoundError } from '../../domain/errors.js';
import { createOutputTree, type ContentHandle, type OutputTree } from '../../domain/model/index.js';
import type { PartOutputRepositoryPort } from '../../domain/ports/index.js';

export const DEFAULT_PARTS_DIRECTORY = 'parts';
export const DEFAULT_INSTALL_DIRECTORY = 'install';

export interface FileSystemPartOutputRepositoryOptions {
  /** Directory holding one sub-directory per part. Defaults to `parts`. */
  readonly partsDir?: string;
  /** Directory inside each part holding its build output. Defaults to `install`. */
  readonly installDir?: string;
  readonly cwd?: () => string;
  readonly glob?: (patterns: readonly string[], options: fg.Options) => Promise<string[]>;
  readonly stat?: typeof stat;
}

/**
 * Reads each part's output tree from `<partsDir>/<part>/<installDir>` on disk, including dotfiles.
 * Symbolic links to files are kept under their own path. Links to directories are not descended
 * into and dangling links are skipped.
 */
export class FileSystemPartOutputRepository implements PartOutputRepositoryPort {
  private readonly partsDir: string;
  private readonly installDir: string;
  private readonly cwdImpl: Required<FileSystemPartOutputRepositoryOptions>['cwd'];
  private readonly globImpl: Required<FileSystemPartOutputRepositoryOptions>['glob'];
  private readonly statImpl: Required<FileSystemPartOutputRepositoryOptions>['stat'];

  constructor(options: FileSystemPartOutputRepositoryOptions = {}) {
    this.partsDir = options.partsDir ?? DEFAULT_PARTS_DIRECTORY;
    this.installDir = options.installDir ?? DEFAULT_INSTALL_DIRECTORY;
    this.cwdImpl = options.cwd ?? process.cwd.bind(process);
    this.globImpl = options.glob ?? defaultGlob;
    this.statImpl = options.stat ?? stat;
  }

  locate(part: Pick<PartDeclaration, 'name'>): string {
    return path.resolve(this.cwdImpl(), this.partsDir, part.name, this.installDir);
  }

  async load(part: PartDeclaration): Promise<OutputTree> {
    const root = this.locate(part);
    await this.assertDirectory(part.name, root);

    // Symlinks are neither files nor directories to fast-glob, so directories are filtered here.
    const matches = await this.globImpl(['**/*'], {
      cwd: root,
      onlyFiles: false,
      markDirectories: true,
      dot: true,
      followSymbolicLinks: false,
    });
    const relativePaths = matches
      .map((match) => toPosix(match))
      .filter((match) => !match.endsWith('/'))
      .sort();

    const entries: (readonly [string, ContentHandle])[] = [];
    for (const relativePath of relativePaths) {
      const absolute = path.join(root, relativePath);
      const stats = await this.statTarget(absolute);
      if (stats?.isFile()) {
        entries.push([relativePath, { uri: pathToFileURL(absolute).href, size: stats.size }]);
      }
    }
    return createOutputTree(entries);
  }

  private async statTarget(absolute: string): Promise<Stats | undefined> {
    try {
      return await this.statImpl(absolute);
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  private async assertDirectory(part: string, root: string): Promise<void> {
    try {
      const stats = await this.statImpl(root);
      if (!stats.isDirectory()) {
        throw new PartOutputNotFoundError(part, root);
      }
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new PartOutputNotFoundError(part, root);
      }
      throw error;
    }
  }
}

async function defaultGlob(patterns: readonly string[], options: fg.Options): Promise<string[]> {
  return fg([...patterns], options);
}

function toPosix(value: string): string {
  return value.split(path.sep).join(path.posix.sep);
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
