import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { MergedTree } from '../../domain/model/index.js';
import type { LinkedApp } from '../../domain/services/index.js';
import { FileSystemTreeMaterializer } from './file-system-tree-materializer.js';

describe('FileSystemTreeMaterializer', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), 'partkit-bundle-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('copies files to their merged paths and writes app descriptors', async () => {
    const source = path.join(workspace, 'parts', 'probert', 'install', 'bin', 'probert');
    await mkdir(path.dirname(source), { recursive: true });
    await writeFile(source, 'probert\n', 'utf8');
    const tree = MergedTree.fromEntries([
      {
        path: 'usr/bin/probert',
        content: { uri: pathToFileURL(source).href },
        part: 'probert',
        sourcePath: 'bin/probert',
      },
    ]);
    const apps: LinkedApp[] = [
      {
        name: 'probert',
        command: 'usr/bin/probert',
        args: [],
        providedBy: 'probert',
        isDaemon: false,
        environment: [{ name: 'LANG', value: 'C.UTF-8', references: [] }],
      },
    ];
    const outDir = path.join(workspace, 'out');

    const bundle = await new FileSystemTreeMaterializer({ outDir }).materialize(tree, apps);

    expect(bundle).toEqual({
      directory: outDir,
      fileCount: 1,
      descriptorPath: path.join(outDir, 'meta', 'apps.json'),
    });
    await expect(readFile(path.join(outDir, 'usr', 'bin', 'probert'), 'utf8')).resolves.toBe(
      'probert\n',
    );
    const descriptor: unknown = JSON.parse(await readFile(bundle.descriptorPath, 'utf8'));
    expect(descriptor).toEqual({ apps });
    const raw = await readFile(bundle.descriptorPath, 'utf8');
    expect(raw.indexOf('"args"')).toBeLessThan(raw.indexOf('"command"'));
  });

  it('refuses content that is not a file URL', async () => {
    const tree = MergedTree.fromEntries([
      { path: 'a', content: { uri: 'memory://tools/a' }, part: 'tools', sourcePath: 'a' },
    ]);

    await expect(
      new FileSystemTreeMaterializer({ outDir: path.join(workspace, 'out') }).materialize(tree, []),
    ).rejects.toThrow(
      'Cannot materialize content from "memory://tools/a": only file URLs are supported.',
    );
  });
});
