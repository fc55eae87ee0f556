import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createMemoryCliIo, type MemoryCliIo } from '../../testing/memory-cli-io.js';
import { runAssembleCli } from './run-assemble-cli.js';

const MANIFEST = [
  'name: toolbox',
  'apps:',
  '  hello:',
  '    command: bin/hello --greet',
  'parts:',
  '  base:',
  "    stage: ['-share']",
  '  overlay:',
  '    organize:',
  '      hello-v2: bin/hello',
  '',
].join('\n');

const PART_FILES: Readonly<Record<string, readonly string[]>> = {
  base: ['bin/hello', 'etc/toolbox.conf', 'share/doc/README'],
  overlay: ['hello-v2'],
};

const parseJsonLine = (line: string): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(line);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new TypeError(`Expected a JSON object, received ${line}`);
  }
  return Object.fromEntries(Object.entries(parsed));
};

describe('runAssembleCli', () => {
  let workspace: string;
  let io: MemoryCliIo;

  const run = (...args: string[]): Promise<number> =>
    runAssembleCli({
      argv: ['node', 'partkit', ...args],
      programName: 'partkit',
      version: '0.0.0-test',
      io,
    });

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), 'partkit-cli-'));
    await writeFile(path.join(workspace, 'partkit.yaml'), MANIFEST, 'utf8');
    for (const [part, files] of Object.entries(PART_FILES)) {
      for (const file of files) {
        const target = path.join(workspace, 'parts', part, 'install', file);
        await mkdir(path.dirname(target), { recursive: true });
        await writeFile(target, `${part}:${file}\n`, 'utf8');
      }
    }
    io = createMemoryCliIo({ cwd: workspace });
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  describe('assemble', () => {
    it('merges parts last-writer-wins and reports the conflict', async () => {
      const exitCode = await run('assemble');

      expect(exitCode).toBe(0);
      expect(io.stderrBuffer).toBe('');
      const [summary, ...rest] = io.stdoutLines;
      expect(summary).toMatch(/^Assembled 2 files from 2 parts in \d+\.\dms\.$/);
      expect(rest).toEqual([
        'Linked 1 app: hello.',
        '1 conflict:',
        '  - bin/hello: overlay (hello-v2) overwrote base (bin/hello)',
      ]);
    });

    it('fails under the strict policy unless the path is acknowledged', async () => {
      const exitCode = await run('assemble', '--conflicts', 'strict');

      expect(exitCode).toBe(1);
      expect(io.stdoutBuffer).toBe('');
      expect(io.stderrBuffer).toBe(
        'Assemble failed: ConflictError: Path "bin/hello" is staged by both "base" and "overlay".\n',
      );
    });

    it('accepts acknowledged conflicts under the strict policy', async () => {
      const exitCode = await run(
        'assemble',
        '--conflicts',
        'strict',
        '--allow-conflict',
        'bin/hello',
      );

      expect(exitCode).toBe(0);
      expect(io.stdoutLines).toContain(
        '  - bin/hello: overlay (hello-v2) overwrote base (bin/hello) [acknowledged]',
      );
    });

    it('materializes the bundle and the app descriptors', async () => {
      const exitCode = await run('assemble', '--out-dir', 'bundle');

      expect(exitCode).toBe(0);
      expect(io.stdoutLines.at(-1)).toBe('Wrote bundle to bundle.');
      await expect(readFile(path.join(workspace, 'bundle/bin/hello'), 'utf8')).resolves.toBe(
        'overlay:hello-v2\n',
      );
      await expect(
        readFile(path.join(workspace, 'bundle/etc/toolbox.conf'), 'utf8'),
      ).resolves.toBe('base:etc/toolbox.conf\n');
      const descriptor = parseJsonLine(
        await readFile(path.join(workspace, 'bundle/meta/apps.json'), 'utf8'),
      );
      expect(descriptor['apps']).toEqual([
        {
          args: ['--greet'],
          command: 'bin/hello',
          environment: [],
          isDaemon: false,
          name: 'hello',
          providedBy: 'overlay',
        },
      ]);
    });

    it('emits a single JSON document with the json reporter', async () => {
      const exitCode = await run('assemble', '--reporter', 'json');

      expect(exitCode).toBe(0);
      expect(io.stdoutLines).toHaveLength(1);
      const payload = parseJsonLine(io.stdoutLines[0] ?? '');
      expect(payload['event']).toBe('assemble.completed');
      expect(payload['fileCount']).toBe(2);
      expect(payload['conflicts']).toEqual([
        {
          path: 'bin/hello',
          kind: 'overwrite',
          loser: { part: 'base', path: 'bin/hello', sourcePath: 'bin/hello' },
          winner: { part: 'overlay', path: 'bin/hello', sourcePath: 'hello-v2' },
          acknowledged: false,
        },
      ]);
    });

    it('writes stage lifecycle logs as JSON lines with --json-logs', async () => {
      const exitCode = await run('--json-logs', 'assemble', '--reporter', 'json');

      expect(exitCode).toBe(0);
      const events = io.stdoutLines.map((line) => parseJsonLine(line)['event']);
      expect(events.slice(0, 2)).toEqual(['assembly.stage.start', 'assembly.stage.complete']);
      expect(events.filter((event) => event === 'assembly.stage.start')).toHaveLength(4);
      expect(events).not.toContain('assembly.timings');
      expect(events.slice(-2)).toEqual(['assemble.completed', 'assembly.completed']);
    });

    it('includes debug entries when verbose', async () => {
      const exitCode = await run('assemble', '--json-logs', '--verbose', '--reporter', 'json');

      expect(exitCode).toBe(0);
      const events = io.stdoutLines.map((line) => parseJsonLine(line)['event']);
      expect(events.filter((event) => event === 'assembly.part.resolved')).toHaveLength(2);
      expect(events).toContain('assembly.timings');
    });

    it('reports a missing manifest', async () => {
      const emptyDirectory = path.join(workspace, 'empty');
      await mkdir(emptyDirectory);
      io = createMemoryCliIo({ cwd: emptyDirectory });

      const exitCode = await run('assemble');

      expect(exitCode).toBe(1);
      expect(io.stderrBuffer).toBe(
        'Assemble failed: Error: Unable to locate a partkit manifest in the current directory.\n',
      );
    });

    it('rejects a non-positive concurrency', async () => {
      const exitCode = await run('assemble', '--concurrency', '0');

      expect(exitCode).toBe(1);
      expect(io.stderrBuffer).toContain(
        'Invalid concurrency "0". Expected a positive integer.',
      );
    });
  });

  describe('validate', () => {
    it('summarises a valid manifest', async () => {
      const exitCode = await run('validate');

      expect(exitCode).toBe(0);
      expect(io.stdoutLines).toEqual(['Manifest toolbox is valid: 2 parts, 2 rules, 1 app.']);
    });

    it('reports structural issues with their key paths', async () => {
      await writeFile(
        path.join(workspace, 'broken.yaml'),
        ['name: broken', 'parts:', '  base:', '    stage: usr/bin', ''].join('\n'),
        'utf8',
      );

      const exitCode = await run('validate', '--config', 'broken.yaml');

      expect(exitCode).toBe(1);
      const [headline, ...issues] = io.stderrBuffer.split('\n');
      expect(headline).toMatch(/^Validate failed: ManifestError: Invalid manifest: /);
      expect(issues[0]).toMatch(/^ {2}- parts\.base\.stage: /);
    });
  });

  describe('inspect', () => {
    it('lists the staged files of the requested part', async () => {
      const exitCode = await run('inspect', '--part', 'overlay');

      expect(exitCode).toBe(0);
      expect(io.stdoutLines).toEqual([
        'overlay: 1 staged file, 0 excluded',
        '  - bin/hello (from hello-v2)',
      ]);
    });

    it('lists every part when none is named', async () => {
      const exitCode = await run('inspect');

      expect(exitCode).toBe(0);
      expect(io.stdoutLines).toEqual([
        'base: 2 staged files, 1 excluded',
        '  - bin/hello',
        '  - etc/toolbox.conf',
        'overlay: 1 staged file, 0 excluded',
        '  - bin/hello (from hello-v2)',
      ]);
    });

    it('rejects unknown part names', async () => {
      const exitCode = await run('inspect', '--part', 'missing');

      expect(exitCode).toBe(1);
      expect(io.stderrBuffer).toBe(
        [
          'Inspect failed: ManifestError: Unknown part(s): missing.',
          '  - parts.missing: Part is not declared.',
          '',
        ].join('\n'),
      );
    });
  });
});
