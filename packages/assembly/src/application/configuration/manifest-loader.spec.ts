import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { defineManifest } from '../../config/index.js';
import { ManifestError } from '../../domain/errors.js';
import { loadManifest, parseManifest, resolveManifestPath } from './manifest-loader.js';

const INSTALLER_YAML = `name: installer
version: 22.04
summary: Example installer bundle
apps:
  subiquity-server:
    command: usr/bin/subiquity-server --dry-run
    daemon: simple
    restart-condition: always
    environment:
      PYTHONPATH_ORIG: $PYTHONPATH
      PYTHONPATH: $SNAP/lib/python3
      DEBUG: 1
parts:
  curtin:
    plugin: nil
    stage: [usr/lib/curtin]
  subiquity:
    plugin: python
    source: .
    stage: ['*', '-bin/python3']
    stage-default: include
    organize:
      bin/subiquity-tui: usr/bin/subiquity
`;

describe('manifest-loader', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), 'partkit-manifest-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('loads and normalises a YAML manifest', async () => {
    const manifestPath = path.join(workspace, 'partkit.yaml');
    await writeFile(manifestPath, INSTALLER_YAML, 'utf8');

    const loaded = await loadManifest(manifestPath);

    expect(loaded.path).toBe(manifestPath);
    expect(loaded.directory).toBe(workspace);
    expect(loaded.manifest.name).toBe('installer');
    expect(loaded.manifest.version).toBe('22.04');
    expect(loaded.manifest.parts.map((part) => part.name)).toEqual(['curtin', 'subiquity']);
    expect(loaded.manifest.parts[1]).toEqual({
      name: 'subiquity',
      stage: [
        { kind: 'include', pattern: '*' },
        { kind: 'exclude', pattern: 'bin/python3' },
      ],
      organize: [{ source: 'bin/subiquity-tui', destination: 'usr/bin/subiquity' }],
      stageDefault: 'include',
      metadata: { plugin: 'python', source: '.' },
    });
    expect(loaded.manifest.apps).toEqual([
      {
        name: 'subiquity-server',
        command: 'usr/bin/subiquity-server',
        args: ['--dry-run'],
        daemon: 'simple',
        restartPolicy: 'always',
        environment: [
          { name: 'PYTHONPATH_ORIG', value: '$PYTHONPATH' },
          { name: 'PYTHONPATH', value: '$SNAP/lib/python3' },
          { name: 'DEBUG', value: '1' },
        ],
        metadata: {},
      },
    ]);
  });

  it('discovers config/partkit.yaml when no top-level manifest exists', async () => {
    const manifestPath = path.join(workspace, 'config', 'partkit.yaml');
    await mkdir(path.dirname(manifestPath), { recursive: true });
    await writeFile(manifestPath, INSTALLER_YAML, 'utf8');

    await expect(resolveManifestPath({ cwd: workspace })).resolves.toBe(manifestPath);
  });

  it('keeps declared order for integer-like names', async () => {
    const manifestPath = path.join(workspace, 'partkit.yaml');
    await writeFile(
      manifestPath,
      [
        'name: ordered',
        'apps:',
        '  tool:',
        '    command: bin/tool',
        '    environment:',
        '      PATH: $PATH:$SNAP/bin',
        '      2: two',
        '  1999:',
        '    command: bin/legacy',
        'parts:',
        '  runtime: {}',
        '  app:',
        '    organize:',
        '      bin/a: bin/tool',
        '      10: bin/ten',
        '  2024: {}',
        '',
      ].join('\n'),
      'utf8',
    );

    const { manifest } = await loadManifest(manifestPath);

    expect(manifest.parts.map((part) => part.name)).toEqual(['runtime', 'app', '2024']);
    expect(manifest.parts[1]?.organize).toEqual([
      { source: 'bin/a', destination: 'bin/tool' },
      { source: '10', destination: 'bin/ten' },
    ]);
    expect(manifest.apps.map((app) => app.name)).toEqual(['tool', '1999']);
    expect(manifest.apps[0]?.environment).toEqual([
      { name: 'PATH', value: '$PATH:$SNAP/bin' },
      { name: '2', value: 'two' },
    ]);
  });

  it('keeps nested part metadata as plain objects', async () => {
    const manifestPath = path.join(workspace, 'partkit.yaml');
    await writeFile(
      manifestPath,
      'name: nested\nparts:\n  tools:\n    build-environment:\n      - CFLAGS: -O2\n',
      'utf8',
    );

    const { manifest } = await loadManifest(manifestPath);

    expect(manifest.parts[0]?.metadata).toEqual({ 'build-environment': [{ CFLAGS: '-O2' }] });
  });

  it('loads manifests exported from JavaScript modules', async () => {
    const manifestPath = path.join(workspace, 'partkit.config.mjs');
    await writeFile(
      manifestPath,
      `export default async () => ({ name: 'scripted', parts: { tools: { stage: ['bin/*'] } } });\n`,
      'utf8',
    );

    const loaded = await loadManifest(manifestPath);

    expect(loaded.manifest).toEqual({
      name: 'scripted',
      parts: [
        {
          name: 'tools',
          stage: [{ kind: 'include', pattern: 'bin/*' }],
          organize: [],
          metadata: {},
        },
      ],
      apps: [],
    });
  });
});

describe('parseManifest', () => {
  it('normalises manifests authored with defineManifest', () => {
    const document = defineManifest({
      name: 'scripted',
      parts: new Map([
        ['runtime', { stage: ['usr/lib/*', '-usr/lib/debug'] }],
        ['2024', null],
      ]),
      apps: {
        tool: {
          command: 'usr/lib/tool --serve',
          daemon: 'simple',
          'restart-condition': 'on-failure',
          environment: { LANG: 'C.UTF-8', WORKERS: 4 },
        },
      },
    });

    expect(parseManifest(document)).toEqual({
      name: 'scripted',
      parts: [
        {
          name: 'runtime',
          stage: [
            { kind: 'include', pattern: 'usr/lib/*' },
            { kind: 'exclude', pattern: 'usr/lib/debug' },
          ],
          organize: [],
          metadata: {},
        },
        { name: '2024', stage: [], organize: [], metadata: {} },
      ],
      apps: [
        {
          name: 'tool',
          command: 'usr/lib/tool',
          args: ['--serve'],
          daemon: 'simple',
          restartPolicy: 'on-failure',
          environment: [
            { name: 'LANG', value: 'C.UTF-8' },
            { name: 'WORKERS', value: '4' },
          ],
          metadata: {},
        },
      ],
    });
  });

  it('accepts parts declared without any keys', () => {
    const manifest = parseManifest({ name: 'bare', parts: { empty: null } });

    expect(manifest.parts).toEqual([{ name: 'empty', stage: [], organize: [], metadata: {} }]);
  });

  it('lists structural issues with their key paths', () => {
    const act = () =>
      parseManifest({
        name: '',
        parts: { tools: { stage: 'bin/*' } },
        apps: { broken: { daemon: 'simple' } },
      });

    expect(act).toThrow(ManifestError);
    try {
      act();
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestError);
      if (error instanceof ManifestError) {
        expect(error.issues.map((issue) => issue.path)).toEqual([
          'name',
          'parts.tools.stage',
          'apps.broken.command',
        ]);
      }
    }
  });

  it('rejects documents that are not objects', () => {
    expect(() => parseManifest('name: x')).toThrow(/^Invalid manifest: \(root\): /);
  });
});
