#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { assembleCommandModule, createCliKernel, createProcessCliIo } from './index.js';

interface PackageManifest {
  readonly name?: string;
  readonly version?: string;
  readonly description?: string;
}

const readManifestField = (record: object, key: keyof PackageManifest): string | undefined => {
  const value: unknown = Reflect.get(record, key);
  return typeof value === 'string' ? value : undefined;
};

const readPackageManifest = (manifestPath: string): PackageManifest | undefined => {
  try {
    const parsed: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
    if (!parsed || typeof parsed !== 'object') {
      return undefined;
    }
    const name = readManifestField(parsed, 'name');
    const version = readManifestField(parsed, 'version');
    const description = readManifestField(parsed, 'description');
    return {
      ...(name === undefined ? {} : { name }),
      ...(version === undefined ? {} : { version }),
      ...(description === undefined ? {} : { description }),
    };
  } catch {
    return undefined;
  }
};

const loadPackageManifest = (): PackageManifest => {
  const manifestName = '@partkit/cli';
  let directory = path.dirname(fileURLToPath(import.meta.url));

  while (true) {
    const manifest = readPackageManifest(path.join(directory, 'package.json'));
    if (manifest?.name === manifestName) {
      return manifest;
    }

    const parentDirectory = path.dirname(directory);
    if (parentDirectory === directory) {
      return {};
    }

    directory = parentDirectory;
  }
};

const packageManifest = loadPackageManifest();

const io = createProcessCliIo({ process });

const kernel = createCliKernel({
  programName: 'partkit',
  version: packageManifest.version ?? '0.0.0',
  description: packageManifest.description ?? '',
  io,
});

kernel.register(assembleCommandModule);

const exitCode = await kernel.run();

if (process.argv.length <= 2) {
  io.writeOut(
    'partkit assembles part outputs into a bundle. ' +
      'Explore `partkit assemble --help`, `partkit validate --help`, or ' +
      '`partkit inspect --help` to get started.\n',
  );
}

io.exit(exitCode);
