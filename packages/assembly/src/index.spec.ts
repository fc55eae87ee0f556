import { describe, expect, it } from 'vitest';

import { loadPackageMetadata } from '@partkit/core/testing';

import { describe as describeManifest, manifest } from './index.js';

const packageJsonUrl = new URL('../package.json', import.meta.url);

describe('assembly manifest placeholder', () => {
  it('exposes a frozen manifest matching package.json', async () => {
    const metadata = await loadPackageMetadata(packageJsonUrl);

    expect(Object.isFrozen(manifest)).toBe(true);
    expect(metadata.name).toBe(manifest.name);
    expect(metadata.description).toBe(manifest.summary);
  });

  it('returns a shallow copy from describe()', () => {
    expect(describeManifest()).toEqual(manifest);
    expect(describeManifest()).not.toBe(manifest);
  });
});
