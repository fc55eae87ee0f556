import { posix } from 'node:path';

/**
 * Normalises a bundle-relative path, returning `undefined` when it is absolute, empty, or climbs
 * out of the root.
 */
export function normaliseRelativePath(candidate: string): string | undefined {
  if (candidate.startsWith('/') || candidate.trim() === '') {
    return undefined;
  }
  const normalised = posix.normalize(candidate).replace(/\/+$/, '');
  if (normalised === '.' || normalised === '..' || normalised.startsWith('../')) {
    return undefined;
  }
  return normalised;
}

/** Directory paths above a normalised relative path, nearest to the root first. */
export function ancestorPaths(path: string): readonly string[] {
  const segments = path.split('/');
  return segments.slice(0, -1).map((_, index) => segments.slice(0, index + 1).join('/'));
}
