type SegmentMatcher =
  | { readonly kind: 'globstar' }
  | { readonly kind: 'literal'; readonly value: string }
  | { readonly kind: 'glob'; readonly expression: RegExp };

/**
 * A compiled path pattern. Patterns are relative to the part root and match a path when they
 * match the path itself or one of its ancestor directories.
 */
export interface PathPattern {
  readonly source: string;
  /** Set by a trailing `/`: the pattern only matches directories. */
  readonly directoryOnly: boolean;
  readonly segments: readonly SegmentMatcher[];
}

export class InvalidPatternError extends Error {
  constructor(
    readonly pattern: string,
    readonly reason: string,
  ) {
    super(`Invalid pattern "${pattern}": ${reason}.`);
    this.name = 'InvalidPatternError';
  }
}

const REGEX_SPECIALS = /[$()*+.?[\\\]^{|}]/;

/**
 * Compiles a glob pattern made of `/`-separated segments. `*` and `?` match within a segment,
 * `[...]` is a character class (negated with `!` or `^`), `**` matches any number of segments
 * and `\` escapes the next character.
 *
 * @throws {InvalidPatternError} When the pattern is empty, leaves the root, or is malformed.
 */
export function compilePathPattern(pattern: string): PathPattern {
  const trimmed = pattern.trim();
  const directoryOnly = trimmed.endsWith('/') && trimmed.replaceAll('/', '').length > 0;
  const rawSegments = trimmed.split('/').filter((segment) => segment !== '' && segment !== '.');

  if (rawSegments.length === 0) {
    throw new InvalidPatternError(pattern, 'pattern is empty');
  }

  const segments = rawSegments.map((segment) => {
    if (segment === '..') {
      throw new InvalidPatternError(pattern, 'pattern escapes the part root');
    }
    return compileSegment(pattern, segment);
  });

  return Object.freeze({ source: pattern, directoryOnly, segments: Object.freeze(segments) });
}

/**
 * Matches a compiled pattern against a path split into segments.
 *
 * @returns The number of leading segments the pattern matched (the whole path for a file match,
 *   fewer for an ancestor directory), or `undefined` when nothing matched.
 */
export function matchPathPattern(
  pattern: PathPattern,
  pathSegments: readonly string[],
): number | undefined {
  const limit = pattern.directoryOnly ? pathSegments.length - 1 : pathSegments.length;
  for (let length = 1; length <= limit; length += 1) {
    if (matchesExactly(pattern.segments, 0, pathSegments, 0, length)) {
      return length;
    }
  }
  return undefined;
}

export function splitPath(path: string): readonly string[] {
  return path.split('/').filter((segment) => segment !== '');
}

function matchesExactly(
  matchers: readonly SegmentMatcher[],
  matcherIndex: number,
  segments: readonly string[],
  segmentIndex: number,
  end: number,
): boolean {
  const matcher = matchers[matcherIndex];
  if (matcher === undefined) {
    return segmentIndex === end;
  }

  if (matcher.kind === 'globstar') {
    for (let next = segmentIndex; next <= end; next += 1) {
      if (matchesExactly(matchers, matcherIndex + 1, segments, next, end)) {
        return true;
      }
    }
    return false;
  }

  const segment = segments[segmentIndex];
  if (segmentIndex >= end || segment === undefined) {
    return false;
  }

  const matched =
    matcher.kind === 'literal' ? matcher.value === segment : matcher.expression.test(segment);
  return matched && matchesExactly(matchers, matcherIndex + 1, segments, segmentIndex + 1, end);
}

function compileSegment(pattern: string, segment: string): SegmentMatcher {
  if (segment === '**') {
    return { kind: 'globstar' };
  }

  let source = '';
  let literal = '';
  let isLiteral = true;

  for (let index = 0; index < segment.length; index += 1) {
    const character = segment.charAt(index);

    if (character === '\\') {
      const escaped = segment.charAt(index + 1);
      if (escaped === '') {
        throw new InvalidPatternError(pattern, 'dangling escape character');
      }
      source += escapeRegex(escaped);
      literal += escaped;
      index += 1;
      continue;
    }

    if (character === '*') {
      source += '.*';
      isLiteral = false;
      continue;
    }

    if (character === '?') {
      source += '.';
      isLiteral = false;
      continue;
    }

    if (character === '[') {
      const close = findClassEnd(segment, index);
      if (close === -1) {
        throw new InvalidPatternError(pattern, 'unterminated character class');
      }
      source += compileClass(segment.slice(index + 1, close));
      isLiteral = false;
      index = close;
      continue;
    }

    source += escapeRegex(character);
    literal += character;
  }

  if (isLiteral) {
    return { kind: 'literal', value: literal };
  }
  return { kind: 'glob', expression: new RegExp(`^${source}$`, 's') };
}

function findClassEnd(segment: string, open: number): number {
  let index = open + 1;
  if (segment.charAt(index) === '!' || segment.charAt(index) === '^') {
    index += 1;
  }
  // A leading `]` is part of the class.
  if (segment.charAt(index) === ']') {
    index += 1;
  }
  for (; index < segment.length; index += 1) {
    if (segment.charAt(index) === ']') {
      return index;
    }
  }
  return -1;
}

function compileClass(body: string): string {
  const negated = body.startsWith('!') || body.startsWith('^');
  const members = negated ? body.slice(1) : body;
  const escaped = members.replaceAll('\\', '\\\\').replaceAll(']', '\\]').replaceAll('[', '\\[');
  return `[${negated ? '^' : ''}${escaped}]`;
}

function escapeRegex(character: string): string {
  return REGEX_SPECIALS.test(character) ? `\\${character}` : character;
}
