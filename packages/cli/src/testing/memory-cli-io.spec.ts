import { describe, expect, it } from 'vitest';

import { isInteractiveStream } from '../utils/streams.js';
import { createMemoryCliIo } from './memory-cli-io.js';

describe('createMemoryCliIo', () => {
  it('captures output buffers and recorded exit codes', () => {
    const io = createMemoryCliIo();

    io.writeOut('first\n\nsecond\n');
    io.writeErr('error');

    expect(io.stdoutBuffer).toBe('first\n\nsecond\n');
    expect(io.stdoutLines).toEqual(['first', 'second']);
    expect(io.stderrBuffer).toBe('error');
    expect(io.exitCodes).toEqual([]);

    expect(() => io.exit(2)).toThrow(/process exit called with code 2/);
    expect(io.exitCodes).toEqual([2]);
  });

  it('reports the configured working directory', () => {
    expect(createMemoryCliIo({ cwd: '/srv/bundle' }).cwd()).toBe('/srv/bundle');
  });

  it('marks stderr as interactive on request', () => {
    expect(isInteractiveStream(createMemoryCliIo().stderr)).toBe(false);
    expect(isInteractiveStream(createMemoryCliIo({ interactive: true }).stderr)).toBe(true);
  });
});
