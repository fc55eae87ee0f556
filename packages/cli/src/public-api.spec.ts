import { describe, expect, it } from 'vitest';

import * as cli from './index.js';
import { createCliKernel } from './kernel/cli-kernel.js';
import { createProcessCliIo } from './io/process-cli-io.js';
import { assembleCommandModule } from './tools/assemble/assemble-command-module.js';
import { createAssembleCliKernel, runAssembleCli } from './tools/assemble/run-assemble-cli.js';
import { createMemoryCliIo } from './testing/memory-cli-io.js';

describe('CLI public API surface', () => {
  it('re-exports the primary CLI entry points', () => {
    expect(cli.createCliKernel).toBe(createCliKernel);
    expect(cli.createProcessCliIo).toBe(createProcessCliIo);
    expect(cli.assembleCommandModule).toBe(assembleCommandModule);
    expect(cli.createAssembleCliKernel).toBe(createAssembleCliKernel);
    expect(cli.runAssembleCli).toBe(runAssembleCli);
  });

  it('lists the manifest commands in the program help', async () => {
    const io = createMemoryCliIo();
    const kernel = createAssembleCliKernel({ programName: 'partkit', version: '0.0.0-test', io });

    const exitCode = await kernel.run(['node', 'partkit', '--help']);

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toContain('Assemble part outputs into a bundle.');
    expect(io.stdoutBuffer).toContain('Validate a manifest without part outputs.');
    expect(io.stdoutBuffer).toContain('Show the files each part stages.');
  });
});
