import { Command } from 'commander';
import { formatPatch, invertPatch, parsePatchOrThrow } from '@hunkwise/core';
import { readPatchInput } from '../utils/input';
import { createRuntime, type CliState } from '../utils/runtime';

export function registerReverseCommand(program: Command, state: CliState) {
  program
    .command('reverse')
    .argument('<patch>', 'Patch file, or - for stdin')
    .description('Print the inverse of a patch')
    .action(async (patch: string, _options: unknown, command: Command) => {
      const { renderer } = createRuntime(command, state);
      const text = await readPatchInput(patch, state.cwd, state.stdin);
      renderer.renderPatch(formatPatch(invertPatch(parsePatchOrThrow(text))));
    });
}
