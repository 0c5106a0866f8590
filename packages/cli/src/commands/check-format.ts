import { Command } from 'commander';
import { logParsed, parsePatch } from '@hunkwise/core';
import { readPatchInput } from '../utils/input';
import { createRuntime, type CliState } from '../utils/runtime';

export function registerCheckFormatCommand(program: Command, state: CliState) {
  program
    .command('check-format')
    .argument('<patch>', 'Patch file, or - for stdin')
    .description('Check that a patch is a well-formed unified diff')
    .action(async (patch: string, _options: unknown, command: Command) => {
      const { logger, renderer, runId } = createRuntime(command, state);
      const text = await readPatchInput(patch, state.cwd, state.stdin);

      const parsed = parsePatch(text);
      await logParsed(logger, runId, parsed);
      renderer.renderFormat({
        ok: parsed.ok,
        fileCount: parsed.ok ? parsed.document.files.length : 0,
        diagnostics: parsed.diagnostics,
      });
      if (!parsed.ok) state.exitCode = 1;
    });
}
