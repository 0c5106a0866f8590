import path from 'path';
import { Command } from 'commander';
import { diagnoseApplies, diagnoseAppliesText } from '@hunkwise/core';
import { STDIN_MARKER, readPatchInput } from '../utils/input';
import { parseSeconds } from '../utils/options';
import { createRuntime, resolveTreeRoot, type CliState } from '../utils/runtime';

interface CheckAppliesOptions {
  timeout?: number;
}

export function registerCheckAppliesCommand(program: Command, state: CliState) {
  program
    .command('check-applies')
    .argument('<patch>', 'Patch file, or - for stdin')
    .argument('[root]', 'Directory the patch applies to (default: current directory)')
    .description('Dry-run a patch against a directory without modifying it')
    .option('--timeout <seconds>', 'Give up after this many seconds', parseSeconds)
    .action(
      async (
        patch: string,
        root: string | undefined,
        options: CheckAppliesOptions,
        command: Command,
      ) => {
        const { config, logger, renderer, runId } = createRuntime(command, state);
        const treeRoot = resolveTreeRoot(state, root);
        const runOptions = { config, logger, runId };

        const report =
          patch === STDIN_MARKER
            ? await diagnoseAppliesText(
                await readPatchInput(patch, state.cwd, state.stdin),
                treeRoot,
                options.timeout,
                runOptions,
              )
            : await diagnoseApplies(
                path.resolve(state.cwd, patch),
                treeRoot,
                options.timeout,
                runOptions,
              );

        renderer.renderCheck(report);
        if (!report.ok) state.exitCode = 1;
      },
    );
}
