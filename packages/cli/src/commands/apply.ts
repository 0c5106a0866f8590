import { Command } from 'commander';
import { PatchApplier, logParsed, parsePatch, withDeadline } from '@hunkwise/core';
import type { EngineConfigInput } from '@hunkwise/shared';
import { readPatchInput } from '../utils/input';
import { parseCount } from '../utils/options';
import { createRuntime, resolveTreeRoot, type CliState } from '../utils/runtime';

interface ApplyOptions {
  dryRun?: boolean;
  atomic?: boolean;
  reverse?: boolean;
  strip?: number;
  fuzz?: number;
  searchRadius?: number;
  ignoreWhitespace?: boolean;
  allowBinary?: boolean;
  force?: boolean;
}

export function registerApplyCommand(program: Command, state: CliState) {
  program
    .command('apply')
    .argument('<patch>', 'Patch file, or - for stdin')
    .argument('[root]', 'Directory the patch applies to (default: current directory)')
    .description('Apply a patch to a directory')
    .option('--dry-run', 'Report what would happen without writing anything')
    .option('--atomic', 'Write nothing unless every file applies')
    .option('-R, --reverse', 'Apply the patch in reverse')
    .option('-p, --strip <n>', 'Strip n leading path components (default: 1)', parseCount)
    .option('--fuzz <n>', 'Context lines that may be ignored at each hunk edge', parseCount)
    .option('--search-radius <n>', 'Lines to search around the declared position', parseCount)
    .option('--ignore-whitespace', 'Ignore whitespace differences when matching')
    .option('--allow-binary', 'Apply metadata of binary entries instead of rejecting them')
    .option('-f, --force', 'Let new files, renames and copies replace existing files')
    .action(
      async (patch: string, root: string | undefined, options: ApplyOptions, command: Command) => {
        const { config, logger, renderer, runId } = createRuntime(command, state, toFlags(options));
        const text = await readPatchInput(patch, state.cwd, state.stdin);

        const parsed = parsePatch(text);
        await logParsed(logger, runId, parsed);
        if (!parsed.ok) {
          renderer.renderFormat({ ok: false, fileCount: 0, diagnostics: parsed.diagnostics });
          state.exitCode = 1;
          return;
        }

        const applier = new PatchApplier();
        const report = await withDeadline(
          config.timeoutMs,
          (signal) =>
            applier.apply(parsed.document, resolveTreeRoot(state, root), {
              config,
              logger,
              runId,
              signal,
              dryRun: options.dryRun,
            }),
          { logger, runId, operation: 'apply' },
        );

        renderer.renderApply(report, options.dryRun ?? false);
        if (!report.ok) state.exitCode = 1;
      },
    );
}

function toFlags(options: ApplyOptions): EngineConfigInput {
  return {
    atomic: options.atomic,
    reverse: options.reverse,
    stripLevel: options.strip,
    allowOverwrite: options.force,
    binary: options.allowBinary ? 'pass-through' : undefined,
    matching: {
      fuzz: options.fuzz,
      searchRadius: options.searchRadius,
      ignoreWhitespace: options.ignoreWhitespace,
    },
  };
}
