import { Command, CommanderError } from 'commander';
import { AppError, ConfigError, UsageError } from '@hunkwise/shared';
import { version } from '../package.json';
import { registerApplyCommand } from './commands/apply';
import { registerCheckAppliesCommand } from './commands/check-applies';
import { registerCheckFormatCommand } from './commands/check-format';
import { registerReverseCommand } from './commands/reverse';
import { createCliState, type CliState, type GlobalOptions } from './utils/runtime';

export const name = '@hunkwise/cli';

export function createProgram(state: CliState): Command {
  const program = new Command();

  program
    .name('hunkwise')
    .description('Check and apply unified diffs')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-file <path>', 'Append structured events to a JSONL file')
    // Commander errors are thrown so that run() decides the exit code
    .exitOverride();

  registerCheckFormatCommand(program, state);
  registerCheckAppliesCommand(program, state);
  registerApplyCommand(program, state);
  registerReverseCommand(program, state);

  return program;
}

/**
 * Runs the CLI and resolves to the process exit code: 0 on success, 1 when a
 * check or application fails, 2 for usage and configuration errors.
 */
export async function run(argv: readonly string[], state: CliState = createCliState()): Promise<number> {
  const program = createProgram(state);
  try {
    await program.parseAsync([...argv]);
    return state.exitCode;
  } catch (e) {
    if (e instanceof CommanderError) {
      // Help and version exit with 0; commander has already printed the message
      return e.exitCode === 0 ? 0 : 2;
    }

    const opts = program.opts<GlobalOptions>();

    if (opts.json) {
      if (e instanceof AppError) {
        console.log(
          JSON.stringify({
            error: {
              code: e.code,
              message: e.message,
              details: e.details,
            },
          }),
        );
      } else {
        console.log(
          JSON.stringify({
            error: {
              code: 'UnknownError',
              message: e instanceof Error ? e.message : String(e),
            },
          }),
        );
      }
    } else {
      // Human-readable output
      console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
      if (e instanceof AppError && e.details) {
        console.error(
          `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
        );
      }
      if (opts.verbose && e instanceof Error && e.stack) {
        console.error(`\nStack Trace:\n${e.stack}`);
      } else {
        console.error(`\nFor more details, run with the --verbose flag.`);
      }
    }

    if (e instanceof ConfigError || e instanceof UsageError) {
      return 2;
    }
    return 1;
  }
}
