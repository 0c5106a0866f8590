import path from 'path';
import { randomUUID } from 'crypto';
import type { Command } from 'commander';
import { ConfigLoader } from '@hunkwise/core';
import {
  ConsoleLogger,
  JsonlLogger,
  type EngineConfig,
  type EngineConfigInput,
  type Logger,
} from '@hunkwise/shared';
import { OutputRenderer } from '../output/renderer';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  logFile?: string;
}

/**
 * Process-level inputs of one CLI invocation, and the exit code commands report.
 */
export interface CliState {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdin: NodeJS.ReadableStream;
  exitCode: number;
}

export function createCliState(overrides: Partial<CliState> = {}): CliState {
  return {
    cwd: process.cwd(),
    env: process.env,
    stdin: process.stdin,
    exitCode: 0,
    ...overrides,
  };
}

export interface CommandRuntime {
  config: EngineConfig;
  logger: Logger;
  renderer: OutputRenderer;
  runId: string;
}

/**
 * Resolves configuration, logger and renderer for a command from its flags
 * and the global options.
 */
export function createRuntime(
  command: Command,
  state: CliState,
  flags: EngineConfigInput = {},
): CommandRuntime {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const config = ConfigLoader.load({
    configPath: globals.config ? path.resolve(state.cwd, globals.config) : undefined,
    cwd: state.cwd,
    env: state.env,
    flags: {
      ...flags,
      logging: { verbose: globals.verbose, jsonlPath: globals.logFile },
    },
  });

  const { jsonlPath, verbose } = config.logging;
  const logger: Logger = jsonlPath
    ? new JsonlLogger(path.resolve(state.cwd, jsonlPath), { verbose })
    : new ConsoleLogger({ verbose });

  return {
    config,
    logger,
    renderer: new OutputRenderer(globals.json ?? false),
    runId: randomUUID(),
  };
}

/** Resolves the optional tree argument against the working directory */
export function resolveTreeRoot(state: CliState, root: string | undefined): string {
  return path.resolve(state.cwd, root ?? '.');
}
