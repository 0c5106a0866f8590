import { randomUUID } from 'crypto';
import {
  logger as defaultLogger,
  type DryRunReport,
  type EngineConfig,
  type EngineConfigInput,
  type FileReport,
  type Logger,
  type PatchDocument,
} from '@hunkwise/shared';
import type { FileTree, TreeChange } from '../tree/types';
import { applyChanges } from '../tree/types';
import { planFilePatch } from './file';

/**
 * Per-call options shared by the simulator and the applier.
 */
export interface EngineRunOptions {
  /** Partial configuration; missing values take their defaults */
  config?: EngineConfigInput;
  logger?: Logger;
  /** Checked between files and hunks and passed to file reads */
  signal?: AbortSignal;
  /** Correlates the events of one run; generated when omitted */
  runId?: string;
}

export interface EvaluationContext {
  config: EngineConfig;
  logger: Logger;
  runId: string;
  signal?: AbortSignal;
}

export function createContext(options: EngineRunOptions, config: EngineConfig): EvaluationContext {
  return {
    config,
    logger: options.logger ?? defaultLogger,
    runId: options.runId ?? randomUUID(),
    signal: options.signal,
  };
}

/**
 * Called after a file's changes were applied to the working tree.
 */
export type FileAppliedHook = (report: FileReport, changes: readonly TreeChange[]) => Promise<void>;

/**
 * Plans every entry in order against `tree`, applying each successful entry to
 * it so that later entries see earlier results. Failed entries leave `tree`
 * unchanged and evaluation goes on with the next one.
 */
export async function evaluateDocument(
  document: PatchDocument,
  tree: FileTree,
  context: EvaluationContext,
  onFileApplied?: FileAppliedHook,
): Promise<DryRunReport> {
  const { config, logger, runId, signal } = context;
  const files: FileReport[] = [];

  for (const file of document.files) {
    signal?.throwIfAborted();
    const { report, changes } = await planFilePatch(file, tree, { config, signal });
    files.push(report);

    if (report.verdict.kind !== 'WouldFail') {
      await applyChanges(tree, changes);
      if (onFileApplied) await onFileApplied(report, changes);
    }

    const timestamp = new Date().toISOString();
    await logger.child({ file: report.path }).trace(
      {
        schemaVersion: 1,
        timestamp,
        runId,
        type: 'FileEvaluated',
        payload: {
          path: report.path,
          verdict: report.verdict.kind,
          hunks: report.hunks.length,
          ...(report.verdict.kind === 'WouldFail' ? { reason: report.verdict.reason.message } : {}),
        },
      },
      report.verdict.kind,
    );
    for (const hunk of report.hunks) {
      if (hunk.status !== 'applied' || (hunk.offset === 0 && hunk.fuzz === 0)) continue;
      await logger.log({
        schemaVersion: 1,
        timestamp,
        runId,
        type: 'HunkOffsetApplied',
        payload: { path: report.path, hunk: hunk.index, offset: hunk.offset, fuzz: hunk.fuzz },
      });
    }
  }

  return {
    ok: files.every((f) => f.verdict.kind !== 'WouldFail'),
    files,
    diagnostics: files.flatMap((f) => f.diagnostics),
  };
}
