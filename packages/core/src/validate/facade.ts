import { promises as fs } from 'fs';
import { randomUUID } from 'crypto';
import {
  FileSystemError,
  MAX_TIMEOUT_MS,
  TimeoutError,
  UsageError,
  logger as defaultLogger,
  resolveEngineConfig,
  type FileReport,
  type Logger,
  type ParseResult,
  type PatchDiagnostic,
} from '@hunkwise/shared';
import { parsePatch } from '../parse/builder';
import { DryRunSimulator } from '../apply/simulator';
import type { EngineRunOptions } from '../apply/evaluate';
import { withDeadline } from './deadline';

export interface FormatReport {
  ok: boolean;
  fileCount: number;
  diagnostics: PatchDiagnostic[];
}

export interface ApplyCheckReport {
  ok: boolean;
  files: FileReport[];
  diagnostics: PatchDiagnostic[];
}

/**
 * True when `text` is a well-formed unified diff with at least one change.
 */
export function checkFormat(text: string): boolean {
  return parsePatch(text).ok;
}

export function diagnoseFormat(text: string): FormatReport {
  const result = parsePatch(text);
  return {
    ok: result.ok,
    fileCount: result.ok ? result.document.files.length : 0,
    diagnostics: result.diagnostics,
  };
}

/**
 * True when the patch file parses and every entry would apply to `treeRoot`
 * within the timeout. Never modifies the tree.
 */
export async function checkApplies(
  patchFile: string,
  treeRoot: string,
  timeoutSeconds?: number,
  options: EngineRunOptions = {},
): Promise<boolean> {
  const report = await diagnoseApplies(patchFile, treeRoot, timeoutSeconds, options);
  return report.ok;
}

/**
 * Like {@link checkApplies}, but explains every failure.
 * A missing patch file is reported, not thrown.
 */
export async function diagnoseApplies(
  patchFile: string,
  treeRoot: string,
  timeoutSeconds?: number,
  options: EngineRunOptions = {},
): Promise<ApplyCheckReport> {
  let text: string;
  try {
    text = await fs.readFile(patchFile, 'utf8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {
        ok: false,
        files: [],
        diagnostics: [
          {
            kind: 'PathNotFound',
            severity: 'error',
            file: patchFile,
            message: `${patchFile}: patch file not found`,
          },
        ],
      };
    }
    throw new FileSystemError(patchFile, 'could not read patch file', { cause: error });
  }
  return diagnoseAppliesText(text, treeRoot, timeoutSeconds, options);
}

/**
 * Checks patch text that is already in memory, such as a patch read from stdin.
 */
export async function diagnoseAppliesText(
  text: string,
  treeRoot: string,
  timeoutSeconds?: number,
  options: EngineRunOptions = {},
): Promise<ApplyCheckReport> {
  const config = resolveEngineConfig(options.config);
  if (timeoutSeconds !== undefined && !(timeoutSeconds > 0 && Number.isFinite(timeoutSeconds))) {
    throw new UsageError(`Timeout must be a positive number of seconds, got ${timeoutSeconds}`);
  }
  if (timeoutSeconds !== undefined && timeoutSeconds * 1000 > MAX_TIMEOUT_MS) {
    throw new UsageError(
      `Timeout must be at most ${Math.floor(MAX_TIMEOUT_MS / 1000)} seconds, got ${timeoutSeconds}`,
    );
  }
  const timeoutMs = timeoutSeconds !== undefined ? timeoutSeconds * 1000 : config.timeoutMs;
  const logger = options.logger ?? defaultLogger;
  const runId = options.runId ?? randomUUID();

  const parsed = parsePatch(text);
  await logParsed(logger, runId, parsed);
  if (!parsed.ok) {
    return { ok: false, files: [], diagnostics: parsed.diagnostics };
  }

  const simulator = new DryRunSimulator();
  try {
    const report = await withDeadline(
      timeoutMs,
      (signal) => simulator.simulate(parsed.document, treeRoot, { ...options, runId, signal }),
      { signal: options.signal, logger, runId, operation: 'check-applies' },
    );
    return { ok: report.ok, files: report.files, diagnostics: report.diagnostics };
  } catch (error: unknown) {
    if (error instanceof TimeoutError) {
      return {
        ok: false,
        files: [],
        diagnostics: [
          {
            kind: 'Timeout',
            severity: 'error',
            message: `Dry run did not finish within ${timeoutMs}ms`,
            suggestion: 'Raise the timeout or split the patch.',
          },
        ],
      };
    }
    throw error;
  }
}

/**
 * Emits the PatchParsed event for a parse result.
 */
export async function logParsed(logger: Logger, runId: string, parsed: ParseResult): Promise<void> {
  const files = parsed.ok ? parsed.document.files : [];
  await logger.log({
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId,
    type: 'PatchParsed',
    payload: {
      ok: parsed.ok,
      fileCount: files.length,
      hunkCount: files.reduce((sum, file) => sum + file.hunks.length, 0),
      errorCount: parsed.diagnostics.filter((d) => d.severity === 'error').length,
    },
  });
}
