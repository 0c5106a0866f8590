import type {
  EngineConfig,
  FilePatch,
  FileReport,
  FileVerdict,
  HunkOutcome,
  PatchDiagnostic,
  PatchErrorKind,
} from '@hunkwise/shared';
import { displayPath } from '../parse/builder';
import type { FileStat, FileTree, TreeChange } from '../tree/types';
import { applyHunksToLines } from './hunks';
import { decodeLines, encodeLines } from './text';
import { candidatePaths, resolveCandidates } from './paths';

export interface FilePlanContext {
  config: EngineConfig;
  signal?: AbortSignal;
}

/**
 * The outcome of one entry and the changes that would carry it out.
 * `changes` is empty whenever the verdict is `WouldFail`.
 */
export interface FilePlan {
  report: FileReport;
  changes: TreeChange[];
}

/**
 * Evaluates one entry against `tree` without modifying it.
 */
export async function planFilePatch(
  file: FilePatch,
  tree: FileTree,
  context: FilePlanContext,
): Promise<FilePlan> {
  const { config, signal } = context;
  const skipped = (): HunkOutcome[] =>
    file.hunks.map((_, i): HunkOutcome => ({ status: 'skipped', index: i + 1 }));
  const fail = (
    path: string,
    kind: PatchErrorKind,
    message: string,
    extra: Pick<PatchDiagnostic, 'line' | 'suggestion'> = {},
    hunks: HunkOutcome[] = skipped(),
  ): FilePlan => {
    const reason: PatchDiagnostic = { kind, severity: 'error', message, file: path, ...extra };
    return {
      report: { path, verdict: { kind: 'WouldFail', reason }, hunks, diagnostics: [reason] },
      changes: [],
    };
  };

  const resolved = resolveCandidates(file, config.stripLevel);
  if (!resolved.ok) {
    return fail(displayPath(file), resolved.kind, resolved.message, { line: file.line });
  }
  const candidates = resolved.candidates;
  for (const candidate of candidatePaths(candidates)) {
    const reason = await tree.unsafeReason(candidate);
    if (reason) {
      return fail(candidate, 'UnsafePath', `${candidate}: ${reason}`, { line: file.line });
    }
  }

  const wanted =
    candidates.kind === 'create'
      ? []
      : candidates.kind === 'modify'
        ? candidates.sources
        : [candidates.source];
  let source: { path: string; stat: FileStat } | undefined;
  for (const candidate of wanted) {
    const stat = await tree.stat(candidate);
    if (stat) {
      source = { path: candidate, stat };
      break;
    }
  }

  const path =
    candidates.kind === 'create' || candidates.kind === 'rename' || candidates.kind === 'copy'
      ? candidates.target
      : (source?.path ?? wanted[0]);

  if (candidates.kind !== 'create' && !source) {
    return fail(wanted[0], 'PathNotFound', `${wanted[0]}: file not found`, {
      line: file.line,
      suggestion: `Check the path and the strip level (currently -p${config.stripLevel}).`,
    });
  }

  if (
    (candidates.kind === 'create' || candidates.kind === 'rename' || candidates.kind === 'copy') &&
    candidates.target !== source?.path &&
    !config.allowOverwrite &&
    (await tree.stat(candidates.target))
  ) {
    return fail(path, 'PathConflict', `${path}: target already exists`, {
      line: file.line,
      suggestion: 'Remove the existing file or allow overwriting.',
    });
  }

  if (file.isBinary && (config.binary === 'reject' || candidates.kind === 'create')) {
    return fail(
      path,
      'BinaryUnsupported',
      candidates.kind === 'create'
        ? `${path}: binary content cannot be created from a patch`
        : `${path}: binary patches are not supported`,
      {
        line: file.line,
        ...(config.binary === 'reject'
          ? {
              suggestion:
                'Use binary pass-through to apply renames, copies, modes and deletions only.',
            }
          : {}),
      },
    );
  }

  let content: Buffer = Buffer.alloc(0);
  if (source) {
    const bytes = await tree.read(source.path);
    if (!bytes) return fail(source.path, 'PathNotFound', `${source.path}: file not found`);
    content = bytes;
  }

  let hunks: HunkOutcome[] = [];
  let diagnostics: PatchDiagnostic[] = [];
  if (!file.isBinary && file.hunks.length > 0) {
    const applied = await applyHunksToLines(file, decodeLines(content), config.matching, signal);
    hunks = applied.hunks;
    diagnostics = applied.diagnostics.map((d) => ({ ...d, file: path }));
    if (!applied.ok) {
      const reason = diagnostics.find((d) => d.severity === 'error');
      if (reason) {
        return {
          report: { path, verdict: { kind: 'WouldFail', reason }, hunks, diagnostics },
          changes: [],
        };
      }
    }
    content = encodeLines(applied.lines);
  }

  if (candidates.kind === 'delete' && file.hunks.length > 0 && content.length > 0) {
    return fail(
      path,
      'HunkApplyFailed',
      `${path}: file is not empty after applying the deletion`,
      { line: file.line, suggestion: 'The file has content the patch does not remove.' },
      hunks,
    );
  }

  const changes: TreeChange[] = [];
  const mode = file.newMode ?? source?.stat.mode;
  switch (candidates.kind) {
    case 'create':
      changes.push(
        file.newMode === undefined
          ? { kind: 'write', path, content }
          : { kind: 'write', path, content, mode: file.newMode },
      );
      break;
    case 'delete':
      changes.push({ kind: 'remove', path });
      break;
    case 'modify':
      if (file.hunks.length > 0 && !file.isBinary) changes.push({ kind: 'write', path, content });
      if (file.newMode !== undefined) changes.push({ kind: 'chmod', path, mode: file.newMode });
      break;
    case 'rename':
    case 'copy':
      changes.push(
        mode === undefined
          ? { kind: 'write', path, content }
          : { kind: 'write', path, content, mode },
      );
      if (candidates.kind === 'rename' && candidates.source !== candidates.target) {
        changes.push({ kind: 'remove', path: candidates.source });
      }
      break;
  }

  return { report: { path, verdict: verdictOf(hunks), hunks, diagnostics }, changes };
}

function verdictOf(hunks: readonly HunkOutcome[]): FileVerdict {
  let offset = 0;
  let fuzz = 0;
  for (const hunk of hunks) {
    if (hunk.status !== 'applied') continue;
    if (Math.abs(hunk.offset) > Math.abs(offset)) offset = hunk.offset;
    fuzz = Math.max(fuzz, hunk.fuzz);
  }
  return offset !== 0 || fuzz > 0
    ? { kind: 'WouldApplyWithOffset', offset, fuzz }
    : { kind: 'WouldApplyCleanly' };
}
