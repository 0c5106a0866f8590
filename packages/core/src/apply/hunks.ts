import type {
  FilePatch,
  Hunk,
  HunkOutcome,
  MatchingConfig,
  PatchDiagnostic,
} from '@hunkwise/shared';
import { setImmediate as nextTick } from 'timers/promises';
import { findHunk } from './matcher';
import { dominantEol, joinLines, splitLines, type TextLine } from './text';

export interface ContentApplyResult {
  ok: boolean;
  /** Patched content; the original content when a hunk failed */
  content: string;
  hunks: HunkOutcome[];
  /** Failures and offset/fuzz notices; `file` is left for the caller to fill in */
  diagnostics: PatchDiagnostic[];
}

export interface LinesApplyResult extends Omit<ContentApplyResult, 'content'> {
  /** Patched lines; the original lines when a hunk failed */
  lines: TextLine[];
}

/**
 * {@link applyHunksToLines} over text content.
 */
export async function applyHunks(
  filePatch: Pick<FilePatch, 'hunks'>,
  content: string,
  matching: MatchingConfig,
  signal?: AbortSignal,
): Promise<ContentApplyResult> {
  const { lines, ...result } = await applyHunksToLines(
    filePatch,
    splitLines(content),
    matching,
    signal,
  );
  return { ...result, content: result.ok ? joinLines(lines) : content };
}

/**
 * Applies every hunk of `filePatch` to the `source` lines, in order.
 *
 * Positions refer to the original content. Each hunk is searched for starting at
 * its declared line shifted by the offset the previous hunk landed at, and never
 * before the end of the previous hunk. The first hunk that cannot be placed fails
 * the file and the remaining hunks are skipped.
 *
 * Yields to the event loop before each hunk so that a deadline can abort `signal`.
 */
export async function applyHunksToLines(
  filePatch: Pick<FilePatch, 'hunks'>,
  source: readonly TextLine[],
  matching: MatchingConfig,
  signal?: AbortSignal,
): Promise<LinesApplyResult> {
  const output: TextLine[] = [];
  const outcomes: HunkOutcome[] = [];
  const diagnostics: PatchDiagnostic[] = [];

  let consumed = 0;
  let drift = 0;

  for (let i = 0; i < filePatch.hunks.length; i++) {
    await nextTick();
    signal?.throwIfAborted();
    const hunk = filePatch.hunks[i];
    const index = i + 1;
    const declared = hunk.sourceCount === 0 ? hunk.sourceStart : hunk.sourceStart - 1;
    const match = findHunk(source, hunk, declared + drift, consumed, matching);

    if (!match) {
      diagnostics.push({
        kind: 'HunkApplyFailed',
        severity: 'error',
        hunk: index,
        line: hunk.line,
        message: `Hunk #${index} FAILED at ${describeRange(hunk)}`,
        suggestion:
          'The file content does not match the hunk context; regenerate the patch against the current file.',
      });
      outcomes.push({ status: 'failed', index });
      for (let rest = i + 1; rest < filePatch.hunks.length; rest++) {
        outcomes.push({ status: 'skipped', index: rest + 1 });
      }
      return { ok: false, lines: [...source], hunks: outcomes, diagnostics };
    }

    output.push(...source.slice(consumed, match.start));
    let cursor = match.start;
    for (const line of match.body) {
      if (line.role === 'removed') {
        cursor++;
      } else if (line.role === 'context') {
        const fileLine = source[cursor++];
        // The hunk says the target side continues past this line.
        const eol = fileLine.eol === '' && !line.noNewlineAtEnd ? line.eol : fileLine.eol;
        output.push({ ...fileLine, eol });
      } else {
        output.push({ text: line.text, eol: line.noNewlineAtEnd ? '' : line.eol });
      }
    }
    consumed = cursor;

    const offset = drift + match.offset;
    const appliedAt = Math.max(match.hunkStart, 0) + 1;
    outcomes.push({ status: 'applied', index, offset, fuzz: match.fuzz, appliedAt });
    if (offset !== 0 || match.fuzz > 0) {
      diagnostics.push({
        kind: match.fuzz > 0 ? 'FuzzApplied' : 'OffsetApplied',
        severity: 'info',
        hunk: index,
        line: hunk.line,
        message:
          `Hunk #${index} succeeded at ${appliedAt}` +
          (match.fuzz > 0 ? ` with fuzz ${match.fuzz}` : '') +
          (offset !== 0 ? ` (offset ${offset} ${Math.abs(offset) === 1 ? 'line' : 'lines'})` : '') +
          '.',
      });
    }
    drift = offset;
  }

  output.push(...source.slice(consumed));

  // Only the very last line may lack a terminator.
  const eol = dominantEol(source.length > 0 ? source : output);
  for (let i = 0; i < output.length - 1; i++) {
    if (output[i].eol === '') output[i] = { ...output[i], eol };
  }

  return { ok: true, lines: output, hunks: outcomes, diagnostics };
}

function describeRange(hunk: Hunk): string {
  if (hunk.sourceCount === 0) return `insertion after line ${hunk.sourceStart}`;
  const end = hunk.sourceStart + hunk.sourceCount - 1;
  return end === hunk.sourceStart ? `line ${hunk.sourceStart}` : `lines ${hunk.sourceStart}-${end}`;
}
