import {
  PatchFormatError,
  type FilePatch,
  type Hunk,
  type HunkLine,
  type ParseResult,
  type PatchDiagnostic,
  type PatchDocument,
} from '@hunkwise/shared';
import type { HunkHeaderToken, Token } from './tokens';
import { tokenize } from './tokenizer';

export const DEV_NULL = '/dev/null';

interface HunkDraft {
  header: HunkHeaderToken;
  lines: HunkLine[];
}

interface EntryDraft {
  oldPath?: string;
  newPath?: string;
  renameFrom?: string;
  renameTo?: string;
  copyFrom?: string;
  copyTo?: string;
  oldMode?: number;
  newMode?: number;
  isNew: boolean;
  isDeleted: boolean;
  isBinary: boolean;
  hunks: Hunk[];
  line: number;
  fromDiffGit: boolean;
  sawOldHeader: boolean;
  sawNewHeader: boolean;
}

/**
 * Parses unified-diff text into a document.
 * Format problems are returned as diagnostics, never thrown.
 */
export function parsePatch(text: string): ParseResult {
  const { tokens, diagnostics } = tokenize(text);
  return buildDocument(tokens, diagnostics);
}

/**
 * Like {@link parsePatch}, but throws a PatchFormatError carrying every diagnostic.
 */
export function parsePatchOrThrow(text: string): PatchDocument {
  const result = parsePatch(text);
  if (!result.ok) {
    throw new PatchFormatError(result.diagnostics.filter((d) => d.severity === 'error'));
  }
  return result.document;
}

/**
 * Groups tokens into file entries and hunks, checking each hunk's declared counts.
 * Keeps going after the first problem so that all of them are reported together.
 */
export function buildDocument(
  tokens: readonly Token[],
  initial: readonly PatchDiagnostic[] = [],
): ParseResult {
  const diagnostics: PatchDiagnostic[] = [...initial];
  const entries: EntryDraft[] = [];
  let entry: EntryDraft | undefined;
  let hunk: HunkDraft | undefined;

  const open = (line: number): EntryDraft => {
    closeHunk();
    const next: EntryDraft = {
      isNew: false,
      isDeleted: false,
      isBinary: false,
      hunks: [],
      line,
      fromDiffGit: false,
      sawOldHeader: false,
      sawNewHeader: false,
    };
    entries.push(next);
    entry = next;
    return next;
  };

  const current = (line: number): EntryDraft => entry ?? open(line);

  const closeHunk = () => {
    if (!hunk || !entry) return;
    const { header, lines } = hunk;
    const source = lines.filter((l) => l.role !== 'added').length;
    const target = lines.filter((l) => l.role !== 'removed').length;
    const index = entry.hunks.length + 1;
    if (source !== header.sourceCount || target !== header.targetCount) {
      diagnostics.push({
        kind: 'HunkCountMismatch',
        severity: 'error',
        file: displayPath(entry),
        hunk: index,
        line: header.line,
        message:
          `Hunk #${index} of ${displayPath(entry)} declares -${header.sourceCount} +${header.targetCount} ` +
          `but has -${source} +${target} lines`,
        suggestion: 'Fix the counts in the @@ header or restore the missing lines.',
      });
    }
    entry.hunks.push({
      sourceStart: header.sourceStart,
      sourceCount: header.sourceCount,
      targetStart: header.targetStart,
      targetCount: header.targetCount,
      ...(header.section !== undefined ? { section: header.section } : {}),
      lines,
      line: header.line,
    });
    hunk = undefined;
  };

  for (const token of tokens) {
    if (token.kind !== 'hunk-line' && token.kind !== 'no-newline') closeHunk();

    switch (token.kind) {
      case 'diff-git': {
        const next = open(token.line);
        next.fromDiffGit = true;
        next.oldPath = token.oldPath;
        next.newPath = token.newPath;
        break;
      }
      case 'old-header': {
        const continues =
          entry !== undefined &&
          entry.fromDiffGit &&
          !entry.sawOldHeader &&
          entry.hunks.length === 0;
        const target = continues && entry ? entry : open(token.line);
        target.sawOldHeader = true;
        target.oldPath = token.path;
        if (token.path === DEV_NULL) target.isNew = true;
        break;
      }
      case 'new-header': {
        const continues =
          entry !== undefined && !entry.sawNewHeader && entry.hunks.length === 0;
        const target = continues && entry ? entry : open(token.line);
        target.sawNewHeader = true;
        target.newPath = token.path;
        if (token.path === DEV_NULL) target.isDeleted = true;
        break;
      }
      case 'hunk-header': {
        const target = current(token.line);
        if (target.isBinary) {
          diagnostics.push({
            kind: 'MalformedLine',
            severity: 'error',
            file: displayPath(target),
            line: token.line,
            message: `Malformed line ${token.line}: text hunk inside a binary entry`,
          });
        }
        hunk = { header: token, lines: [] };
        break;
      }
      case 'hunk-line':
        hunk?.lines.push({
          role: token.role,
          text: token.text,
          eol: token.eol,
          noNewlineAtEnd: false,
        });
        break;
      case 'no-newline': {
        const last = hunk?.lines.pop();
        if (hunk && last) hunk.lines.push({ ...last, noNewlineAtEnd: true });
        break;
      }
      case 'rename-from':
        current(token.line).renameFrom = token.path;
        break;
      case 'rename-to':
        current(token.line).renameTo = token.path;
        break;
      case 'copy-from':
        current(token.line).copyFrom = token.path;
        break;
      case 'copy-to':
        current(token.line).copyTo = token.path;
        break;
      case 'old-mode':
        current(token.line).oldMode = token.mode;
        break;
      case 'new-mode':
        current(token.line).newMode = token.mode;
        break;
      case 'new-file-mode': {
        const target = current(token.line);
        target.isNew = true;
        target.newMode = token.mode;
        break;
      }
      case 'deleted-file-mode': {
        const target = current(token.line);
        target.isDeleted = true;
        target.oldMode = token.mode;
        break;
      }
      case 'binary':
        current(token.line).isBinary = true;
        break;
      case 'index':
      case 'similarity':
      case 'garbage':
        break;
    }
  }
  closeHunk();

  const files = entries.filter((e) => !isHeaderOnly(e)).map(toFilePatch);
  if (files.length === 0) {
    diagnostics.push({
      kind: 'PatchEmpty',
      severity: 'error',
      message: 'Patch contains no file changes',
      suggestion: 'Provide a unified diff with at least one "@@" hunk or git metadata change.',
    });
  }

  if (diagnostics.some((d) => d.severity === 'error')) {
    return { ok: false, diagnostics };
  }
  return { ok: true, document: { files }, diagnostics };
}

function isHeaderOnly(entry: EntryDraft): boolean {
  return (
    entry.hunks.length === 0 &&
    !entry.isBinary &&
    !entry.isNew &&
    !entry.isDeleted &&
    entry.renameFrom === undefined &&
    entry.renameTo === undefined &&
    entry.copyFrom === undefined &&
    entry.copyTo === undefined &&
    entry.oldMode === undefined &&
    entry.newMode === undefined
  );
}

function toFilePatch(entry: EntryDraft): FilePatch {
  return {
    oldPath: entry.oldPath,
    newPath: entry.newPath,
    renameFrom: entry.renameFrom,
    renameTo: entry.renameTo,
    copyFrom: entry.copyFrom,
    copyTo: entry.copyTo,
    oldMode: entry.oldMode,
    newMode: entry.newMode,
    isNew: entry.isNew,
    isDeleted: entry.isDeleted,
    isBinary: entry.isBinary,
    hunks: entry.hunks,
    line: entry.line,
  };
}

/**
 * Path used to talk about an entry before it has been resolved against a tree.
 * The conventional `a/` and `b/` prefixes are dropped.
 */
export function displayPath(
  entry: Pick<FilePatch, 'oldPath' | 'newPath' | 'renameTo' | 'copyTo'>,
): string {
  const header =
    entry.newPath !== undefined && entry.newPath !== DEV_NULL ? entry.newPath : entry.oldPath;
  if (header !== undefined && header !== DEV_NULL) return header.replace(/^[ab]\//, '');
  return entry.renameTo ?? entry.copyTo ?? '(no file header)';
}
