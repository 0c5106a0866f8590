import type { FilePatch, Hunk, HunkLine, HunkLineRole, PatchDocument } from '@hunkwise/shared';
import { DEV_NULL } from './builder';
import { quoteGitPath } from './quoting';

const ROLE_PREFIX: Record<HunkLineRole, string> = {
  context: ' ',
  added: '+',
  removed: '-',
};

const NO_NEWLINE_MARKER = '\\ No newline at end of file';

/**
 * Renders a document back to unified-diff text.
 * Entries carrying git metadata get a `diff --git` block; hunk lines keep the
 * terminator they were parsed with.
 */
export function formatPatch(document: PatchDocument): string {
  return document.files.map(formatFilePatch).join('');
}

function formatFilePatch(file: FilePatch): string {
  const out: string[] = [];
  const git = hasGitMetadata(file);

  if (git) {
    const oldSide = sidePath(file.oldPath, file.newPath, 'a/');
    const newSide = sidePath(file.newPath, file.oldPath, 'b/');
    out.push(`diff --git ${quoteGitPath(oldSide)} ${quoteGitPath(newSide)}\n`);
    if (file.isNew && file.newMode !== undefined) {
      out.push(`new file mode ${octal(file.newMode)}\n`);
    } else if (file.isDeleted && file.oldMode !== undefined) {
      out.push(`deleted file mode ${octal(file.oldMode)}\n`);
    } else {
      if (file.oldMode !== undefined) out.push(`old mode ${octal(file.oldMode)}\n`);
      if (file.newMode !== undefined) out.push(`new mode ${octal(file.newMode)}\n`);
    }
    if (file.renameFrom !== undefined) out.push(`rename from ${quoteGitPath(file.renameFrom)}\n`);
    if (file.renameTo !== undefined) out.push(`rename to ${quoteGitPath(file.renameTo)}\n`);
    if (file.copyFrom !== undefined) out.push(`copy from ${quoteGitPath(file.copyFrom)}\n`);
    if (file.copyTo !== undefined) out.push(`copy to ${quoteGitPath(file.copyTo)}\n`);
    if (file.isBinary) {
      out.push(`Binary files ${file.oldPath ?? DEV_NULL} and ${file.newPath ?? DEV_NULL} differ\n`);
    }
  }

  const needsHeaders = file.hunks.length > 0 || (!git && (file.isNew || file.isDeleted));
  if (needsHeaders) {
    if (file.oldPath !== undefined) out.push(`--- ${quoteGitPath(file.oldPath)}\n`);
    if (file.newPath !== undefined) out.push(`+++ ${quoteGitPath(file.newPath)}\n`);
  }

  for (const hunk of file.hunks) {
    out.push(formatHunkHeader(hunk));
    for (const line of hunk.lines) {
      out.push(`${ROLE_PREFIX[line.role]}${line.text}${line.eol}`);
      if (line.noNewlineAtEnd) out.push(`${NO_NEWLINE_MARKER}\n`);
    }
  }

  return out.join('');
}

/**
 * Path for one side of a `diff --git` line. A created or deleted file names the
 * other side's path there, under this side's prefix.
 */
function sidePath(own: string | undefined, other: string | undefined, prefix: string): string {
  if (own !== undefined && own !== DEV_NULL) return own;
  if (other === undefined || other === DEV_NULL) return '';
  return /^[ab]\//.test(other) ? prefix + other.slice(2) : other;
}

function formatHunkHeader(hunk: Hunk): string {
  const section = hunk.section ? ` ${hunk.section}` : '';
  return `@@ -${range(hunk.sourceStart, hunk.sourceCount)} +${range(hunk.targetStart, hunk.targetCount)} @@${section}\n`;
}

function range(start: number, count: number): string {
  return count === 1 ? `${start}` : `${start},${count}`;
}

function octal(mode: number): string {
  return mode.toString(8).padStart(6, '0');
}

function hasGitMetadata(file: FilePatch): boolean {
  return (
    file.isBinary ||
    file.oldMode !== undefined ||
    file.newMode !== undefined ||
    file.renameFrom !== undefined ||
    file.renameTo !== undefined ||
    file.copyFrom !== undefined ||
    file.copyTo !== undefined
  );
}

const INVERTED_ROLE: Record<HunkLineRole, HunkLineRole> = {
  context: 'context',
  added: 'removed',
  removed: 'added',
};

/**
 * Returns the document that undoes `document`, the way `patch -R` reads it.
 * An inverted copy copies back onto its source, which only applies with overwrite allowed.
 */
export function invertPatch(document: PatchDocument): PatchDocument {
  return { files: document.files.map(invertFilePatch) };
}

function invertFilePatch(file: FilePatch): FilePatch {
  return {
    oldPath: file.newPath,
    newPath: file.oldPath,
    renameFrom: file.renameTo,
    renameTo: file.renameFrom,
    copyFrom: file.copyTo,
    copyTo: file.copyFrom,
    oldMode: file.newMode,
    newMode: file.oldMode,
    isNew: file.isDeleted,
    isDeleted: file.isNew,
    isBinary: file.isBinary,
    line: file.line,
    hunks: file.hunks.map(
      (hunk): Hunk => ({
        sourceStart: hunk.targetStart,
        sourceCount: hunk.targetCount,
        targetStart: hunk.sourceStart,
        targetCount: hunk.sourceCount,
        ...(hunk.section !== undefined ? { section: hunk.section } : {}),
        line: hunk.line,
        lines: hunk.lines.map((line): HunkLine => ({ ...line, role: INVERTED_ROLE[line.role] })),
      }),
    ),
  };
}
