import type { LineEnding, PatchDiagnostic } from '@hunkwise/shared';
import type { Token } from './tokens';
import { readPath } from './quoting';

const HUNK_HEADER_RE = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@(?: ?(.*))?$/;
const DIFF_GIT_QUOTED_RE = /^("(?:[^"\\]|\\.)*"|\S+) ("(?:[^"\\]|\\.)*"|\S+)$/;
const INDEX_RE = /^index ([0-9a-fA-F]+)\.\.([0-9a-fA-F]+)(?: ([0-7]{6}))?$/;
const MODE_RE = /^[0-7]{6}$/;
const BINARY_FILES_RE = /^Binary files .+ and .+ differ$/;
const TRAILING_TIMESTAMP_RE =
  / \d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(?:\.\d{1,9})?(?: [+-]\d{4})?$/;

const MODE_PREFIXES = [
  ['old mode ', 'old-mode'],
  ['new mode ', 'new-mode'],
  ['new file mode ', 'new-file-mode'],
  ['deleted file mode ', 'deleted-file-mode'],
] as const;

const PATH_META_PREFIXES = [
  ['rename from ', 'rename-from'],
  ['rename to ', 'rename-to'],
  ['copy from ', 'copy-from'],
  ['copy to ', 'copy-to'],
] as const;

export interface TokenizeResult {
  tokens: Token[];
  diagnostics: PatchDiagnostic[];
}

interface RawLine {
  text: string;
  eol: LineEnding;
}

type HunkState =
  /** Declared counts still expect lines */
  | { phase: 'body'; source: number; target: number }
  /** Counts are used up; markers and overflow lines still belong to the hunk */
  | { phase: 'trailing' };

/**
 * Splits patch text into lines, normalizing `\r\n` but remembering it per line.
 */
export function splitPatchLines(text: string): RawLine[] {
  const parts = text.split('\n');
  if (parts[parts.length - 1] === '') parts.pop();
  return parts.map((part): RawLine =>
    part.endsWith('\r') ? { text: part.slice(0, -1), eol: '\r\n' } : { text: part, eol: '\n' },
  );
}

/**
 * Classifies every line of a unified diff.
 *
 * Lines inside a hunk body are interpreted against the counts the `@@` header
 * declared; outside a hunk, unknown lines are commentary and ignored, the way
 * `patch` skips leading garbage. Each line is looked at once.
 */
export function tokenize(text: string): TokenizeResult {
  const lines = splitPatchLines(text);
  const tokens: Token[] = [];
  const diagnostics: PatchDiagnostic[] = [];

  let hunk: HunkState | undefined;
  let inBinaryPayload = false;

  const malformed = (line: number, content: string, reason: string) => {
    diagnostics.push({
      kind: 'MalformedLine',
      severity: 'error',
      line,
      message: `Malformed line ${line}: ${reason}: ${JSON.stringify(truncate(content))}`,
      suggestion:
        'Hunk bodies may only contain lines starting with " ", "+", "-" or "\\ No newline at end of file".',
    });
  };

  for (let idx = 0; idx < lines.length; idx++) {
    const { text: content, eol } = lines[idx];
    const line = idx + 1;

    if (inBinaryPayload) {
      if (content === '') {
        inBinaryPayload = false;
        continue;
      }
      if (!content.startsWith('diff --git ')) continue;
      inBinaryPayload = false;
    }

    if (hunk?.phase === 'body') {
      const first = content.charAt(0);
      if (first === ' ' || content === '') {
        tokens.push({ kind: 'hunk-line', line, role: 'context', text: content.slice(1), eol });
        hunk = consume(hunk, 1, 1);
        continue;
      }
      if (first === '-') {
        tokens.push({ kind: 'hunk-line', line, role: 'removed', text: content.slice(1), eol });
        hunk = consume(hunk, 1, 0);
        continue;
      }
      if (first === '+') {
        tokens.push({ kind: 'hunk-line', line, role: 'added', text: content.slice(1), eol });
        hunk = consume(hunk, 0, 1);
        continue;
      }
      if (first === '\\') {
        tokens.push(noNewline(line, content, tokens, malformed));
        continue;
      }
      // A header cuts the hunk short; the builder reports the count mismatch.
      hunk = undefined;
      if (!startsHeader(content)) {
        malformed(line, content, 'unexpected line inside hunk');
        continue;
      }
    } else if (hunk?.phase === 'trailing') {
      if (content.startsWith('\\')) {
        tokens.push(noNewline(line, content, tokens, malformed));
        continue;
      }
      const isHeaderPair =
        content.startsWith('--- ') && (lines[idx + 1]?.text.startsWith('+++ ') ?? false);
      const isSignature = content === '-- ';
      const first = content.charAt(0);
      if (!isHeaderPair && !isSignature && (first === ' ' || first === '-' || first === '+')) {
        const role = first === ' ' ? 'context' : first === '-' ? 'removed' : 'added';
        tokens.push({ kind: 'hunk-line', line, role, text: content.slice(1), eol });
        continue;
      }
      hunk = undefined;
      if (isSignature) {
        tokens.push({ kind: 'garbage', line, text: content });
        continue;
      }
    }

    if (content.startsWith('@@')) {
      const match = HUNK_HEADER_RE.exec(content);
      const numbers = match
        ? [match[1], match[2] ?? '1', match[3], match[4] ?? '1'].map(Number)
        : [];
      if (!match || !numbers.every(Number.isSafeInteger)) {
        malformed(line, content, 'invalid hunk header');
        continue;
      }
      const [sourceStart, sourceCount, targetStart, targetCount] = numbers;
      const section = match[5]?.trim();
      tokens.push({
        kind: 'hunk-header',
        line,
        sourceStart,
        sourceCount,
        targetStart,
        targetCount,
        ...(section ? { section } : {}),
      });
      hunk =
        sourceCount === 0 && targetCount === 0
          ? { phase: 'trailing' }
          : { phase: 'body', source: sourceCount, target: targetCount };
      continue;
    }

    if (content.startsWith('diff --git ')) {
      const paths = parseDiffGitPaths(content.slice('diff --git '.length));
      if (paths) {
        tokens.push({ kind: 'diff-git', line, ...paths });
      } else {
        tokens.push({ kind: 'garbage', line, text: content });
      }
      continue;
    }

    if (content.startsWith('--- ')) {
      tokens.push({ kind: 'old-header', line, path: parseHeaderPath(content.slice(4)) });
      continue;
    }

    if (content.startsWith('+++ ')) {
      tokens.push({ kind: 'new-header', line, path: parseHeaderPath(content.slice(4)) });
      continue;
    }

    const modePrefix = MODE_PREFIXES.find(([prefix]) => content.startsWith(prefix));
    if (modePrefix) {
      const value = content.slice(modePrefix[0].length).trim();
      if (!MODE_RE.test(value)) {
        malformed(line, content, 'file mode must be six octal digits');
        continue;
      }
      tokens.push({ kind: modePrefix[1], line, mode: parseInt(value, 8) });
      continue;
    }

    const pathPrefix = PATH_META_PREFIXES.find(([prefix]) => content.startsWith(prefix));
    if (pathPrefix) {
      const path = readPath(content.slice(pathPrefix[0].length));
      tokens.push({ kind: pathPrefix[1], line, path });
      continue;
    }

    if (content.startsWith('index ')) {
      const match = INDEX_RE.exec(content);
      if (match) {
        tokens.push({
          kind: 'index',
          line,
          oldHash: match[1],
          newHash: match[2],
          ...(match[3] ? { mode: parseInt(match[3], 8) } : {}),
        });
      } else {
        tokens.push({ kind: 'garbage', line, text: content });
      }
      continue;
    }

    if (content.startsWith('similarity index ') || content.startsWith('dissimilarity index ')) {
      tokens.push({ kind: 'similarity', line });
      continue;
    }

    if (BINARY_FILES_RE.test(content)) {
      tokens.push({ kind: 'binary', line });
      continue;
    }

    if (content === 'GIT binary patch') {
      tokens.push({ kind: 'binary', line });
      inBinaryPayload = true;
      continue;
    }

    if (content.startsWith('\\')) {
      malformed(line, content, 'no-newline marker without a preceding hunk line');
      continue;
    }

    tokens.push({ kind: 'garbage', line, text: content });
  }

  return { tokens, diagnostics };
}

function consume(
  state: { phase: 'body'; source: number; target: number },
  source: number,
  target: number,
): HunkState {
  const remainingSource = state.source - source;
  const remainingTarget = state.target - target;
  if (remainingSource <= 0 && remainingTarget <= 0) return { phase: 'trailing' };
  return { phase: 'body', source: remainingSource, target: remainingTarget };
}

function noNewline(
  line: number,
  content: string,
  tokens: readonly Token[],
  malformed: (line: number, content: string, reason: string) => void,
): Token {
  const previous = tokens[tokens.length - 1];
  if (previous?.kind !== 'hunk-line') {
    malformed(line, content, 'no-newline marker without a preceding hunk line');
    return { kind: 'garbage', line, text: content };
  }
  return { kind: 'no-newline', line };
}

function startsHeader(content: string): boolean {
  return content.startsWith('@@') || content.startsWith('diff ') || content.startsWith('Index: ');
}

/**
 * Strips an optional timestamp from a `---`/`+++` header and unquotes the path.
 */
export function parseHeaderPath(rest: string): string {
  const tab = rest.indexOf('\t');
  let value = tab >= 0 ? rest.slice(0, tab) : rest.replace(TRAILING_TIMESTAMP_RE, '');
  value = value.trimEnd();
  return readPath(value);
}

/**
 * Splits the two paths of a `diff --git a/X b/Y` line.
 * Unquoted paths containing spaces are split where both halves name the same file.
 */
export function parseDiffGitPaths(rest: string): { oldPath: string; newPath: string } | undefined {
  const simple = DIFF_GIT_QUOTED_RE.exec(rest);
  if (simple) {
    return { oldPath: readPath(simple[1]), newPath: readPath(simple[2]) };
  }

  // "a/my file.txt b/my file.txt": the halves are equal once their prefixes are dropped.
  const half = (rest.length - 1) / 2;
  if (Number.isInteger(half) && rest.charAt(half) === ' ') {
    const oldPath = rest.slice(0, half);
    const newPath = rest.slice(half + 1);
    if (oldPath.slice(oldPath.indexOf('/') + 1) === newPath.slice(newPath.indexOf('/') + 1)) {
      return { oldPath, newPath };
    }
  }

  return undefined;
}

function truncate(value: string, max = 80): string {
  return value.length > max ? `${value.slice(0, max)}…` : value;
}
