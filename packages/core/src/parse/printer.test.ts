import { describe, it, expect } from 'vitest';
import type { PatchDocument } from '@hunkwise/shared';
import { parsePatchOrThrow } from './builder';
import { formatPatch, invertPatch } from './printer';

const lines = (...rows: string[]) => rows.join('\n') + '\n';

const roundTrip = (text: string) => formatPatch(parsePatchOrThrow(text));

describe('formatPatch', () => {
  it('reproduces a plain unified diff', () => {
    const text = lines(
      '--- a/src/a.txt',
      '+++ b/src/a.txt',
      '@@ -1,3 +1,3 @@ function main',
      ' one',
      '-two',
      '+TWO',
      ' three',
    );
    expect(roundTrip(text)).toBe(text);
  });

  it('writes git metadata for a created file', () => {
    const text = lines(
      'diff --git a/n.txt b/n.txt',
      'new file mode 100644',
      '--- /dev/null',
      '+++ b/n.txt',
      '@@ -0,0 +1 @@',
      '+x',
    );
    expect(roundTrip(text)).toBe(text);
  });

  it('writes a mode change without headers', () => {
    const text = lines('diff --git a/run.sh b/run.sh', 'old mode 100644', 'new mode 100755');
    expect(roundTrip(text)).toBe(text);
  });

  it('keeps no-newline markers and CRLF body lines', () => {
    const text =
      '--- a/f\n+++ b/f\n@@ -1 +1 @@\n-a\r\n\\ No newline at end of file\n+b\r\n\\ No newline at end of file\n';
    expect(roundTrip(text)).toBe(text);
  });

  it('quotes paths that need it', () => {
    const document: PatchDocument = {
      files: [
        {
          oldPath: 'a/tab\there',
          newPath: 'b/tab\there',
          isNew: false,
          isDeleted: false,
          isBinary: false,
          line: 1,
          hunks: [
            {
              sourceStart: 1,
              sourceCount: 1,
              targetStart: 1,
              targetCount: 1,
              line: 3,
              lines: [
                { role: 'removed', text: 'x', eol: '\n', noNewlineAtEnd: false },
                { role: 'added', text: 'y', eol: '\n', noNewlineAtEnd: false },
              ],
            },
          ],
        },
      ],
    };
    expect(formatPatch(document)).toBe(
      lines('--- "a/tab\\there"', '+++ "b/tab\\there"', '@@ -1 +1 @@', '-x', '+y'),
    );
  });
});

describe('invertPatch', () => {
  it('swaps sides and roles', () => {
    const document = parsePatchOrThrow(
      lines('--- a/f.txt', '+++ b/f.txt', '@@ -1,2 +1,3 @@', ' keep', '-old', '+new', '+added'),
    );
    expect(formatPatch(invertPatch(document))).toBe(
      lines('--- b/f.txt', '+++ a/f.txt', '@@ -1,3 +1,2 @@', ' keep', '+old', '-new', '-added'),
    );
  });

  it('turns a creation into a deletion', () => {
    const document = parsePatchOrThrow(
      lines(
        'diff --git a/n.txt b/n.txt',
        'new file mode 100644',
        '--- /dev/null',
        '+++ b/n.txt',
        '@@ -0,0 +1 @@',
        '+x',
      ),
    );
    const [file] = invertPatch(document).files;
    expect(file.isNew).toBe(false);
    expect(file.isDeleted).toBe(true);
    expect(file.oldMode).toBe(0o100644);
    expect(file.oldPath).toBe('b/n.txt');
    expect(file.newPath).toBe('/dev/null');
    expect(formatPatch({ files: [file] })).toBe(
      lines(
        'diff --git b/n.txt a/n.txt',
        'deleted file mode 100644',
        '--- b/n.txt',
        '+++ /dev/null',
        '@@ -1 +0,0 @@',
        '-x',
      ),
    );
  });

  it('swaps rename sides', () => {
    const document = parsePatchOrThrow(
      lines('diff --git a/old.txt b/new.txt', 'rename from old.txt', 'rename to new.txt'),
    );
    const [file] = invertPatch(document).files;
    expect(file.renameFrom).toBe('new.txt');
    expect(file.renameTo).toBe('old.txt');
  });

  it('is its own inverse', () => {
    const document = parsePatchOrThrow(
      lines(
        'diff --git a/run.sh b/run.sh',
        'old mode 100644',
        'new mode 100755',
        '--- a/run.sh',
        '+++ b/run.sh',
        '@@ -2 +2,2 @@',
        '-echo hi',
        '+echo hello',
        '+exit 0',
      ),
    );
    expect(invertPatch(invertPatch(document))).toEqual(document);
  });
});
