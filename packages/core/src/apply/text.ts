import type { LineEnding } from '@hunkwise/shared';

/**
 * A line of file content with the terminator it had. Only the last line of a
 * file can have an empty terminator.
 */
export interface TextLine {
  text: string;
  eol: LineEnding | '';
  /** Original bytes of `text` when they are not valid UTF-8 */
  raw?: Buffer;
}

export function splitLines(content: string): TextLine[] {
  const lines: TextLine[] = [];
  let start = 0;
  while (start < content.length) {
    const nl = content.indexOf('\n', start);
    if (nl < 0) {
      lines.push({ text: content.slice(start), eol: '' });
      break;
    }
    const crlf = nl > start && content.charAt(nl - 1) === '\r';
    lines.push({ text: content.slice(start, crlf ? nl - 1 : nl), eol: crlf ? '\r\n' : '\n' });
    start = nl + 1;
  }
  return lines;
}

/**
 * Splits file bytes into lines. Lines that are not valid UTF-8 keep their
 * bytes so that {@link encodeLines} writes them back unchanged.
 */
export function decodeLines(content: Buffer): TextLine[] {
  const lines: TextLine[] = [];
  let start = 0;
  while (start < content.length) {
    const nl = content.indexOf(0x0a, start);
    const end = nl < 0 ? content.length : nl;
    const crlf = nl > start && content[nl - 1] === 0x0d;
    const bytes = content.subarray(start, crlf ? end - 1 : end);
    const text = bytes.toString('utf8');
    const eol = nl < 0 ? '' : crlf ? '\r\n' : '\n';
    lines.push(
      Buffer.from(text, 'utf8').equals(bytes) ? { text, eol } : { text, eol, raw: Buffer.from(bytes) },
    );
    if (nl < 0) break;
    start = nl + 1;
  }
  return lines;
}

export function encodeLines(lines: readonly TextLine[]): Buffer {
  return Buffer.concat(
    lines.map((line) =>
      Buffer.concat([line.raw ?? Buffer.from(line.text, 'utf8'), Buffer.from(line.eol, 'utf8')]),
    ),
  );
}

export function joinLines(lines: readonly TextLine[]): string {
  return lines.map((line) => line.text + line.eol).join('');
}

/**
 * The terminator used for lines that must gain one: the file's first, or `\n`.
 */
export function dominantEol(lines: readonly TextLine[]): LineEnding {
  const first = lines.find((line) => line.eol !== '');
  return first && first.eol !== '' ? first.eol : '\n';
}
