import type { Hunk, HunkLine, MatchingConfig } from '@hunkwise/shared';
import type { TextLine } from './text';

/**
 * Where a hunk was found in the source lines.
 */
export interface HunkMatch {
  /** 0-based index of the first matched (non-fuzzed) source line */
  start: number;
  /** 0-based index where the whole hunk, fuzzed context included, begins */
  hunkStart: number;
  /** Hunk lines that take part in the replacement, with fuzzed context removed */
  body: readonly HunkLine[];
  /** Distance from the expected position, in lines */
  offset: number;
  /** Context lines ignored at each edge */
  fuzz: number;
}

/**
 * Locates `hunk` in `lines`, searching outward from `expected` (a 0-based index
 * into `lines`) but never before `minStart`.
 *
 * The exact position is tried first, then offsets `+1, -1, +2, -2, …` up to the
 * search radius. When nothing matches, the same search is repeated with one more
 * leading and trailing context line ignored, up to the fuzz factor.
 */
export function findHunk(
  lines: readonly TextLine[],
  hunk: Hunk,
  expected: number,
  minStart: number,
  options: MatchingConfig,
): HunkMatch | undefined {
  const leading = countContext(hunk.lines);
  const trailing = countContext([...hunk.lines].reverse());
  const equal = options.ignoreWhitespace ? equalIgnoringWhitespace : equalExact;

  let previous: [number, number] | undefined;
  for (let fuzz = 0; fuzz <= options.fuzz; fuzz++) {
    const head = Math.min(fuzz, leading);
    const tail = Math.min(fuzz, trailing);
    if (previous && previous[0] === head && previous[1] === tail) break;
    previous = [head, tail];

    const body = hunk.lines.slice(head, hunk.lines.length - tail);
    const pattern = body.filter((line) => line.role !== 'added');
    if (pattern.length === 0 && hunk.lines.some((line) => line.role !== 'added')) break;

    const base = expected + head;
    const fits = (start: number) => start >= minStart && start + pattern.length <= lines.length;
    const matchesAt = (start: number) =>
      pattern.every((line, i) => equal(lines[start + i].text, line.text));

    for (let distance = 0; distance <= options.searchRadius; distance++) {
      const candidates = distance === 0 ? [base] : [base + distance, base - distance];
      for (const start of candidates) {
        if (fits(start) && matchesAt(start)) {
          return { start, hunkStart: start - head, body, offset: start - base, fuzz };
        }
      }
      if (base + distance > lines.length && base - distance < minStart) break;
    }
  }

  return undefined;
}

function countContext(lines: readonly HunkLine[]): number {
  const index = lines.findIndex((line) => line.role !== 'context');
  return index < 0 ? lines.length : index;
}

function equalExact(a: string, b: string): boolean {
  return a === b;
}

function equalIgnoringWhitespace(a: string, b: string): boolean {
  return normalizeWhitespace(a) === normalizeWhitespace(b);
}

function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}
