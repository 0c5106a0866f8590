const ESCAPES: Record<string, number> = {
  a: 0x07,
  b: 0x08,
  f: 0x0c,
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  v: 0x0b,
  '"': 0x22,
  '\\': 0x5c,
};

const NEEDS_QUOTING = /["\\\x00-\x1f\x7f]/;

/**
 * Decodes a git C-style quoted path (`"dir/caf\303\251.txt"`).
 * Returns undefined when the value is not a complete quoted string.
 */
export function unquoteGitPath(value: string): string | undefined {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) return undefined;

  const bytes: number[] = [];
  const body = value.slice(1, -1);
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === '"') return undefined;
    if (ch !== '\\') {
      bytes.push(...Buffer.from(ch, 'utf8'));
      continue;
    }

    const next = body[i + 1];
    if (next === undefined) return undefined;
    if (next in ESCAPES) {
      bytes.push(ESCAPES[next]);
      i++;
      continue;
    }

    const octal = /^[0-7]{3}/.exec(body.slice(i + 1, i + 4));
    if (!octal) return undefined;
    bytes.push(parseInt(octal[0], 8));
    i += 3;
  }

  return Buffer.from(bytes).toString('utf8');
}

/**
 * Quotes a path the way git does when it contains control characters, quotes or backslashes.
 */
export function quoteGitPath(path: string): string {
  if (!NEEDS_QUOTING.test(path)) return path;

  let out = '"';
  for (const ch of path) {
    const code = ch.charCodeAt(0);
    const named = Object.keys(ESCAPES).find((key) => ESCAPES[key] === code);
    if (named !== undefined) {
      out += `\\${named}`;
    } else if (code < 0x20 || code === 0x7f) {
      out += `\\${code.toString(8).padStart(3, '0')}`;
    } else {
      out += ch;
    }
  }
  return out + '"';
}

/**
 * Reads a header path that may be quoted; unquoted values are returned as-is.
 */
export function readPath(value: string): string {
  return unquoteGitPath(value) ?? value;
}
