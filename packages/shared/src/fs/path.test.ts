import { describe, it, expect } from 'vitest';
import { isInside } from './path';

describe('isInside', () => {
  it('accepts the root and paths below it', () => {
    expect(isInside('/repo', '.')).toBe(true);
    expect(isInside('/repo', 'src/a.ts')).toBe(true);
    expect(isInside('/repo', '/repo/src/a.ts')).toBe(true);
  });

  it('rejects paths that escape the root', () => {
    expect(isInside('/repo', '../other/a.ts')).toBe(false);
    expect(isInside('/repo', '/etc/passwd')).toBe(false);
    expect(isInside('/repo', '/repository/a.ts')).toBe(false);
  });
});
