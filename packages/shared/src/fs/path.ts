import path from 'node:path';

/**
 * Checks whether `candidate` resolves to `root` itself or somewhere below it.
 */
export function isInside(root: string, candidate: string): boolean {
  const absRoot = path.resolve(root);
  const absCandidate = path.resolve(absRoot, candidate);
  return absCandidate === absRoot || absCandidate.startsWith(absRoot + path.sep);
}
