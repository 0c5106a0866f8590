import type { FilePatch } from '@hunkwise/shared';
import { DEV_NULL } from '../parse/builder';

const WINDOWS_DRIVE_RE = /^[a-zA-Z]:/;

/**
 * Drops `level` leading components from a header path, the way `patch -pN` does.
 * Runs of slashes count as one separator. Returns undefined when the path has
 * too few components.
 */
export function stripComponents(path: string, level: number): string | undefined {
  let rest = path;
  for (let i = 0; i < level; i++) {
    const slash = rest.indexOf('/');
    if (slash < 0) return undefined;
    rest = rest.slice(slash + 1).replace(/^\/+/, '');
  }
  return rest === '' ? undefined : rest;
}

/**
 * Returns why `path` may not be written below a tree root, or undefined when it may.
 */
export function unsafePathReason(path: string): string | undefined {
  if (path.includes('\0')) return 'path contains a NUL byte';
  const normalized = path.replace(/\\/g, '/');
  if (normalized.startsWith('//')) return 'UNC paths are not allowed';
  if (normalized.startsWith('/')) return 'absolute paths are not allowed';
  if (WINDOWS_DRIVE_RE.test(normalized)) return 'drive-letter paths are not allowed';
  if (normalized.split('/').includes('..')) return 'path escapes the tree root';
  return undefined;
}

/**
 * Tree paths an entry refers to, before any of them was looked up.
 */
export type PathCandidates =
  /** The first of `sources` that exists is patched in place */
  | { kind: 'modify'; sources: string[] }
  | { kind: 'create'; target: string }
  | { kind: 'delete'; source: string }
  | { kind: 'rename' | 'copy'; source: string; target: string };

export type PathCandidatesResult =
  | { ok: true; candidates: PathCandidates }
  | { ok: false; kind: 'PathNotFound' | 'UnsafePath'; message: string };

/**
 * Works out which tree paths an entry refers to.
 * Header paths are stripped by `stripLevel`; rename and copy paths are used as written.
 */
export function resolveCandidates(file: FilePatch, stripLevel: number): PathCandidatesResult {
  const strip = (path: string | undefined): string | undefined =>
    path === undefined || path === DEV_NULL ? undefined : stripComponents(path, stripLevel);

  let candidates: PathCandidates;
  if (file.renameFrom !== undefined || file.renameTo !== undefined) {
    const source = file.renameFrom ?? strip(file.oldPath);
    const target = file.renameTo ?? strip(file.newPath);
    if (source === undefined || target === undefined) {
      return { ok: false, kind: 'PathNotFound', message: 'rename is missing its source or target' };
    }
    candidates = { kind: 'rename', source, target };
  } else if (file.copyFrom !== undefined || file.copyTo !== undefined) {
    const source = file.copyFrom ?? strip(file.oldPath);
    const target = file.copyTo ?? strip(file.newPath);
    if (source === undefined || target === undefined) {
      return { ok: false, kind: 'PathNotFound', message: 'copy is missing its source or target' };
    }
    candidates = { kind: 'copy', source, target };
  } else if (file.oldPath === undefined && file.newPath === undefined) {
    return { ok: false, kind: 'PathNotFound', message: 'hunk has no file header naming a path' };
  } else if (file.isNew) {
    const target = strip(file.newPath);
    if (target === undefined) return notStrippable(file.newPath, stripLevel);
    candidates = { kind: 'create', target };
  } else if (file.isDeleted) {
    const source = strip(file.oldPath);
    if (source === undefined) return notStrippable(file.oldPath, stripLevel);
    candidates = { kind: 'delete', source };
  } else {
    const sources = [strip(file.newPath), strip(file.oldPath)].filter(
      (path, i, all): path is string => path !== undefined && all.indexOf(path) === i,
    );
    if (sources.length === 0) return notStrippable(file.newPath ?? file.oldPath, stripLevel);
    candidates = { kind: 'modify', sources };
  }

  for (const path of candidatePaths(candidates)) {
    const reason = unsafePathReason(path);
    if (reason) return { ok: false, kind: 'UnsafePath', message: `${path}: ${reason}` };
  }
  return { ok: true, candidates };
}

export function candidatePaths(candidates: PathCandidates): string[] {
  switch (candidates.kind) {
    case 'modify':
      return candidates.sources;
    case 'create':
      return [candidates.target];
    case 'delete':
      return [candidates.source];
    default:
      return [candidates.source, candidates.target];
  }
}

function notStrippable(path: string | undefined, level: number): PathCandidatesResult {
  return {
    ok: false,
    kind: 'PathNotFound',
    message: `cannot strip ${level} leading component${level === 1 ? '' : 's'} from ${path ?? DEV_NULL}`,
  };
}
