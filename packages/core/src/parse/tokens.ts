import type { HunkLineRole, LineEnding } from '@hunkwise/shared';

interface TokenBase {
  /** 1-based line number in the patch text */
  line: number;
}

export interface DiffGitToken extends TokenBase {
  kind: 'diff-git';
  oldPath: string;
  newPath: string;
}

export interface FileHeaderToken extends TokenBase {
  kind: 'old-header' | 'new-header';
  path: string;
}

export interface HunkHeaderToken extends TokenBase {
  kind: 'hunk-header';
  sourceStart: number;
  sourceCount: number;
  targetStart: number;
  targetCount: number;
  section?: string;
}

export interface HunkLineToken extends TokenBase {
  kind: 'hunk-line';
  role: HunkLineRole;
  text: string;
  eol: LineEnding;
}

export interface NoNewlineToken extends TokenBase {
  kind: 'no-newline';
}

export interface PathMetaToken extends TokenBase {
  kind: 'rename-from' | 'rename-to' | 'copy-from' | 'copy-to';
  path: string;
}

export interface ModeToken extends TokenBase {
  kind: 'old-mode' | 'new-mode' | 'new-file-mode' | 'deleted-file-mode';
  mode: number;
}

export interface IndexToken extends TokenBase {
  kind: 'index';
  oldHash: string;
  newHash: string;
  mode?: number;
}

export interface BinaryToken extends TokenBase {
  kind: 'binary';
}

/** `similarity index`, `dissimilarity index` */
export interface SimilarityToken extends TokenBase {
  kind: 'similarity';
}

/** Commentary outside any file entry or hunk body */
export interface GarbageToken extends TokenBase {
  kind: 'garbage';
  text: string;
}

export type Token =
  | DiffGitToken
  | FileHeaderToken
  | HunkHeaderToken
  | HunkLineToken
  | NoNewlineToken
  | PathMetaToken
  | ModeToken
  | IndexToken
  | BinaryToken
  | SimilarityToken
  | GarbageToken;

export type TokenKind = Token['kind'];
