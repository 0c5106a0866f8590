/**
 * Role of a single line inside a hunk body.
 */
export type HunkLineRole = 'context' | 'added' | 'removed';

/**
 * Line terminator carried by a patch or file line.
 */
export type LineEnding = '\n' | '\r\n';

/**
 * One line of a hunk body.
 */
export interface HunkLine {
  readonly role: HunkLineRole;
  /** Line text without the role prefix and without its terminator */
  readonly text: string;
  /** True only for the last line of a file side that has no trailing newline */
  readonly noNewlineAtEnd: boolean;
  /** Terminator the line had in the patch text */
  readonly eol: LineEnding;
}

/**
 * A contiguous block of change with its declared source and target ranges.
 */
export interface Hunk {
  /** 1-based first source line (0 for an insertion at the top of the file) */
  readonly sourceStart: number;
  readonly sourceCount: number;
  readonly targetStart: number;
  readonly targetCount: number;
  /** Enclosing-function label after the closing `@@`; informational only */
  readonly section?: string;
  readonly lines: readonly HunkLine[];
  /** 1-based line of the `@@` header in the patch text */
  readonly line: number;
}

/**
 * All changes a patch makes to one file.
 */
export interface FilePatch {
  /** Old-side path as written in the patch (`/dev/null` when the file is created) */
  readonly oldPath?: string;
  /** New-side path as written in the patch (`/dev/null` when the file is deleted) */
  readonly newPath?: string;
  readonly renameFrom?: string;
  readonly renameTo?: string;
  readonly copyFrom?: string;
  readonly copyTo?: string;
  /** Permission bits, e.g. 0o100644 */
  readonly oldMode?: number;
  readonly newMode?: number;
  readonly isNew: boolean;
  readonly isDeleted: boolean;
  readonly isBinary: boolean;
  readonly hunks: readonly Hunk[];
  /** 1-based line where this entry starts in the patch text */
  readonly line: number;
}

/**
 * A parsed patch. Never empty.
 */
export interface PatchDocument {
  readonly files: readonly FilePatch[];
}

/**
 * Classification of format and application problems.
 */
export type PatchErrorKind =
  // format stage
  | 'MalformedLine'
  | 'HunkCountMismatch'
  | 'PatchEmpty'
  // apply stage
  | 'HunkApplyFailed'
  | 'BinaryUnsupported'
  | 'PathNotFound'
  | 'PathConflict'
  | 'UnsafePath'
  | 'Timeout';

/**
 * Informational outcomes that do not fail a check.
 */
export type PatchNoticeKind = 'OffsetApplied' | 'FuzzApplied';

/**
 * A single explanation attached to a check or application result.
 */
export interface PatchDiagnostic {
  kind: PatchErrorKind | PatchNoticeKind;
  severity: 'error' | 'info';
  /** Human-readable message */
  message: string;
  /** File the diagnostic is about, as resolved against the tree */
  file?: string;
  /** 1-based hunk index within its file */
  hunk?: number;
  /** 1-based line number in the patch text */
  line?: number;
  /** Suggested fix */
  suggestion?: string;
}

export type ParseResult =
  | { ok: true; document: PatchDocument; diagnostics: PatchDiagnostic[] }
  | { ok: false; diagnostics: PatchDiagnostic[] };

/**
 * Outcome of one hunk against the working content.
 */
export type HunkOutcome =
  | {
      status: 'applied';
      /** 1-based hunk index */
      index: number;
      /** Lines between the declared and the actual position */
      offset: number;
      /** Context lines ignored at each edge to find the match */
      fuzz: number;
      /** 1-based line where the hunk landed */
      appliedAt: number;
    }
  | { status: 'failed'; index: number }
  | { status: 'skipped'; index: number };

/**
 * Dry-run verdict for a single file.
 */
export type FileVerdict =
  | { kind: 'WouldApplyCleanly' }
  | { kind: 'WouldApplyWithOffset'; offset: number; fuzz: number }
  | { kind: 'WouldFail'; reason: PatchDiagnostic };

/**
 * Per-file outcome of a dry run or a real application.
 */
export interface FileReport {
  /** Tree-relative path of the resulting file (or the removed one for deletions) */
  path: string;
  verdict: FileVerdict;
  hunks: HunkOutcome[];
  diagnostics: PatchDiagnostic[];
}

export interface DryRunReport {
  ok: boolean;
  files: FileReport[];
  diagnostics: PatchDiagnostic[];
}

export interface ApplyReport extends DryRunReport {
  /** Whether anything was written to the tree */
  committed: boolean;
  /** Tree-relative paths that were written, created, renamed or removed */
  filesChanged: string[];
}
