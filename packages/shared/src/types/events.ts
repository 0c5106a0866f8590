/**
 * Base interface for all hunkwise events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the check or application run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted once patch text has been parsed.
 */
export interface PatchParsed extends BaseEvent {
  type: 'PatchParsed';
  payload: {
    ok: boolean;
    fileCount: number;
    hunkCount: number;
    errorCount: number;
  };
}

/** Emitted after each file of a document has been matched against the tree */
export interface FileEvaluated extends BaseEvent {
  type: 'FileEvaluated';
  payload: {
    path: string;
    verdict: 'WouldApplyCleanly' | 'WouldApplyWithOffset' | 'WouldFail';
    hunks: number;
    reason?: string;
  };
}

/** Emitted when a hunk matched away from its declared position or needed fuzz */
export interface HunkOffsetApplied extends BaseEvent {
  type: 'HunkOffsetApplied';
  payload: {
    path: string;
    hunk: number;
    offset: number;
    fuzz: number;
  };
}

/** Emitted when results have been written to the real tree */
export interface FilesCommitted extends BaseEvent {
  type: 'FilesCommitted';
  payload: {
    files: string[];
    atomic: boolean;
  };
}

/** Emitted when a deadline cancelled outstanding work */
export interface DeadlineExceeded extends BaseEvent {
  type: 'DeadlineExceeded';
  payload: {
    timeoutMs: number;
    operation: string;
  };
}

export type HunkwiseEvent =
  | PatchParsed
  | FileEvaluated
  | HunkOffsetApplied
  | FilesCommitted
  | DeadlineExceeded;

