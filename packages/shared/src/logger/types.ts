import type { HunkwiseEvent } from '../types/events';

export type MaybePromise<T> = T | Promise<T>;

/**
 * Where a check or an application reports what it did.
 *
 * Command output never goes through a logger: stdout belongs to the renderer,
 * so events go to stderr or to a JSONL file.
 */
export interface Logger {
  /** Records an event such as `PatchParsed` or `FilesCommitted` */
  log(event: HunkwiseEvent): MaybePromise<void>;
  /** Records an event with a one-line summary for human-readable sinks */
  trace(event: HunkwiseEvent, message: string): MaybePromise<void>;
  /** Shown only with `--verbose` */
  debug(message: string): MaybePromise<void>;
  /** A logger whose messages are prefixed with `[key=value …]` */
  child(bindings: Record<string, unknown>): Logger;
}
