import { MAX_TIMEOUT_MS, TimeoutError, type Logger } from '@hunkwise/shared';

export interface DeadlineOptions {
  /** Outer cancellation; aborting it aborts the work too */
  signal?: AbortSignal;
  /** Receives a DeadlineExceeded event when the timer fires */
  logger?: Logger;
  runId?: string;
  /** Name used in the error message and the event */
  operation?: string;
}

/**
 * Runs `fn` with a signal that is aborted with a TimeoutError after `timeoutMs`.
 *
 * When the deadline passes, the work is told to stop and is waited for before
 * the TimeoutError is thrown, so no file handle outlives the call. The timer
 * is always cleared.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions = {},
): Promise<T> {
  const operation = options.operation ?? 'operation';
  const abortController = new AbortController();

  // Handle outer cancellation
  const abortHandler = () => {
    abortController.abort(options.signal?.reason);
  };
  if (options.signal) {
    if (options.signal.aborted) {
      abortController.abort(options.signal.reason);
    } else {
      options.signal.addEventListener('abort', abortHandler);
    }
  }

  // Handle timeout
  let timeoutId: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, {
        details: { timeoutMs, operation },
      });
      abortController.abort(error);
      reject(error);
    }, Math.min(timeoutMs, MAX_TIMEOUT_MS));
  });

  const work = fn(abortController.signal);
  try {
    return await Promise.race([work, deadline]);
  } catch (error: unknown) {
    if (error instanceof TimeoutError && abortController.signal.reason === error) {
      await Promise.allSettled([work]);
      if (options.logger) {
        await options.logger.log({
          schemaVersion: 1,
          timestamp: new Date().toISOString(),
          runId: options.runId ?? 'unknown',
          type: 'DeadlineExceeded',
          payload: { timeoutMs, operation },
        });
      }
    }
    throw error;
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    if (options.signal) options.signal.removeEventListener('abort', abortHandler);
  }
}
