import type { HunkwiseEvent } from '../types/events';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Print structured events and debug messages */
  verbose?: boolean;
}

/**
 * Writes human-readable messages to the console.
 * Structured events go to stderr so that stdout stays reserved for command output.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  log(event: HunkwiseEvent): void {
    if (!this.verbose) return;
    console.error(JSON.stringify(event));
  }

  trace(event: HunkwiseEvent, message: string): void {
    if (!this.verbose) return;
    console.error(message, JSON.stringify(event));
  }

  debug(message: string): void {
    if (!this.verbose) return;
    console.debug(message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: HunkwiseEvent) {
    return this.base.log(event);
  }

  trace(event: HunkwiseEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
