import * as fs from 'fs/promises';
import type { HunkwiseEvent } from '../types/events';
import type { Logger } from './types';

export interface JsonlLoggerOptions {
  /** Print debug messages */
  verbose?: boolean;
  bindings?: Record<string, unknown>;
}

/**
 * Appends structured events to a JSON Lines file, one event per line.
 * Debug messages still go to the console.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly verbose: boolean;
  private readonly bindings: Record<string, unknown>;

  constructor(filePath: string, options: JsonlLoggerOptions = {}) {
    this.filePath = filePath;
    this.verbose = options.verbose ?? false;
    this.bindings = options.bindings ?? {};
  }

  async log(event: HunkwiseEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // A broken log file must not fail a check.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: HunkwiseEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    if (!this.verbose) return;
    console.debug(this.withPrefix(message));
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, {
      verbose: this.verbose,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
