import { promises as fs } from 'fs';
import path from 'path';
import { FileSystemError, atomicWrite, isInside } from '@hunkwise/shared';
import { unsafePathReason } from '../apply/paths';
import type { FileStat, FileTree } from './types';

export interface FsTreeOptions {
  /** Cancels pending reads */
  signal?: AbortSignal;
}

/**
 * A real directory on disk. Every path is checked to stay below the root.
 */
export class FsTree implements FileTree {
  readonly root: string;
  private readonly signal?: AbortSignal;

  constructor(root: string, options: FsTreeOptions = {}) {
    this.root = path.resolve(root);
    this.signal = options.signal;
  }

  async read(relPath: string): Promise<Buffer | undefined> {
    const abs = await this.resolve(relPath);
    try {
      return await fs.readFile(abs, { signal: this.signal });
    } catch (error) {
      this.signal?.throwIfAborted();
      if (isMissing(error)) return undefined;
      throw new FileSystemError(relPath, `could not read file: ${describe(error)}`, {
        cause: error,
      });
    }
  }

  async stat(relPath: string): Promise<FileStat | undefined> {
    const abs = await this.resolve(relPath);
    try {
      const stats = await fs.stat(abs);
      return stats.isFile() ? { mode: stats.mode } : undefined;
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw new FileSystemError(relPath, `could not stat file: ${describe(error)}`, {
        cause: error,
      });
    }
  }

  async write(relPath: string, content: Buffer, mode?: number): Promise<void> {
    const abs = await this.resolve(relPath);
    const keep = mode ?? (await this.stat(relPath))?.mode;
    try {
      await atomicWrite(abs, content, keep === undefined ? {} : { mode: keep & 0o7777 });
    } catch (error) {
      throw new FileSystemError(relPath, `could not write file: ${describe(error)}`, {
        cause: error,
      });
    }
  }

  async remove(relPath: string): Promise<void> {
    const abs = await this.resolve(relPath);
    try {
      await fs.rm(abs, { force: true });
    } catch (error) {
      throw new FileSystemError(relPath, `could not remove file: ${describe(error)}`, {
        cause: error,
      });
    }
  }

  async chmod(relPath: string, mode: number): Promise<void> {
    const abs = await this.resolve(relPath);
    try {
      await fs.chmod(abs, mode & 0o7777);
    } catch (error) {
      throw new FileSystemError(relPath, `could not change mode: ${describe(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Why `relPath` may not be used, or undefined when it lies below the root.
   * Symbolic links are followed up to the nearest existing ancestor.
   */
  async unsafeReason(relPath: string): Promise<string | undefined> {
    const reason = unsafePathReason(relPath);
    if (reason || !isInside(this.root, relPath)) return reason ?? 'path escapes the tree root';

    const realRoot = await this.realpath(this.root);
    let probe = path.resolve(this.root, relPath);
    while (probe !== this.root) {
      const real = await this.realpath(probe);
      if (real !== undefined) {
        return isInside(realRoot ?? this.root, real)
          ? undefined
          : 'path leaves the tree root through a symbolic link';
      }
      probe = path.dirname(probe);
    }
    return undefined;
  }

  /** Absolute location of `relPath`; throws for paths outside the root */
  async resolve(relPath: string): Promise<string> {
    const reason = await this.unsafeReason(relPath);
    if (reason) throw new FileSystemError(relPath, reason);
    return path.resolve(this.root, relPath);
  }

  private async realpath(abs: string): Promise<string | undefined> {
    try {
      return await fs.realpath(abs);
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw new FileSystemError(abs, `could not resolve path: ${describe(error)}`, {
        cause: error,
      });
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isMissing(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR' || code === 'EISDIR';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
