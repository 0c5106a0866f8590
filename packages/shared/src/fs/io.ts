// packages/shared/src/fs/io.ts
import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName, withDir } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

export interface AtomicWriteOptions {
  /** Permission bits for the written file */
  mode?: number;
}

export async function atomicWrite(
  path: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {},
): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  try {
    await fs.writeFile(tempPath, content);
    if (options.mode !== undefined) {
      await fs.chmod(tempPath, options.mode);
    }
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Runs `fn` with a fresh directory created under `parent`.
 * The directory and everything in it is removed when `fn` settles, even on error.
 */
export async function withStagingDir<T>(
  parent: string,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  return withDir(({ path }) => fn(path), {
    tmpdir: parent,
    prefix: '.hunkwise-staging-',
    unsafeCleanup: true,
  });
}
