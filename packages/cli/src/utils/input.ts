import { promises as fs } from 'fs';
import path from 'path';
import { FileSystemError, UsageError } from '@hunkwise/shared';

/** Patch argument that stands for standard input */
export const STDIN_MARKER = '-';

/**
 * Reads the patch named on the command line, or standard input for `-`.
 */
export async function readPatchInput(
  source: string,
  cwd: string,
  stdin: NodeJS.ReadableStream,
): Promise<string> {
  if (source === STDIN_MARKER) {
    const chunks: Buffer[] = [];
    for await (const chunk of stdin) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString('utf8');
  }

  const filePath = path.resolve(cwd, source);
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new UsageError(`Patch file not found: ${source}`);
    }
    throw new FileSystemError(filePath, 'could not read patch file', { cause: error });
  }
}
