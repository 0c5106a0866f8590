import type { FileStat, FileTree, TreeChange } from './types';

const DEFAULT_FILE_MODE = 0o100644;

type OverlayEntry =
  | { kind: 'write'; content: Buffer; mode?: number }
  | { kind: 'remove' }
  | { kind: 'chmod'; mode: number };

/**
 * Holds modifications in memory on top of another tree.
 * Reads see the pending state; the base tree is never written.
 */
export class OverlayTree implements FileTree {
  private readonly entries = new Map<string, OverlayEntry>();

  constructor(private readonly base: FileTree) {}

  get root(): string {
    return this.base.root;
  }

  async read(path: string): Promise<Buffer | undefined> {
    const entry = this.entries.get(path);
    if (!entry || entry.kind === 'chmod') return this.base.read(path);
    return entry.kind === 'write' ? entry.content : undefined;
  }

  async stat(path: string): Promise<FileStat | undefined> {
    const entry = this.entries.get(path);
    if (!entry) return this.base.stat(path);
    if (entry.kind === 'remove') return undefined;
    if (entry.kind === 'chmod') {
      const stat = await this.base.stat(path);
      return stat ? { mode: entry.mode } : undefined;
    }
    if (entry.mode !== undefined) return { mode: entry.mode };
    return (await this.base.stat(path)) ?? { mode: DEFAULT_FILE_MODE };
  }

  async write(path: string, content: Buffer, mode?: number): Promise<void> {
    const previous = this.entries.get(path);
    const keep = mode ?? (previous && previous.kind !== 'remove' ? previous.mode : undefined);
    this.entries.set(
      path,
      keep === undefined ? { kind: 'write', content } : { kind: 'write', content, mode: keep },
    );
  }

  async remove(path: string): Promise<void> {
    this.entries.set(path, { kind: 'remove' });
  }

  async chmod(path: string, mode: number): Promise<void> {
    const previous = this.entries.get(path);
    if (previous?.kind === 'write') {
      this.entries.set(path, { ...previous, mode });
    } else {
      this.entries.set(path, { kind: 'chmod', mode });
    }
  }

  unsafeReason(path: string): Promise<string | undefined> {
    return this.base.unsafeReason(path);
  }

  /** Pending operations, one per touched path */
  changes(): TreeChange[] {
    return [...this.entries].map(([path, entry]): TreeChange => {
      switch (entry.kind) {
        case 'write':
          return entry.mode === undefined
            ? { kind: 'write', path, content: entry.content }
            : { kind: 'write', path, content: entry.content, mode: entry.mode };
        case 'remove':
          return { kind: 'remove', path };
        case 'chmod':
          return { kind: 'chmod', path, mode: entry.mode };
      }
    });
  }
}
