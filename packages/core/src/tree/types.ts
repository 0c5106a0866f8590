export interface FileStat {
  /** Full `st_mode`, file type bits included */
  mode: number;
}

/**
 * A directory of files addressed by forward-slash paths relative to `root`.
 */
export interface FileTree {
  readonly root: string;

  /** File bytes, or undefined when no regular file exists at `path` */
  read(path: string): Promise<Buffer | undefined>;
  stat(path: string): Promise<FileStat | undefined>;
  /** Creates or replaces a file; without `mode` an existing file keeps its permissions */
  write(path: string, content: Buffer, mode?: number): Promise<void>;
  remove(path: string): Promise<void>;
  chmod(path: string, mode: number): Promise<void>;
  /** Why `path` must not be touched, such as a link out of the tree; undefined when it may */
  unsafeReason(path: string): Promise<string | undefined>;
}

/**
 * A pending modification of a tree.
 */
export type TreeChange =
  | { kind: 'write'; path: string; content: Buffer; mode?: number }
  | { kind: 'remove'; path: string }
  | { kind: 'chmod'; path: string; mode: number };

/**
 * Replays `changes` onto `tree`, in order.
 */
export async function applyChanges(tree: FileTree, changes: readonly TreeChange[]): Promise<void> {
  for (const change of changes) {
    switch (change.kind) {
      case 'write':
        await tree.write(change.path, change.content, change.mode);
        break;
      case 'remove':
        await tree.remove(change.path);
        break;
      case 'chmod':
        await tree.chmod(change.path, change.mode);
        break;
    }
  }
}
