import { promises as fs } from 'fs';
import path from 'path';
import { move } from 'fs-extra';
import {
  FileSystemError,
  resolveEngineConfig,
  withStagingDir,
  type ApplyReport,
  type DryRunReport,
  type PatchDocument,
} from '@hunkwise/shared';
import { FsTree } from '../tree/fs-tree';
import { OverlayTree } from '../tree/overlay-tree';
import { applyChanges, type TreeChange } from '../tree/types';
import { createContext, evaluateDocument, type EngineRunOptions } from './evaluate';
import { DryRunSimulator, orient } from './simulator';

export interface PatchApplierOptions extends EngineRunOptions {
  /** Report what would happen without writing anything */
  dryRun?: boolean;
}

export class PatchApplier {
  constructor(private readonly simulator: DryRunSimulator = new DryRunSimulator()) {}

  /**
   * Applies a parsed patch to the tree at `treeRoot`.
   *
   * Each file is all-or-nothing. By default every file that applies is written
   * as soon as it is computed, even if a later file fails. With `atomic` set,
   * nothing is written unless every file applies.
   *
   * @param document The parsed patch.
   * @param treeRoot Directory the patch paths are relative to.
   * @param options Configuration, logger and cancellation for this call.
   */
  async apply(
    document: PatchDocument,
    treeRoot: string,
    options: PatchApplierOptions = {},
  ): Promise<ApplyReport> {
    if (options.dryRun) {
      const report = await this.simulator.simulate(document, treeRoot, options);
      return { ...report, committed: false, filesChanged: [] };
    }

    const config = resolveEngineConfig(options.config);
    const context = createContext(options, config);
    const tree = new FsTree(treeRoot, { signal: options.signal });
    const overlay = new OverlayTree(tree);
    const oriented = orient(document, config);

    let filesChanged: string[];
    let report: DryRunReport;
    if (config.atomic) {
      report = await evaluateDocument(oriented, overlay, context);
      if (!report.ok) {
        await context.logger.debug('Nothing written: at least one file does not apply');
        return { ...report, committed: false, filesChanged: [] };
      }
      options.signal?.throwIfAborted();
      const changes = overlay.changes();
      await this.commitAtomically(tree, changes);
      filesChanged = changes.map((c) => c.path);
    } else {
      const changed = new Set<string>();
      report = await evaluateDocument(oriented, overlay, context, async (_file, changes) => {
        await applyChanges(tree, changes);
        for (const change of changes) changed.add(change.path);
      });
      filesChanged = [...changed];
    }

    if (filesChanged.length > 0) {
      await context.logger.trace(
        {
          schemaVersion: 1,
          timestamp: new Date().toISOString(),
          runId: context.runId,
          type: 'FilesCommitted',
          payload: { files: filesChanged, atomic: config.atomic },
        },
        `Committed ${filesChanged.length} file(s)`,
      );
    }
    return { ...report, committed: filesChanged.length > 0, filesChanged };
  }

  /**
   * Writes new contents into a staging directory inside the tree, then moves
   * them into place. The staging directory is removed whatever happens.
   */
  private async commitAtomically(tree: FsTree, changes: readonly TreeChange[]): Promise<void> {
    await withStagingDir(tree.root, async (staging) => {
      const staged: Array<{ from: string; change: TreeChange }> = [];
      for (const [i, change] of changes.entries()) {
        if (change.kind !== 'write') continue;
        const from = path.join(staging, String(i));
        const mode = change.mode ?? (await tree.stat(change.path))?.mode;
        try {
          await fs.writeFile(from, change.content);
          if (mode !== undefined) await fs.chmod(from, mode & 0o7777);
        } catch (error) {
          throw new FileSystemError(change.path, 'could not stage file', { cause: error });
        }
        staged.push({ from, change });
      }

      for (const change of changes) {
        if (change.kind === 'remove') await tree.remove(change.path);
      }
      for (const { from, change } of staged) {
        const target = await tree.resolve(change.path);
        try {
          await move(from, target, { overwrite: true });
        } catch (error) {
          throw new FileSystemError(change.path, 'could not move staged file into place', {
            cause: error,
          });
        }
      }
      for (const change of changes) {
        if (change.kind === 'chmod') await tree.chmod(change.path, change.mode);
      }
    });
  }
}
