import {
  resolveEngineConfig,
  type DryRunReport,
  type EngineConfig,
  type PatchDocument,
} from '@hunkwise/shared';
import { invertPatch } from '../parse/printer';
import { FsTree } from '../tree/fs-tree';
import { OverlayTree } from '../tree/overlay-tree';
import { createContext, evaluateDocument, type EngineRunOptions } from './evaluate';

/**
 * Answers "would this patch apply?" without touching the tree.
 *
 * Files are read from disk through an in-memory overlay; results are
 * discarded and no scratch copies are made.
 */
export class DryRunSimulator {
  async simulate(
    document: PatchDocument,
    treeRoot: string,
    options: EngineRunOptions = {},
  ): Promise<DryRunReport> {
    const config = resolveEngineConfig(options.config);
    const context = createContext(options, config);
    const overlay = new OverlayTree(new FsTree(treeRoot, { signal: options.signal }));

    await context.logger.debug(`Simulating ${document.files.length} file(s) against ${treeRoot}`);
    return evaluateDocument(orient(document, config), overlay, context);
  }
}

/**
 * The document to match: inverted when the configuration asks for a reverse application.
 */
export function orient(document: PatchDocument, config: EngineConfig): PatchDocument {
  return config.reverse ? invertPatch(document) : document;
}
