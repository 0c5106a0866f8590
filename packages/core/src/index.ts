export const name = '@hunkwise/core';

export { tokenize, splitPatchLines } from './parse/tokenizer';
export type { TokenizeResult } from './parse/tokenizer';
export type { Token, TokenKind } from './parse/tokens';
export { parsePatch, parsePatchOrThrow, buildDocument, displayPath, DEV_NULL } from './parse/builder';
export { formatPatch, invertPatch } from './parse/printer';
export { quoteGitPath, unquoteGitPath } from './parse/quoting';

export { applyHunks, applyHunksToLines } from './apply/hunks';
export type { ContentApplyResult, LinesApplyResult } from './apply/hunks';
export { decodeLines, encodeLines } from './apply/text';
export type { TextLine } from './apply/text';
export { findHunk } from './apply/matcher';
export type { HunkMatch } from './apply/matcher';
export { stripComponents, unsafePathReason, resolveCandidates } from './apply/paths';
export type { PathCandidates, PathCandidatesResult } from './apply/paths';
export { planFilePatch } from './apply/file';
export type { FilePlan, FilePlanContext } from './apply/file';
export type { EngineRunOptions } from './apply/evaluate';
export { DryRunSimulator } from './apply/simulator';
export { PatchApplier } from './apply/applier';
export type { PatchApplierOptions } from './apply/applier';

export { FsTree } from './tree/fs-tree';
export type { FsTreeOptions } from './tree/fs-tree';
export { OverlayTree } from './tree/overlay-tree';
export { applyChanges } from './tree/types';
export type { FileStat, FileTree, TreeChange } from './tree/types';

export {
  checkFormat,
  checkApplies,
  diagnoseFormat,
  diagnoseApplies,
  diagnoseAppliesText,
  logParsed,
} from './validate/facade';
export type { FormatReport, ApplyCheckReport } from './validate/facade';
export { withDeadline } from './validate/deadline';
export type { DeadlineOptions } from './validate/deadline';

export { ConfigLoader } from './config/loader';
export type { ConfigOptions } from './config/loader';
