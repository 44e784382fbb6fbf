export type * from './types';
export { Document, splitLines } from './engine/document';
export { diffSequences, groupOps } from './engine/sequence';
export type { DiffOp, DiffTag } from './engine/sequence';
export {
  diffDocuments,
  diffTexts,
  diffStats,
  formatHunkHeader,
  intralineSegments,
  normalizeLineForDiff,
  rowKind,
} from './engine/diff';
export {
  DEFAULT_OURS_BRANCH,
  DEFAULT_THEIRS_BRANCH,
  conflictText,
  parseConflicts,
  resolveAllConflicts,
  resolveConflict,
} from './engine/conflict';
export { NO_CONFLICTS_MESSAGE, buildConflictRows, buildDisplayRows } from './engine/rows';
export { unifiedPatch, unifiedPatchForHunk, unifiedPatchForSelection } from './engine/patch';
export { DEFAULT_DIFF_OPTIONS, resolveDiffOptions } from './options';
export { logEvent, setLogSink } from './logger';
export type { LogLevel, LogSink } from './logger';
export { DEMO_CONFLICT_TEXT, DEMO_NEW_TEXT, DEMO_OLD_TEXT } from './demo';
