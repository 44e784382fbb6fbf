import type {
  ConflictRegion,
  ConflictRow,
  DiffModel,
  DiffRowKind,
  DiffSegment,
  DiffViewMode,
  DisplayRow,
} from '../types';
import { Document } from './document';
import { formatHunkHeader, rowKind } from './diff';

export const NO_CONFLICTS_MESSAGE = 'No conflict markers found (<<<<<<< / ======= / >>>>>>>)';

// ── Diff display rows ────────────────────────────────────────────

/**
 * Flattens a model into renderable rows: a fold for every unchanged stretch
 * between hunks, a header per hunk, then its code rows. Inline mode splits a
 * modified row into its removed and added halves.
 */
export function buildDisplayRows(
  model: DiffModel,
  oldLineCount: number,
  newLineCount: number,
  mode: DiffViewMode = 'split',
): DisplayRow[] {
  const rows: DisplayRow[] = [];
  let oldPos = 0;
  let newPos = 0;

  model.hunks.forEach((hunk, hunkIndex) => {
    const gap = Math.min(Math.max(0, hunk.oldStart - oldPos), Math.max(0, hunk.newStart - newPos));
    if (gap > 0) {
      rows.push({ type: 'fold', oldStart: oldPos, newStart: newPos, len: gap });
    }

    rows.push({ type: 'hunk-header', hunkIndex, text: formatHunkHeader(hunk) });

    hunk.rows.forEach((row, rowIndex) => {
      const source = { hunkIndex, rowIndex };
      const kind = rowKind(row);
      const oldLineNumber = row.old ? row.old.lineIndex + 1 : null;
      const newLineNumber = row.new ? row.new.lineIndex + 1 : null;
      const oldSegments = row.old?.segments ?? [];
      const newSegments = row.new?.segments ?? [];

      if (mode === 'split' || kind === 'unchanged') {
        rows.push({ type: 'code', source, kind, oldLineNumber, newLineNumber, oldSegments, newSegments });
        return;
      }

      if (kind !== 'added') {
        rows.push({
          type: 'code',
          source,
          kind: 'removed',
          oldLineNumber,
          newLineNumber: null,
          oldSegments,
          newSegments: [],
        });
      }
      if (kind !== 'removed') {
        rows.push({
          type: 'code',
          source,
          kind: 'added',
          oldLineNumber: null,
          newLineNumber,
          oldSegments: [],
          newSegments,
        });
      }
    });

    oldPos = hunk.oldStart + hunk.oldLen;
    newPos = hunk.newStart + hunk.newLen;
  });

  const tail = Math.min(Math.max(0, oldLineCount - oldPos), Math.max(0, newLineCount - newPos));
  if (tail > 0) {
    rows.push({ type: 'fold', oldStart: oldPos, newStart: newPos, len: tail });
  }

  return rows;
}

// ── Conflict rows ────────────────────────────────────────────────

function unchangedSegments(line: string | undefined): DiffSegment[] {
  return line === undefined ? [] : [{ kind: 'unchanged', text: line }];
}

function conflictLineKind(ours: string | undefined, theirs: string | undefined): DiffRowKind {
  if (ours === undefined && theirs === undefined) return 'unchanged';
  if (ours === undefined) return 'added';
  if (theirs === undefined) return 'removed';
  return ours === theirs ? 'unchanged' : 'modified';
}

/**
 * Three-pane rows for each conflict: a block header, then ours, base and
 * theirs lines aligned by index.
 */
export function buildConflictRows(text: string, regions: ConflictRegion[]): ConflictRow[] {
  if (regions.length === 0) {
    return [{ type: 'empty', text: NO_CONFLICTS_MESSAGE }];
  }

  const rows: ConflictRow[] = [];

  regions.forEach((region, conflictIndex) => {
    rows.push({
      type: 'block-header',
      conflictIndex,
      oursBranchName: region.oursBranchName,
      theirsBranchName: region.theirsBranchName,
      hasBase: region.base !== null,
    });

    const ours = Document.fromString(text.slice(region.ours.start, region.ours.end));
    const base = Document.fromString(region.base ? text.slice(region.base.start, region.base.end) : '');
    const theirs = Document.fromString(text.slice(region.theirs.start, region.theirs.end));
    const lineCount = Math.max(ours.lineCount(), base.lineCount(), theirs.lineCount(), 1);

    for (let i = 0; i < lineCount; i++) {
      const oursLine = ours.line(i);
      const theirsLine = theirs.line(i);
      rows.push({
        type: 'code',
        conflictIndex,
        kind: conflictLineKind(oursLine, theirsLine),
        oursSegments: unchangedSegments(oursLine),
        baseSegments: unchangedSegments(base.line(i)),
        theirsSegments: unchangedSegments(theirsLine),
      });
    }
  });

  return rows;
}
