import { diffChars } from 'diff';
import type {
  DiffHunk,
  DiffModel,
  DiffOptions,
  DiffRow,
  DiffRowKind,
  DiffSegment,
  DiffSegmentKind,
  DiffStats,
  SideLine,
} from '../types';
import { logEvent } from '../logger';
import { resolveDiffOptions } from '../options';
import { Document } from './document';
import { diffSequences, groupOps, type DiffOp } from './sequence';

interface JsDiffChange {
  value: string;
  added?: boolean;
  removed?: boolean;
}

interface SideRange {
  start: number;
  len: number;
}

const WHITESPACE = /\p{White_Space}/gu;

/** The matching key of a line with whitespace ignored. */
export function normalizeLineForDiff(line: string): string {
  return line.replace(WHITESPACE, '');
}

function matchingKeys(lines: string[], ignoreWhitespace: boolean): string[] {
  return ignoreWhitespace ? lines.map(normalizeLineForDiff) : lines;
}

function lineAt(lines: string[], index: number): string | undefined {
  return index >= 0 && index < lines.length ? lines[index] : undefined;
}

function sideLine(lineIndex: number, text: string, kind: DiffSegmentKind): SideLine {
  return { lineIndex, text, segments: [{ kind, text }] };
}

function pushSegment(segments: DiffSegment[], kind: DiffSegmentKind, text: string): void {
  if (text.length === 0) return;

  const last = segments[segments.length - 1];
  if (last && last.kind === kind) {
    last.text += text;
    return;
  }
  segments.push({ kind, text });
}

// ── Intraline segments ───────────────────────────────────────────

export function intralineSegments(oldText: string, newText: string): { oldSegments: DiffSegment[]; newSegments: DiffSegment[] } {
  const oldSegments: DiffSegment[] = [];
  const newSegments: DiffSegment[] = [];
  const changes: JsDiffChange[] = diffChars(oldText, newText);

  for (const change of changes) {
    if (change.added) {
      pushSegment(newSegments, 'added', change.value);
    } else if (change.removed) {
      pushSegment(oldSegments, 'removed', change.value);
    } else {
      pushSegment(oldSegments, 'unchanged', change.value);
      pushSegment(newSegments, 'unchanged', change.value);
    }
  }

  if (oldSegments.length === 0) oldSegments.push({ kind: 'removed', text: oldText });
  if (newSegments.length === 0) newSegments.push({ kind: 'added', text: newText });

  return { oldSegments, newSegments };
}

// ── Rows ─────────────────────────────────────────────────────────

function rowsForReplaceByIndex(
  oldStart: number,
  oldLen: number,
  newStart: number,
  newLen: number,
  oldLines: string[],
  newLines: string[],
): DiffRow[] {
  const rows: DiffRow[] = [];
  const rowCount = Math.max(oldLen, newLen);

  for (let offset = 0; offset < rowCount; offset++) {
    const oldIndex = oldStart + offset;
    const newIndex = newStart + offset;
    const oldText = offset < oldLen ? lineAt(oldLines, oldIndex) : undefined;
    const newText = offset < newLen ? lineAt(newLines, newIndex) : undefined;

    if (oldText !== undefined && newText !== undefined) {
      const { oldSegments, newSegments } = intralineSegments(oldText, newText);
      rows.push({
        old: { lineIndex: oldIndex, text: oldText, segments: oldSegments },
        new: { lineIndex: newIndex, text: newText, segments: newSegments },
      });
    } else if (oldText !== undefined) {
      rows.push({ old: sideLine(oldIndex, oldText, 'removed'), new: null });
    } else if (newText !== undefined) {
      rows.push({ old: null, new: sideLine(newIndex, newText, 'added') });
    }
  }

  return rows;
}

/**
 * Rows for one op whose ranges are relative to the given offsets. A replace
 * here is always aligned by index.
 */
function rowsForOp(op: DiffOp, oldLines: string[], newLines: string[], oldOffset: number, newOffset: number): DiffRow[] {
  const oldStart = oldOffset + op.oldStart;
  const newStart = newOffset + op.newStart;
  const rows: DiffRow[] = [];

  switch (op.tag) {
    case 'equal':
      for (let i = 0; i < op.oldLen; i++) {
        const oldText = lineAt(oldLines, oldStart + i);
        const newText = lineAt(newLines, newStart + i);
        if (oldText === undefined || newText === undefined) continue;
        rows.push({
          old: sideLine(oldStart + i, oldText, 'unchanged'),
          new: sideLine(newStart + i, newText, 'unchanged'),
        });
      }
      return rows;
    case 'delete':
      for (let i = 0; i < op.oldLen; i++) {
        const oldText = lineAt(oldLines, oldStart + i);
        if (oldText === undefined) continue;
        rows.push({ old: sideLine(oldStart + i, oldText, 'removed'), new: null });
      }
      return rows;
    case 'insert':
      for (let i = 0; i < op.newLen; i++) {
        const newText = lineAt(newLines, newStart + i);
        if (newText === undefined) continue;
        rows.push({ old: null, new: sideLine(newStart + i, newText, 'added') });
      }
      return rows;
    case 'replace':
      return rowsForReplaceByIndex(oldStart, op.oldLen, newStart, op.newLen, oldLines, newLines);
  }
}

/**
 * Re-diffs a replaced block. A block that is still one whole replace on both
 * sides of more than one line is a reflow and gets paired by index.
 */
function rowsForReplace(op: DiffOp, oldLines: string[], newLines: string[], ignoreWhitespace: boolean): DiffRow[] {
  const oldBlock = oldLines.slice(op.oldStart, op.oldStart + op.oldLen);
  const newBlock = newLines.slice(op.newStart, op.newStart + op.newLen);
  if (oldBlock.length === 0 || newBlock.length === 0) {
    return rowsForReplaceByIndex(op.oldStart, op.oldLen, op.newStart, op.newLen, oldLines, newLines);
  }

  const innerOps = diffSequences(matchingKeys(oldBlock, ignoreWhitespace), matchingKeys(newBlock, ignoreWhitespace));

  if (innerOps.length === 1) {
    const only = innerOps[0];
    const isReflow = only.tag === 'replace'
      && only.oldLen === oldBlock.length
      && only.newLen === newBlock.length
      && oldBlock.length > 1
      && newBlock.length > 1;
    if (isReflow) {
      return rowsForReplaceByIndex(op.oldStart, op.oldLen, op.newStart, op.newLen, oldLines, newLines);
    }
  }

  return innerOps.flatMap(inner => rowsForOp(inner, oldLines, newLines, op.oldStart, op.newStart));
}

function sideRange(rows: DiffRow[], side: 'old' | 'new'): SideRange {
  let min: number | null = null;
  let max: number | null = null;

  for (const row of rows) {
    const line = row[side];
    if (!line) continue;
    min = min === null ? line.lineIndex : Math.min(min, line.lineIndex);
    max = max === null ? line.lineIndex : Math.max(max, line.lineIndex);
  }

  if (min === null || max === null) return { start: 0, len: 0 };
  return { start: min, len: max - min + 1 };
}

// ── Public API ───────────────────────────────────────────────────

export function diffDocuments(oldDoc: Document, newDoc: Document, options?: Partial<DiffOptions>): DiffModel {
  const { contextLines, ignoreWhitespace } = resolveDiffOptions(options);
  const oldLines = oldDoc.lines();
  const newLines = newDoc.lines();

  const ops = diffSequences(matchingKeys(oldLines, ignoreWhitespace), matchingKeys(newLines, ignoreWhitespace));
  const hunks: DiffHunk[] = [];

  for (const group of groupOps(ops, contextLines)) {
    const rows = group.flatMap(op =>
      op.tag === 'replace'
        ? rowsForReplace(op, oldLines, newLines, ignoreWhitespace)
        : rowsForOp(op, oldLines, newLines, 0, 0),
    );
    if (rows.length === 0) continue;

    const oldRange = sideRange(rows, 'old');
    const newRange = sideRange(rows, 'new');
    hunks.push({
      oldStart: oldRange.start,
      oldLen: oldRange.len,
      newStart: newRange.start,
      newLen: newRange.len,
      rows,
    });
  }

  logEvent('debug', 'Diff computed', {
    oldLines: oldLines.length,
    newLines: newLines.length,
    hunks: hunks.length,
  });

  return { hunks };
}

export function diffTexts(
  oldText: string,
  newText: string,
  options?: Partial<DiffOptions>,
): { model: DiffModel; oldLines: string[]; newLines: string[] } {
  const oldDoc = Document.fromString(oldText);
  const newDoc = Document.fromString(newText);
  return {
    model: diffDocuments(oldDoc, newDoc, options),
    oldLines: oldDoc.lines(),
    newLines: newDoc.lines(),
  };
}

function isWholeLineUnchanged(line: SideLine): boolean {
  return line.segments.length === 1 && line.segments[0].kind === 'unchanged';
}

export function rowKind(row: DiffRow): DiffRowKind {
  if (row.old && row.new) {
    return isWholeLineUnchanged(row.old) && isWholeLineUnchanged(row.new) ? 'unchanged' : 'modified';
  }
  if (row.old) return 'removed';
  if (row.new) return 'added';
  return 'unchanged';
}

/** Display header with 1-based starts. */
export function formatHunkHeader(hunk: DiffHunk): string {
  return `@@ -${hunk.oldStart + 1},${hunk.oldLen} +${hunk.newStart + 1},${hunk.newLen} @@`;
}

export function diffStats(model: DiffModel): DiffStats {
  let additions = 0;
  let deletions = 0;
  let modified = 0;

  for (const hunk of model.hunks) {
    for (const row of hunk.rows) {
      switch (rowKind(row)) {
        case 'added':
          additions++;
          break;
        case 'removed':
          deletions++;
          break;
        case 'modified':
          additions++;
          deletions++;
          modified++;
          break;
        case 'unchanged':
          break;
      }
    }
  }

  return { additions, deletions, modified };
}
