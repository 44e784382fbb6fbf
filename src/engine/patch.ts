import type { DiffHunk, DiffModel, DiffRow, DiffRowRef, PatchUnselectedContext } from '../types';
import { rowKind } from './diff';

function startNumber(start: number, len: number): number {
  return len === 0 ? start : start + 1;
}

function fileHeader(path: string): string {
  return `--- a/${path}\n+++ b/${path}\n`;
}

function rangeHeader(oldStart: number, oldLen: number, newStart: number, newLen: number): string {
  return `@@ -${startNumber(oldStart, oldLen)},${oldLen} +${startNumber(newStart, newLen)},${newLen} @@\n`;
}

function contextText(row: DiffRow, prefer: PatchUnselectedContext): string {
  const first = prefer === 'old' ? row.old : row.new;
  const second = prefer === 'old' ? row.new : row.old;
  return first?.text ?? second?.text ?? '';
}

function hunkSection(hunk: DiffHunk): string {
  let out = rangeHeader(hunk.oldStart, hunk.oldLen, hunk.newStart, hunk.newLen);

  for (const row of hunk.rows) {
    switch (rowKind(row)) {
      case 'unchanged':
        out += ` ${contextText(row, 'old')}\n`;
        break;
      case 'removed':
        out += `-${row.old?.text ?? ''}\n`;
        break;
      case 'added':
        out += `+${row.new?.text ?? ''}\n`;
        break;
      case 'modified':
        if (row.old) out += `-${row.old.text}\n`;
        if (row.new) out += `+${row.new.text}\n`;
        break;
    }
  }

  return out;
}

export function unifiedPatchForHunk(path: string, hunk: DiffHunk): string {
  return fileHeader(path) + hunkSection(hunk);
}

export function unifiedPatch(path: string, model: DiffModel): string {
  if (model.hunks.length === 0) return '';
  return fileHeader(path) + model.hunks.map(hunkSection).join('');
}

function rowRefKey(ref: DiffRowRef): string {
  return `${ref.hunkIndex}:${ref.rowIndex}`;
}

function selectionSection(
  hunk: DiffHunk,
  hunkIndex: number,
  selected: ReadonlySet<string>,
  unselectedContext: PatchUnselectedContext,
): string | null {
  let hasSelected = false;
  let hasChange = false;
  let oldLen = 0;
  let newLen = 0;
  const lines: string[] = [];

  const pushContext = (text: string) => {
    lines.push(` ${text}`);
    oldLen++;
    newLen++;
  };

  for (const [rowIndex, row] of hunk.rows.entries()) {
    const isSelected = selected.has(rowRefKey({ hunkIndex, rowIndex }));
    if (isSelected) hasSelected = true;

    switch (rowKind(row)) {
      case 'unchanged':
        pushContext(contextText(row, 'old'));
        break;
      case 'added':
        if (isSelected) {
          lines.push(`+${row.new?.text ?? ''}`);
          newLen++;
          hasChange = true;
        } else if (unselectedContext === 'new') {
          pushContext(row.new?.text ?? '');
        }
        break;
      case 'removed':
        if (isSelected) {
          lines.push(`-${row.old?.text ?? ''}`);
          oldLen++;
          hasChange = true;
        } else if (unselectedContext === 'old') {
          pushContext(row.old?.text ?? '');
        }
        break;
      case 'modified':
        if (!isSelected) {
          pushContext(contextText(row, unselectedContext));
          break;
        }
        if (row.old) {
          lines.push(`-${row.old.text}`);
          oldLen++;
          hasChange = true;
        }
        if (row.new) {
          lines.push(`+${row.new.text}`);
          newLen++;
          hasChange = true;
        }
        break;
    }
  }

  if (!hasSelected || !hasChange) return null;

  return rangeHeader(hunk.oldStart, oldLen, hunk.newStart, newLen) + lines.map(line => `${line}\n`).join('');
}

/**
 * Patch limited to the selected rows, for staging part of a diff. Unselected
 * changes are kept as context from the `unselectedContext` side or dropped.
 */
export function unifiedPatchForSelection(
  path: string,
  model: DiffModel,
  selection: Iterable<DiffRowRef>,
  unselectedContext: PatchUnselectedContext,
): string | null {
  const selected = new Set<string>();
  for (const ref of selection) selected.add(rowRefKey(ref));
  if (selected.size === 0) return null;

  const sections: string[] = [];
  model.hunks.forEach((hunk, hunkIndex) => {
    const section = selectionSection(hunk, hunkIndex, selected, unselectedContext);
    if (section !== null) sections.push(section);
  });

  if (sections.length === 0) return null;
  return fileHeader(path) + sections.join('');
}
