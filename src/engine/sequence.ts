import { diffArrays } from 'diff';

export type DiffTag = 'equal' | 'delete' | 'insert' | 'replace';

/** A contiguous old range paired with a contiguous new range. */
export interface DiffOp {
  tag: DiffTag;
  oldStart: number;
  oldLen: number;
  newStart: number;
  newLen: number;
}

interface ArrayChange<T> {
  value: T[];
  added?: boolean;
  removed?: boolean;
}

function equalOp(oldStart: number, newStart: number, len: number): DiffOp {
  return { tag: 'equal', oldStart, oldLen: len, newStart, newLen: len };
}

/**
 * Diffs two key sequences into ops. Deletes and inserts between two equal
 * runs collapse into a single replace.
 */
export function diffSequences(oldKeys: string[], newKeys: string[]): DiffOp[] {
  const changes: ArrayChange<string>[] = diffArrays(oldKeys, newKeys);
  const ops: DiffOp[] = [];

  let oldIndex = 0;
  let newIndex = 0;
  let pendingOldStart = 0;
  let pendingNewStart = 0;
  let pendingOldLen = 0;
  let pendingNewLen = 0;

  const flushPending = () => {
    if (pendingOldLen > 0 && pendingNewLen > 0) {
      ops.push({
        tag: 'replace',
        oldStart: pendingOldStart,
        oldLen: pendingOldLen,
        newStart: pendingNewStart,
        newLen: pendingNewLen,
      });
    } else if (pendingOldLen > 0) {
      ops.push({ tag: 'delete', oldStart: pendingOldStart, oldLen: pendingOldLen, newStart: pendingNewStart, newLen: 0 });
    } else if (pendingNewLen > 0) {
      ops.push({ tag: 'insert', oldStart: pendingOldStart, oldLen: 0, newStart: pendingNewStart, newLen: pendingNewLen });
    }
    pendingOldLen = 0;
    pendingNewLen = 0;
  };

  const openPending = () => {
    if (pendingOldLen > 0 || pendingNewLen > 0) return;
    pendingOldStart = oldIndex;
    pendingNewStart = newIndex;
  };

  for (const change of changes) {
    const len = change.value.length;
    if (len === 0) continue;

    if (change.removed) {
      openPending();
      pendingOldLen += len;
      oldIndex += len;
    } else if (change.added) {
      openPending();
      pendingNewLen += len;
      newIndex += len;
    } else {
      flushPending();
      ops.push(equalOp(oldIndex, newIndex, len));
      oldIndex += len;
      newIndex += len;
    }
  }

  flushPending();
  return ops;
}

/**
 * Groups ops into hunks with `contextLines` of surrounding equal lines. An
 * equal run longer than twice the context splits the hunk in two.
 */
export function groupOps(ops: DiffOp[], contextLines: number): DiffOp[][] {
  if (ops.length === 0) return [];

  const trimmed = ops.map(op => ({ ...op }));

  const first = trimmed[0];
  if (first.tag === 'equal') {
    const offset = Math.max(0, first.oldLen - contextLines);
    first.oldStart += offset;
    first.newStart += offset;
    first.oldLen -= offset;
    first.newLen -= offset;
  }

  const last = trimmed[trimmed.length - 1];
  if (last.tag === 'equal') {
    const excess = Math.max(0, last.oldLen - contextLines);
    last.oldLen -= excess;
    last.newLen -= excess;
  }

  const groups: DiffOp[][] = [];
  let pending: DiffOp[] = [];

  for (const op of trimmed) {
    if (op.tag === 'equal' && op.oldLen > contextLines * 2) {
      pending.push(equalOp(op.oldStart, op.newStart, contextLines));
      groups.push(pending);
      const offset = op.oldLen - contextLines;
      pending = [equalOp(op.oldStart + offset, op.newStart + offset, contextLines)];
      continue;
    }
    pending.push(op);
  }

  const onlyContext = pending.length === 0 || (pending.length === 1 && pending[0].tag === 'equal');
  if (!onlyContext) groups.push(pending);

  return groups;
}
