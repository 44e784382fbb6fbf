import { describe, expect, it } from 'vitest';
import { DEMO_CONFLICT_TEXT, DEMO_NEW_TEXT, DEMO_OLD_TEXT } from '../demo';
import { parseConflicts } from './conflict';
import { diffTexts } from './diff';
import { NO_CONFLICTS_MESSAGE, buildConflictRows, buildDisplayRows } from './rows';

function demoModel() {
  return diffTexts(DEMO_OLD_TEXT, DEMO_NEW_TEXT);
}

describe('buildDisplayRows', () => {
  it('folds the unchanged lines between hunks', () => {
    const { model, oldLines, newLines } = demoModel();
    const rows = buildDisplayRows(model, oldLines.length, newLines.length, 'split');

    expect(rows.map(row => row.type)).toEqual([
      'hunk-header',
      'code', 'code', 'code', 'code', 'code', 'code',
      'fold',
      'hunk-header',
      'code', 'code', 'code', 'code', 'code',
    ]);
    expect(rows[0]).toEqual({ type: 'hunk-header', hunkIndex: 0, text: '@@ -1,6 +1,6 @@' });
    expect(rows[7]).toEqual({ type: 'fold', oldStart: 6, newStart: 6, len: 7 });
    expect(rows[8]).toEqual({ type: 'hunk-header', hunkIndex: 1, text: '@@ -14,4 +14,5 @@' });
    expect(rows[12]).toMatchObject({
      type: 'code',
      kind: 'added',
      source: { hunkIndex: 1, rowIndex: 3 },
      oldLineNumber: null,
      newLineNumber: 17,
      oldSegments: [],
    });
  });

  it('splits modified rows into removed and added rows inline', () => {
    const { model, oldLines, newLines } = demoModel();
    const rows = buildDisplayRows(model, oldLines.length, newLines.length, 'inline');

    expect(rows).toHaveLength(16);
    expect(rows[2]).toMatchObject({
      type: 'code',
      kind: 'removed',
      source: { hunkIndex: 0, rowIndex: 1 },
      oldLineNumber: 2,
      newLineNumber: null,
      newSegments: [],
    });
    expect(rows[3]).toMatchObject({
      type: 'code',
      kind: 'added',
      source: { hunkIndex: 0, rowIndex: 1 },
      oldLineNumber: null,
      newLineNumber: 2,
      oldSegments: [],
    });
  });

  it('folds the lines after the last hunk', () => {
    const oldText = Array.from({ length: 10 }, (_, i) => `l${i}\n`).join('');
    const newText = oldText.replace('l0\n', 'L0\n');
    const { model } = diffTexts(oldText, newText);

    const rows = buildDisplayRows(model, 10, 10);
    expect(rows).toHaveLength(6);
    expect(rows[5]).toEqual({ type: 'fold', oldStart: 4, newStart: 4, len: 6 });
  });

  it('folds a whole unchanged document', () => {
    expect(buildDisplayRows({ hunks: [] }, 3, 3)).toEqual([{ type: 'fold', oldStart: 0, newStart: 0, len: 3 }]);
    expect(buildDisplayRows({ hunks: [] }, 0, 0)).toEqual([]);
  });
});

describe('buildConflictRows', () => {
  it('reports when there are no conflicts', () => {
    expect(buildConflictRows('plain\n', [])).toEqual([{ type: 'empty', text: NO_CONFLICTS_MESSAGE }]);
  });

  it('aligns ours, base and theirs lines by index', () => {
    const rows = buildConflictRows(DEMO_CONFLICT_TEXT, parseConflicts(DEMO_CONFLICT_TEXT));

    expect(rows).toEqual([
      {
        type: 'block-header',
        conflictIndex: 0,
        oursBranchName: 'HEAD',
        theirsBranchName: 'feature/retry',
        hasBase: false,
      },
      {
        type: 'code',
        conflictIndex: 0,
        kind: 'modified',
        oursSegments: [{ kind: 'unchanged', text: '  retries: 3,' }],
        baseSegments: [],
        theirsSegments: [{ kind: 'unchanged', text: '  retries: 5,' }],
      },
      {
        type: 'block-header',
        conflictIndex: 1,
        oursBranchName: 'ours',
        theirsBranchName: 'theirs',
        hasBase: true,
      },
      {
        type: 'code',
        conflictIndex: 1,
        kind: 'modified',
        oursSegments: [{ kind: 'unchanged', text: '  backoff: "linear",' }],
        baseSegments: [{ kind: 'unchanged', text: '  backoff: "none",' }],
        theirsSegments: [{ kind: 'unchanged', text: '  backoff: "exponential",' }],
      },
      {
        type: 'code',
        conflictIndex: 1,
        kind: 'added',
        oursSegments: [],
        baseSegments: [],
        theirsSegments: [{ kind: 'unchanged', text: '  jitter: true,' }],
      },
    ]);
  });

  it('shows an empty ours side as added theirs lines', () => {
    const text = '<<<<<<< ours\n=======\ntheirs\n>>>>>>> ';
    const rows = buildConflictRows(text, parseConflicts(text));

    expect(rows).toHaveLength(2);
    expect(rows[1]).toEqual({
      type: 'code',
      conflictIndex: 0,
      kind: 'added',
      oursSegments: [],
      baseSegments: [],
      theirsSegments: [{ kind: 'unchanged', text: 'theirs' }],
    });
  });
});
