import { describe, expect, it } from 'vitest';
import { diffSequences, groupOps, type DiffOp } from './sequence';

const equal = (oldStart: number, newStart: number, len: number): DiffOp => ({
  tag: 'equal',
  oldStart,
  oldLen: len,
  newStart,
  newLen: len,
});

describe('diffSequences', () => {
  it('collapses a delete and insert into a replace', () => {
    expect(diffSequences(['a', 'b', 'c'], ['a', 'x', 'c'])).toEqual([
      equal(0, 0, 1),
      { tag: 'replace', oldStart: 1, oldLen: 1, newStart: 1, newLen: 1 },
      equal(2, 2, 1),
    ]);
  });

  it('reports pure inserts and deletes', () => {
    expect(diffSequences(['a', 'b'], ['a', 'b', 'c'])).toEqual([
      equal(0, 0, 2),
      { tag: 'insert', oldStart: 2, oldLen: 0, newStart: 2, newLen: 1 },
    ]);
    expect(diffSequences(['a', 'b'], ['b'])).toEqual([
      { tag: 'delete', oldStart: 0, oldLen: 1, newStart: 0, newLen: 0 },
      equal(1, 0, 1),
    ]);
  });

  it('treats empty keys as lines', () => {
    expect(diffSequences(['', 'x'], ['', 'y'])).toEqual([
      equal(0, 0, 1),
      { tag: 'replace', oldStart: 1, oldLen: 1, newStart: 1, newLen: 1 },
    ]);
  });

  it('returns no ops for two empty sequences', () => {
    expect(diffSequences([], [])).toEqual([]);
  });
});

describe('groupOps', () => {
  it('drops a lone equal run', () => {
    expect(groupOps([equal(0, 0, 10)], 3)).toEqual([]);
  });

  it('trims leading and trailing context', () => {
    const replace: DiffOp = { tag: 'replace', oldStart: 1, oldLen: 2, newStart: 1, newLen: 2 };

    expect(groupOps([equal(0, 0, 1), replace, equal(3, 3, 21)], 3)).toEqual([
      [equal(0, 0, 1), replace, equal(3, 3, 3)],
    ]);
  });

  it('splits groups on long equal runs', () => {
    const del: DiffOp = { tag: 'delete', oldStart: 2, oldLen: 1, newStart: 2, newLen: 0 };
    const ins: DiffOp = { tag: 'insert', oldStart: 13, oldLen: 0, newStart: 12, newLen: 1 };

    expect(groupOps([equal(0, 0, 2), del, equal(3, 2, 10), ins, equal(13, 13, 2)], 2)).toEqual([
      [equal(0, 0, 2), del, equal(3, 2, 2)],
      [equal(11, 10, 2), ins, equal(13, 13, 2)],
    ]);
  });

  it('keeps no context lines when asked for none', () => {
    const replace: DiffOp = { tag: 'replace', oldStart: 5, oldLen: 1, newStart: 5, newLen: 1 };

    expect(groupOps([equal(0, 0, 5), replace, equal(6, 6, 5)], 0)).toEqual([
      [equal(5, 5, 0), replace, equal(6, 6, 0)],
    ]);
  });

  it('does not modify the ops it is given', () => {
    const ops: DiffOp[] = [equal(0, 0, 10), { tag: 'delete', oldStart: 10, oldLen: 1, newStart: 10, newLen: 0 }];
    groupOps(ops, 3);
    expect(ops[0]).toEqual(equal(0, 0, 10));
  });
});
