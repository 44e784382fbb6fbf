import { describe, expect, it } from 'vitest';
import { Document, splitLines } from './document';

describe('splitLines', () => {
  it('splits on line feeds and keeps carriage returns', () => {
    expect(splitLines('a\r\nb\n')).toEqual(['a\r', 'b', '']);
  });

  it('yields a single empty line for empty text', () => {
    expect(splitLines('')).toEqual(['']);
  });
});

describe('Document', () => {
  it('drops line endings and the empty line after a final newline', () => {
    const doc = Document.fromString('a\r\nb\n');

    expect(doc.lines()).toEqual(['a', 'b']);
    expect(doc.lineCount()).toBe(2);
    expect(doc.line(1)).toBe('b');
    expect(doc.toString()).toBe('a\r\nb\n');
  });

  it('keeps a last line without terminator', () => {
    expect(Document.fromString('a\nb').lines()).toEqual(['a', 'b']);
  });

  it('keeps blank lines before the final newline', () => {
    expect(Document.fromString('a\n\n').lines()).toEqual(['a', '']);
  });

  it('has no lines when empty', () => {
    const doc = Document.fromString('');

    expect(doc.isEmpty()).toBe(true);
    expect(doc.lineCount()).toBe(0);
    expect(doc.lines()).toEqual([]);
  });

  it('returns undefined for lines out of range', () => {
    const doc = Document.fromString('only\n');

    expect(doc.line(1)).toBeUndefined();
    expect(doc.line(-1)).toBeUndefined();
  });

  it('hands out copies of its lines', () => {
    const doc = Document.fromString('a\nb\n');
    doc.lines().push('c');
    expect(doc.lineCount()).toBe(2);
  });
});
