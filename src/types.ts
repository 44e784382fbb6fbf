// ── Core diff types ──────────────────────────────────────────────

export type DiffSegmentKind = 'unchanged' | 'added' | 'removed';

export type DiffRowKind = 'unchanged' | 'added' | 'removed' | 'modified';

export interface DiffOptions {
  contextLines: number;
  ignoreWhitespace: boolean;
}

export interface DiffSegment {
  kind: DiffSegmentKind;
  text: string;
}

export interface SideLine {
  /** 0-based index into that side's line sequence. */
  lineIndex: number;
  text: string;
  segments: DiffSegment[];
}

export interface DiffRow {
  old: SideLine | null;
  new: SideLine | null;
}

export interface DiffHunk {
  oldStart: number;
  oldLen: number;
  newStart: number;
  newLen: number;
  rows: DiffRow[];
}

export interface DiffModel {
  hunks: DiffHunk[];
}

export interface DiffRowRef {
  hunkIndex: number;
  rowIndex: number;
}

export interface DiffStats {
  additions: number;
  deletions: number;
  modified: number;
}

// ── Conflict types ───────────────────────────────────────────────

/** Half-open range of string indices into the source text. */
export interface TextRange {
  start: number;
  end: number;
}

export interface ConflictRegion {
  oursBranchName: string;
  theirsBranchName: string;
  range: TextRange;
  ours: TextRange;
  theirs: TextRange;
  base: TextRange | null;
}

export type ConflictResolution = 'ours' | 'theirs' | 'base' | 'both';

// ── Display row types ────────────────────────────────────────────

export type DiffViewMode = 'split' | 'inline';

export type DisplayRow =
  | { type: 'hunk-header'; hunkIndex: number; text: string }
  | { type: 'fold'; oldStart: number; newStart: number; len: number }
  | {
      type: 'code';
      source: DiffRowRef;
      kind: DiffRowKind;
      oldLineNumber: number | null;
      newLineNumber: number | null;
      oldSegments: DiffSegment[];
      newSegments: DiffSegment[];
    };

export type ConflictRow =
  | { type: 'empty'; text: string }
  | {
      type: 'block-header';
      conflictIndex: number;
      oursBranchName: string;
      theirsBranchName: string;
      hasBase: boolean;
    }
  | {
      type: 'code';
      conflictIndex: number;
      kind: DiffRowKind;
      oursSegments: DiffSegment[];
      baseSegments: DiffSegment[];
      theirsSegments: DiffSegment[];
    };

// ── Patch types ──────────────────────────────────────────────────

/** Which side an unselected change is kept from when building a partial patch. */
export type PatchUnselectedContext = 'old' | 'new';
