import type { ConflictRegion, ConflictResolution, TextRange } from '../types';
import { logEvent } from '../logger';

const OURS_MARKER = '<<<<<<< ';
const BASE_MARKER = '||||||| ';
const SEPARATOR_MARKER = '=======';
const THEIRS_MARKER = '>>>>>>> ';

export const DEFAULT_OURS_BRANCH = 'HEAD';
export const DEFAULT_THEIRS_BRANCH = 'Origin';

interface OpenConflict {
  conflictStart: number;
  oursStart: number;
  oursBranchName: string | null;
}

type ScanState =
  | { phase: 'scanning' }
  | ({ phase: 'ours' } & OpenConflict)
  | ({ phase: 'base'; oursEnd: number; baseStart: number } & OpenConflict)
  | ({ phase: 'theirs'; oursEnd: number; base: TextRange | null; theirsStart: number } & OpenConflict);

function branchLabel(line: string, marker: string): string | null {
  const label = line.slice(marker.length).trim();
  return label.length > 0 ? label : null;
}

/**
 * Scans `text` once for conflict marker groups. A `<<<<<<<` seen inside an
 * open conflict restarts it, so nested blocks resolve to the innermost one.
 * Offsets index into `text` itself; a trailing `\r` only affects marker
 * matching.
 */
export function parseConflicts(text: string): ConflictRegion[] {
  const regions: ConflictRegion[] = [];
  let state: ScanState = { phase: 'scanning' };
  let lineStart = 0;

  for (;;) {
    const newline = text.indexOf('\n', lineStart);
    const lineEnd = newline === -1 ? text.length : newline;
    const nextLineStart = newline === -1 ? text.length : newline + 1;

    let line = text.slice(lineStart, lineEnd);
    if (line.endsWith('\r')) line = line.slice(0, -1);

    const current: ScanState = state;

    if (line.startsWith(OURS_MARKER)) {
      state = {
        phase: 'ours',
        conflictStart: lineStart,
        oursStart: nextLineStart,
        oursBranchName: branchLabel(line, OURS_MARKER) ?? (current.phase === 'scanning' ? null : current.oursBranchName),
      };
    } else if (line.startsWith(BASE_MARKER) && current.phase !== 'scanning') {
      state = {
        phase: 'base',
        conflictStart: current.conflictStart,
        oursStart: current.oursStart,
        oursBranchName: current.oursBranchName,
        oursEnd: current.phase === 'ours' ? lineStart : current.oursEnd,
        baseStart: nextLineStart,
      };
    } else if (line.startsWith(SEPARATOR_MARKER) && current.phase !== 'scanning') {
      let base: TextRange | null = null;
      if (current.phase === 'base') {
        base = { start: current.baseStart, end: lineStart };
      } else if (current.phase === 'theirs' && current.base) {
        base = { start: current.base.start, end: lineStart };
      }
      state = {
        phase: 'theirs',
        conflictStart: current.conflictStart,
        oursStart: current.oursStart,
        oursBranchName: current.oursBranchName,
        oursEnd: current.phase === 'ours' ? lineStart : current.oursEnd,
        base,
        theirsStart: nextLineStart,
      };
    } else if (line.startsWith(THEIRS_MARKER) && current.phase === 'theirs') {
      regions.push({
        oursBranchName: current.oursBranchName ?? DEFAULT_OURS_BRANCH,
        theirsBranchName: branchLabel(line, THEIRS_MARKER) ?? DEFAULT_THEIRS_BRANCH,
        range: { start: current.conflictStart, end: Math.min(nextLineStart, text.length) },
        ours: { start: current.oursStart, end: current.oursEnd },
        theirs: { start: current.theirsStart, end: lineStart },
        base: current.base,
      });
      state = { phase: 'scanning' };
    }

    lineStart = nextLineStart;
    if (lineStart >= text.length) break;
  }

  if (state.phase !== 'scanning') {
    logEvent('warn', 'Unterminated conflict discarded', { conflictStart: state.conflictStart });
  }

  return regions;
}

export function conflictText(text: string, region: ConflictRegion, resolution: ConflictResolution): string {
  const slice = (range: TextRange) => text.slice(range.start, range.end);

  switch (resolution) {
    case 'ours':
      return slice(region.ours);
    case 'theirs':
      return slice(region.theirs);
    case 'base':
      return region.base ? slice(region.base) : '';
    case 'both':
      return slice(region.ours) + slice(region.theirs);
  }
}

/** Replaces the whole marker group of region `index` with the chosen side. */
export function resolveConflict(
  text: string,
  regions: ConflictRegion[],
  index: number,
  resolution: ConflictResolution,
): string {
  if (!Number.isInteger(index) || index < 0 || index >= regions.length) {
    logEvent('warn', 'Conflict index out of range', { index, count: regions.length });
    return text;
  }

  const region = regions[index];
  return text.slice(0, region.range.start) + conflictText(text, region, resolution) + text.slice(region.range.end);
}

/** Resolves every region the same way, last first so earlier offsets stay valid. */
export function resolveAllConflicts(text: string, resolution: ConflictResolution): string {
  const regions = parseConflicts(text);
  let resolved = text;
  for (let index = regions.length - 1; index >= 0; index--) {
    resolved = resolveConflict(resolved, regions, index, resolution);
  }
  return resolved;
}
