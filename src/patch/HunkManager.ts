/* --------------------------------------------------------------------------
 *  Hunkwright — Change summary for a patched buffer
 * ----------------------------------------------------------------------- */

import * as DiffLib from 'diff';
import { Change } from 'diff';
import { ChangeSummary, HunkRange } from '../types/patchTypes';
import { normalizeLineEndings } from '../utilities';

function diffBuffers(original: string, modified: string): Change[] {
  return DiffLib.diffLines(normalizeLineEndings(original), normalizeLineEndings(modified));
}

/**
 * Folds a change list into ranges; adjacent removals and additions share one range.
 */
function groupRanges(changes: readonly Change[]): HunkRange[] {
  const ranges: HunkRange[] = [];
  let open: HunkRange | undefined;
  let originalLine = 0;
  let modifiedLine = 0;

  for (const { added, removed, count = 0 } of changes) {
    if (!added && !removed) {
      open = undefined;
      originalLine += count;
      modifiedLine += count;
      continue;
    }
    if (!open) {
      open = { originalStart: originalLine, originalLength: 0, modifiedStart: modifiedLine, modifiedLength: 0 };
      ranges.push(open);
    }
    if (removed) {
      open.originalLength += count;
      originalLine += count;
    } else {
      open.modifiedLength += count;
      modifiedLine += count;
    }
  }
  return ranges;
}

export class HunkManager {
  /**
   * Changed line ranges between two texts, 0-based
   */
  public compare(original: string, modified: string): HunkRange[] {
    return groupRanges(diffBuffers(original, modified));
  }

  public summarize(original: string, modified: string): ChangeSummary {
    const changes = diffBuffers(original, modified);
    const total = (pick: (c: Change) => boolean | undefined): number =>
      changes.filter(pick).reduce((sum, c) => sum + (c.count ?? 0), 0);

    return {
      additions: total((c) => c.added),
      deletions: total((c) => c.removed),
      hunks: groupRanges(changes),
    };
  }
}

export function summarizeChanges(original: string, modified: string): ChangeSummary {
  return new HunkManager().summarize(original, modified);
}

/**
 * Unified diff of a patched buffer against its original, for previews.
 */
export function createPreview(original: string, modified: string, fileName: string): string {
  return DiffLib.createTwoFilesPatch(
    fileName,
    fileName,
    normalizeLineEndings(original),
    normalizeLineEndings(modified),
    'original',
    'patched',
  );
}
