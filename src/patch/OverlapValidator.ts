/* --------------------------------------------------------------------------
 *  Hunkwright — Overlap validation
 * ----------------------------------------------------------------------- */

import { PatchError } from '../errors';
import { Placement } from '../types/patchTypes';

/**
 * Returns the first pair of intersecting placements, or undefined.
 * Once sorted by start, checking neighbours is enough.
 */
export function findOverlap(
  placements: readonly Placement[],
): [Placement, Placement] | undefined {
  const sorted = [...placements].sort((a, b) => a.start - b.start);
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const cur = sorted[i];
    if (prev.end > cur.start) {
      return [prev, cur];
    }
  }
  return undefined;
}

export function hasOverlaps(placements: readonly Placement[]): boolean {
  return findOverlap(placements) !== undefined;
}

export function assertNoOverlaps(placements: readonly Placement[]): void {
  if (hasOverlaps(placements)) {
    throw new PatchError('OverlappingHunks', 'Overlapping hunks detected. Patch aborted.');
  }
}
