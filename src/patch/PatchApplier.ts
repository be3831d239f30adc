/* --------------------------------------------------------------------------
 *  Hunkwright — Splicing replacements into a buffer
 * ----------------------------------------------------------------------- */

import { Line, Placement, TextBuffer } from '../types/patchTypes';

/**
 * Builds the lines that take the place of `[start, end)`.
 *
 * Replacement lines that land on a matched line keep that line's own indent
 * and trailing whitespace. Lines past the matched range take the indent of
 * the line at `start` and keep their own trailing whitespace.
 */
export function buildReplacement(lines: readonly Line[], placement: Placement): Line[] {
  const { start, end, replaceLines } = placement;
  const inheritedIndent = start < lines.length ? lines[start].indent : '';

  return replaceLines.map((replacement, i) => {
    const target = start + i;
    if (target < end) {
      return { ...lines[target], content: replacement.content };
    }
    return { ...replacement, indent: inheritedIndent };
  });
}

/**
 * Applies validated, non-overlapping placements and returns a new buffer.
 * The input buffer is left untouched.
 *
 * Placements run from the highest start down, so indices of the ones still
 * pending never move.
 */
export function applyPlacements(
  buffer: TextBuffer,
  placements: readonly Placement[],
): TextBuffer {
  const lines = [...buffer.lines];
  const ordered = [...placements].sort((a, b) => b.start - a.start);

  for (const placement of ordered) {
    lines.splice(
      placement.start,
      placement.end - placement.start,
      ...buildReplacement(lines, placement),
    );
  }

  return { lines, newline: buffer.newline };
}
