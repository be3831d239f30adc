/* --------------------------------------------------------------------------
 *  Hunkwright — search/replace hunk applier
 * ----------------------------------------------------------------------- */

import { isPatchError } from './errors';
import { joinBuffer, splitBuffer } from './patch/BufferSplitter';
import { resolvePlacement } from './patch/HunkLocator';
import { assertNoOverlaps } from './patch/OverlapValidator';
import { applyPlacements } from './patch/PatchApplier';
import { validatePatchSpec } from './patch/PatchParser';
import { MatchStrategy, MatchStrategyFactory } from './strategies/matchStrategy';
import {
  HunkSet,
  Line,
  Placement,
  ProgressSink,
  PatchResult,
} from './types/patchTypes';

/* ────────────────────── Location phase ─────────────────────────────────── */

/**
 * Resolves every hunk against the original lines. Nothing is modified here,
 * so later hunks never see earlier hunks' edits.
 */
export function locatePlacements(
  lines: readonly Line[],
  patch: HunkSet,
  onProgress?: ProgressSink,
  strategies: readonly MatchStrategy[] = MatchStrategyFactory.createDefaultChain(),
): Placement[] {
  return patch.hunks.map((hunk, idx) => {
    onProgress?.(`Hunk ${idx + 1}: ${hunk.description || '(no description)'}`);
    return resolvePlacement(lines, hunk, idx, strategies, onProgress);
  });
}

/* ────────────────────── Entry points ───────────────────────────────────── */

/**
 * Applies a patch to `originalText` and returns the new text.
 *
 * The patch is validated first. Any failure aborts the whole operation.
 * @throws PatchError
 */
export function applyPatchOrThrow(
  originalText: string,
  patch: unknown,
  onProgress?: ProgressSink,
): string {
  return finishApply(originalText, validatePatchSpec(patch), onProgress).patched;
}

/**
 * Applies a patch to `originalText`.
 * @param originalText Buffer contents
 * @param patch Parsed patch payload (`{ hunks: [...] }`), validated here
 * @param onProgress Optional sink for narration lines
 * @returns The patched text, or a typed failure
 */
export function applyPatch(
  originalText: string,
  patch: unknown,
  onProgress?: ProgressSink,
): PatchResult {
  try {
    const hunkSet = validatePatchSpec(patch);
    const { patched, placements } = finishApply(originalText, hunkSet, onProgress);
    return { success: true, patched, placements };
  } catch (err) {
    if (isPatchError(err)) {
      return { success: false, failure: err.toFailure() };
    }
    throw err;
  }
}

function finishApply(
  originalText: string,
  hunkSet: HunkSet,
  onProgress?: ProgressSink,
): { patched: string; placements: Placement[] } {
  const buffer = splitBuffer(originalText);
  const placements = locatePlacements(buffer.lines, hunkSet, onProgress);

  assertNoOverlaps(placements);

  onProgress?.(`Applying ${placements.length} hunk(s)`);
  const patched = joinBuffer(applyPlacements(buffer, placements));
  return { patched, placements };
}
