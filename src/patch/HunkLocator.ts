/* --------------------------------------------------------------------------
 *  Hunkwright — Hunk location
 * ----------------------------------------------------------------------- */

import { PatchError } from '../errors';
import { MatchStrategy, MatchStrategyFactory } from '../strategies/matchStrategy';
import { Hunk, Line, MatchMode, Placement, ProgressSink } from '../types/patchTypes';
import { splitBlock } from './BufferSplitter';

/**
 * Finds every start index where `searchLines` matches a contiguous run of
 * `bufferLines`.
 * @param bufferLines Tokenized buffer
 * @param searchLines Tokenized search block
 * @param mode Match mode, or a strategy instance
 * @returns 0-based start indices, ascending
 */
export function locateHunk(
  bufferLines: readonly Line[],
  searchLines: readonly Line[],
  mode: MatchMode | MatchStrategy,
): number[] {
  const strategy = typeof mode === 'string' ? MatchStrategyFactory.forMode(mode) : mode;
  const matches: number[] = [];

  if (searchLines.length === 0) {
    return matches;
  }

  const maxStart = bufferLines.length - searchLines.length;
  for (let start = 0; start <= maxStart; start++) {
    let ok = true;
    for (let offset = 0; offset < searchLines.length; offset++) {
      if (!strategy.linesMatch(bufferLines[start + offset], searchLines[offset])) {
        ok = false;
        break;
      }
    }
    if (ok) {
      matches.push(start);
    }
  }

  return matches;
}

/**
 * Search lines for a hunk. An empty search block has no lines at all, so it
 * is reported as not found instead of matching any blank line.
 */
export function searchLinesFor(hunk: Hunk): Line[] {
  return hunk.search_block === '' ? [] : splitBlock(hunk.search_block);
}

/**
 * Resolves the unique placement of one hunk, trying each strategy in turn.
 *
 * A strategy with several matches fails the hunk immediately; only a
 * strategy with no matches hands over to the next one.
 */
export function resolvePlacement(
  bufferLines: readonly Line[],
  hunk: Hunk,
  hunkIndex: number,
  strategies: readonly MatchStrategy[] = MatchStrategyFactory.createDefaultChain(),
  onProgress?: ProgressSink,
): Placement {
  const num = hunkIndex + 1;
  const searchLines = searchLinesFor(hunk);

  for (const strategy of strategies) {
    const matches = locateHunk(bufferLines, searchLines, strategy);

    if (matches.length > 1) {
      throw new PatchError(
        'AmbiguousMatch',
        `Ambiguous ${strategy.name} match for hunk ${num} (${matches.length} locations).`,
        { hunkIndex, mode: strategy.name },
      );
    }

    if (matches.length === 1) {
      const start = matches[0];
      const end = start + searchLines.length;
      onProgress?.(`Hunk ${num}: ${strategy.name} match at lines ${start + 1}–${end}`);
      return {
        hunkIndex,
        start,
        end,
        mode: strategy.name,
        replaceLines: splitBlock(hunk.replace_block),
      };
    }
  }

  throw new PatchError('NotFound', `Hunk ${num} not found in buffer.`, { hunkIndex });
}
