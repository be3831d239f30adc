/* --------------------------------------------------------------------------
 *  Hunkwright — Strategy pattern for line matching
 * ----------------------------------------------------------------------- */

import { Line, MatchMode } from '../types/patchTypes';

/**
 * Interface for line comparison strategies
 */
export interface MatchStrategy {
  /**
   * Compare one buffer line against one search line
   * @param bufferLine Line taken from the target buffer
   * @param searchLine Line taken from a hunk's search block
   */
  linesMatch(bufferLine: Line, searchLine: Line): boolean;

  /**
   * Get the name of the strategy
   */
  readonly name: MatchMode;
}

/**
 * Compares content directly. Indentation and trailing whitespace are
 * already split off by the tokenizer, so they never take part.
 */
export class ExactStrategy implements MatchStrategy {
  readonly name = 'exact';

  linesMatch(bufferLine: Line, searchLine: Line): boolean {
    return bufferLine.content === searchLine.content;
  }
}

// Unicode whitespace without U+FEFF, which `String.prototype.trim` would also drop
const OUTER_WHITESPACE =
  /^[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+|[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+$/g;

/**
 * Strips outer whitespace, keeping a byte order mark in place
 */
export function stripOuterWhitespace(text: string): string {
  return text.replace(OUTER_WHITESPACE, '');
}

/**
 * Compares content after a full whitespace strip. Differs from the exact
 * strategy only for whitespace the tokenizer leaves in place, such as
 * no-break spaces or information separators at either end of the content.
 */
export class TolerantStrategy implements MatchStrategy {
  readonly name = 'tolerant';

  linesMatch(bufferLine: Line, searchLine: Line): boolean {
    return stripOuterWhitespace(bufferLine.content) === stripOuterWhitespace(searchLine.content);
  }
}

/**
 * Factory to create match strategies
 */
export class MatchStrategyFactory {
  static forMode(mode: MatchMode): MatchStrategy {
    return mode === 'exact' ? new ExactStrategy() : new TolerantStrategy();
  }

  /**
   * Strategies in the order the resolver tries them
   */
  static createDefaultChain(): MatchStrategy[] {
    return [new ExactStrategy(), new TolerantStrategy()];
  }
}
