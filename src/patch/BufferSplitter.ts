/* --------------------------------------------------------------------------
 *  Hunkwright — Buffer splitting and serialization
 * ----------------------------------------------------------------------- */

import { Line, Newline, TextBuffer } from '../types/patchTypes';
import { reconstructLine, tokenizeLine } from './LineTokenizer';

const ANY_NEWLINE = /\r\n|\n/;

/**
 * CRLF wins for the whole buffer if it appears anywhere in the text.
 */
export function detectNewline(text: string): Newline {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

/**
 * Tokenizes a whole buffer. Empty text is one empty line, not zero lines.
 */
export function splitBuffer(text: string): TextBuffer {
  const newline = detectNewline(text);
  const raw = text === '' ? [''] : text.split(newline);
  return { lines: raw.map(tokenizeLine), newline };
}

/**
 * Tokenizes a search or replace block. Either line ending is accepted
 * regardless of the buffer's own convention. Like `splitBuffer`, an empty
 * block is one empty line.
 */
export function splitBlock(block: string): Line[] {
  return block.split(ANY_NEWLINE).map(tokenizeLine);
}

export function joinBuffer(buffer: TextBuffer): string {
  return buffer.lines.map(reconstructLine).join(buffer.newline);
}
