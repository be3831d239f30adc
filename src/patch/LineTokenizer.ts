/* --------------------------------------------------------------------------
 *  Hunkwright — Line tokenizer
 * ----------------------------------------------------------------------- */

import { Line } from '../types/patchTypes';

// Lazy middle group: a whitespace-only line lands entirely in the indent.
const LINE_PARTS = /^([ \t]*)([\s\S]*?)([ \t]*)$/;

/**
 * Splits a physical line (no embedded line break) into indent, content and
 * trailing whitespace. Only spaces and tabs count as boundary whitespace.
 */
export function tokenizeLine(line: string): Line {
  const match = LINE_PARTS.exec(line);
  if (!match) {
    return { indent: '', content: line, trailing: '' };
  }
  return { indent: match[1], content: match[2], trailing: match[3] };
}

export function reconstructLine(line: Line): string {
  return `${line.indent}${line.content}${line.trailing}`;
}
