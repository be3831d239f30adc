/* --------------------------------------------------------------------------
 *  Hunkwright — Utility functions
 * ----------------------------------------------------------------------- */

/**
 * Normalizes line endings to LF
 * @param text The text to normalize
 * @returns Text with normalized line endings
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n|\r/g, '\n');
}

/**
 * Returns the body of the first markdown code fence in `text`, trimmed.
 * Text without a fence is returned unchanged.
 */
export function stripMarkdownFence(text: string): string {
  if (!text.includes('```')) {
    return text;
  }
  const match = /```(?:\w+)?\s([\s\S]*?)```/.exec(text);
  return match ? match[1].trim() : text;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Formats a local time as `YYYY-MM-DD_HH-MM-SS`, safe for file names.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

/**
 * Strips control characters and path separators, e.g. from a version suffix
 * that becomes part of a file name.
 */
export function sanitizeFileNamePart(raw: string): string {
  return raw
    .replaceAll(/[\x00-\x1F\x7F]+/g, '')
    .replaceAll(/[\\/]/g, '')
    .trim();
}
