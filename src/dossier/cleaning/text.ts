/**
 * Shared helpers for cleaning stages
 */

/** Zero-width and byte-order-mark characters */
export const ZERO_WIDTH = /[\u200b-\u200f\u2060\ufeff]/g;

/**
 * Apply a replacement until the text stops changing.
 * Used where one removal can expose another match.
 */
export function replaceUntilStable(text: string, pattern: RegExp, replacement = ''): string {
  let previous: string;
  let current = text;
  do {
    previous = current;
    current = previous.replace(pattern, replacement);
  } while (current !== previous);
  return current;
}

/**
 * Collapse runs of three or more newlines to one blank line
 */
export function collapseBlankLines(text: string): string {
  return text.replace(/\n{3,}/g, '\n\n');
}
