/**
 * Topic excerpts
 */

import type { Message } from './types.js';

/**
 * Escape a string for literal use inside a RegExp
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive alternation of the non-blank topics.
 * With no topics the pattern never matches.
 */
export function compileTopicPattern(topics: readonly string[]): RegExp {
  const parts = topics.filter((t) => t.trim()).map(escapeRegExp);
  if (parts.length === 0) {
    return /(?!)/;
  }
  return new RegExp(parts.join('|'), 'i');
}

/**
 * Messages matching the pattern plus `context` neighbours on each side,
 * in original order. No match gives an empty list.
 */
export function excerptMessages(
  messages: readonly Message[],
  pattern: RegExp,
  context: number
): Message[] {
  // test() on a global or sticky RegExp carries lastIndex between calls
  const re = pattern.global || pattern.sticky
    ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
    : pattern;
  const keep = new Set<number>();

  messages.forEach((m, i) => {
    if (!re.test(m.text)) return;
    const from = Math.max(0, i - context);
    const to = Math.min(messages.length - 1, i + context);
    for (let j = from; j <= to; j++) {
      keep.add(j);
    }
  });

  return [...keep].sort((a, b) => a - b).map((i) => messages[i]);
}
