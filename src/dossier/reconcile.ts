/**
 * Branch reconciliation
 * Drops the history a branch shares with its root
 */

import { normalizeText } from '../utils/index.js';
import type { Message } from './types.js';

type Projected = readonly [role: string, text: string];

function project(messages: readonly Message[]): Projected[] {
  return messages.map((m) => [m.role, normalizeText(m.text)] as const);
}

/**
 * Length of the longest common prefix of two projected sequences
 */
export function longestCommonPrefixLength(
  a: readonly Projected[],
  b: readonly Projected[]
): number {
  const n = Math.min(a.length, b.length);
  let i = 0;
  while (i < n && a[i][0] === b[i][0] && a[i][1] === b[i][1]) {
    i++;
  }
  return i;
}

/**
 * The branch messages after the prefix shared with the root.
 * Comparison is on role + whitespace-normalized text; an edit to an early
 * message breaks the prefix and the whole branch is kept.
 */
export function reconcileBranch(
  rootMessages: readonly Message[],
  branchMessages: readonly Message[]
): Message[] {
  const k = longestCommonPrefixLength(project(rootMessages), project(branchMessages));
  return branchMessages.slice(k);
}
