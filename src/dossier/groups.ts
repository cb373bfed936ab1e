/**
 * Group builder
 * Clusters conversations into root + branch groups by base title
 */

import type { ConversationRecord, ConversationItem, Group } from './types.js';

const BRANCH_MARKER = /^\s*Branch\s*[·\-–—:]\s*/i;

/**
 * Title with a leading "Branch · " / "Branch - " / "Branch: " marker removed
 */
export function baseTitle(title: string): string {
  return (title ?? '')
    .replace(BRANCH_MARKER, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Attach the derived base title to a record
 */
export function toConversationItem(record: ConversationRecord): ConversationItem {
  return { ...record, baseTitle: baseTitle(record.title) };
}

/**
 * Bucket items by base title (falling back to title, then id).
 * Buckets and their members are ordered by createTime; equal times keep
 * input order.
 */
export function buildGroups(items: readonly ConversationItem[]): Group[] {
  const buckets = new Map<string, ConversationItem[]>();

  for (const item of items) {
    const key = item.baseTitle || item.title || item.id;
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      buckets.set(key, [item]);
    }
  }

  const groups: Group[] = [];
  for (const [key, members] of buckets) {
    const sorted = [...members].sort((a, b) => a.createTime - b.createTime);
    groups.push({ key, root: sorted[0], branches: sorted.slice(1) });
  }

  return groups.sort((a, b) => a.root.createTime - b.root.createTime);
}
