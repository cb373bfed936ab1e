/**
 * Working index
 * Navigation front matter for the working document
 */

import { matchThreadFilter, shortTag, type ColumnConfig } from '../config/index.js';
import { formatLocalDate, formatLocalTimestamp } from '../utils/index.js';
import type { ConversationRecord, RenderContext } from './types.js';

const RULE = '='.repeat(70);
const DAY_SECONDS = 86400;
const TIMELINE_LIMIT = 10;
const PRIORITY_LIMIT = 5;
const INDEX_HEADER = '## WORKING INDEX\n\n';

/** Title words that mark a thread as worth reading first */
export const PRIORITY_KEYWORDS = [
  'draft',
  'decision',
  'deliverable',
  'output',
  'final',
  'review',
  'summary',
  'analysis',
] as const;

function dateLabel(seconds: number, timeZone: string): string {
  return seconds ? formatLocalDate(seconds, timeZone) : 'Unknown';
}

/**
 * Priority score: +2 per keyword and +3 per topic found in the title,
 * plus a recency bonus for threads under 30 days old
 */
export function scoreThread(
  record: Pick<ConversationRecord, 'title' | 'createTime'>,
  topics: readonly string[],
  now: Date
): number {
  const title = record.title.toLowerCase();
  let score = 0;

  for (const keyword of PRIORITY_KEYWORDS) {
    if (title.includes(keyword)) score += 2;
  }
  for (const topic of topics) {
    if (title.includes(topic.toLowerCase())) score += 3;
  }

  if (record.createTime) {
    const daysAgo = (now.getTime() / 1000 - record.createTime) / DAY_SECONDS;
    if (daysAgo < 30) score += (30 - daysAgo) / 10;
  }

  return score;
}

/**
 * Section headers in the body: lines opening with `##` or `===`, or with a
 * number followed by a dot. Every such line advances the counter, even when
 * it is not listed.
 */
export function findSections(text: string): Array<{ number: number; line: number; header: string }> {
  const sections: Array<{ number: number; line: number; header: string }> = [];
  let count = 0;

  text.split('\n').forEach((line, index) => {
    if (!(line.startsWith('##') || line.startsWith('===') || /^\d+\./.test(line))) return;
    count++;
    const header = line.trim().replace(/^#+/, '').trim().replace(/^=+/, '').trim();
    if (header && header !== 'WORKING INDEX') {
      sections.push({ number: count, line: index, header });
    }
  });

  return sections;
}

function renderSections(body: string): string {
  const out = ['### Sections\n\n'];
  for (const section of findSections(body)) {
    out.push(`  ${String(section.number).padStart(2, '0')}. Line ~${section.line}: ${section.header}\n`);
  }
  out.push('\n---\n\n');
  return out.join('');
}

/**
 * Index with timeline, priority threads and section navigation
 */
export function generateWorkingIndex(
  body: string,
  conversations: readonly ConversationRecord[],
  topics: readonly string[],
  ctx: RenderContext
): string {
  const out = [INDEX_HEADER];

  if (conversations.length > 0) {
    out.push('### Timeline\n\n');
    const latest = [...conversations]
      .sort((a, b) => b.createTime - a.createTime)
      .slice(0, TIMELINE_LIMIT);
    for (const conv of latest) {
      const id = conv.id ? `${conv.id.slice(0, 8)}...` : 'unknown';
      out.push(`  - ${dateLabel(conv.createTime, ctx.timeZone)}: ${conv.title} (ID: ${id})\n`);
    }
    out.push('\n');
  }

  if (conversations.length > 0 && topics.length > 0) {
    out.push('### Priority Threads (Read These First)\n\n');
    const scored = conversations
      .map((conv) => ({ conv, score: scoreThread(conv, topics, ctx.now) }))
      .filter(({ score }) => score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, PRIORITY_LIMIT);
    scored.forEach(({ conv }, i) => {
      out.push(`  ${i + 1}. [${dateLabel(conv.createTime, ctx.timeZone)}] ${conv.title}\n`);
    });
    out.push('\n');
  }

  out.push(renderSections(body));

  return out.join('');
}

export interface TaggedIndex {
  /** Header, tagged thread list and sections */
  index: string;
  /** Coverage audit lines, empty when there are no titled threads */
  coverage: string[];
}

/**
 * Index variant for builds with a column config: the thread list tagged
 * with each title's filter bucket, the section list, and a coverage audit
 * counting threads per tag. Threads without a bucket are tagged OTHER.
 */
export function generateTaggedIndex(
  body: string,
  conversations: readonly ConversationRecord[],
  config: ColumnConfig,
  ctx: RenderContext
): TaggedIndex {
  const threads = conversations
    .filter((conv) => conv.id && conv.title)
    .map((conv) => ({ conv, tag: shortTag(matchThreadFilter(conv.title, config).bucket) }));
  if (threads.length === 0) {
    return { index: `${INDEX_HEADER}${renderSections(body)}`, coverage: [] };
  }

  const counts = new Map<string, number>();
  for (const { tag } of threads) {
    counts.set(tag, (counts.get(tag) ?? 0) + 1);
  }

  const out = [INDEX_HEADER, 'PRIORITY THREADS (with category tags)\n', `${RULE}\n`];
  for (const { conv, tag } of [...threads].sort((a, b) => a.conv.createTime - b.conv.createTime)) {
    out.push(
      `[${tag}] ${conv.title}\n  ID: ${conv.id} | Created: ${formatLocalTimestamp(conv.createTime, ctx.timeZone)}\n\n`
    );
  }

  out.push(renderSections(body));

  const coverage = [`\n${RULE}`, 'COVERAGE AUDIT', RULE, `Included threads (total): ${threads.length}`];
  for (const tag of [...counts.keys()].sort()) {
    coverage.push(`  - [${tag}]: ${counts.get(tag) ?? 0}`);
  }
  coverage.push('');

  return { index: out.join(''), coverage };
}
