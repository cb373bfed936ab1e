/**
 * Sources registry
 * URL extraction, the registry block, and its categorized re-emission
 */

import type { Source } from './types.js';

export const REGISTRY_RULE = '='.repeat(70);
export const REGISTRY_TITLE = 'SOURCES REGISTRY';

const URL_PATTERN = /https?:\/\/[^\s)\]}"']*[^\s)\]}"'.,;:!?]/g;
const URL_PARTS = /^https?:\/\/([^/?#]*)([^?#]*)/;
const REGISTRY_HEADER = /^={70}\nSOURCES REGISTRY\n={70}\n/gm;
const REGISTRY_ENTRY = /\[(\d+)\]\s+(.+?)\n\s+(https?:\/\/\S+)/g;

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Display label for a URL: host plus the first 50 characters of the path
 */
export function sourceLabel(url: string): string {
  const match = URL_PARTS.exec(url);
  if (!match) return url.slice(0, 60);
  return match[1] + match[2].slice(0, 50);
}

/**
 * URLs referenced in a text, in order of first appearance
 */
export function extractSources(text: string): Source[] {
  const seen = new Set<string>();
  const sources: Source[] = [];

  for (const match of text.matchAll(URL_PATTERN)) {
    const raw = match[0];
    if (seen.has(raw)) continue;
    seen.add(raw);
    const url = raw.replace(/[.,;:!?'"]$/, '');
    sources.push({ url, label: sourceLabel(url) });
  }

  return sources;
}

/**
 * Drop repeated URLs; the first label seen for a URL wins
 */
export function dedupeSources(sources: Iterable<Source>): Source[] {
  const byUrl = new Map<string, Source>();
  for (const source of sources) {
    if (!byUrl.has(source.url)) {
      byUrl.set(source.url, source);
    }
  }
  return [...byUrl.values()];
}

function formatEntry(n: number, source: Source): string {
  return `[${n}] ${source.label}\n    ${source.url}\n\n`;
}

/**
 * Render the registry block, deduplicated and numbered by label order.
 * Empty when there are no sources.
 */
export function renderSourcesRegistry(sources: Iterable<Source>): string {
  const unique = dedupeSources(sources).sort(
    (a, b) => compareText(a.label, b.label) || compareText(a.url, b.url)
  );
  if (unique.length === 0) return '';

  const out = [`\n${REGISTRY_RULE}\n`, `${REGISTRY_TITLE}\n`, `${REGISTRY_RULE}\n\n`];
  unique.forEach((source, i) => out.push(formatEntry(i + 1, source)));
  return out.join('');
}

/**
 * Offset of the last registry header block, or -1
 */
export function findRegistryStart(text: string): number {
  let start = -1;
  for (const match of text.matchAll(REGISTRY_HEADER)) {
    start = match.index ?? start;
  }
  return start;
}

/**
 * Split a document into the body and the trailing registry block
 */
export function splitRegistry(text: string): { body: string; registry: string } {
  const start = findRegistryStart(text);
  if (start < 0) return { body: text, registry: '' };
  return { body: text.slice(0, start), registry: text.slice(start) };
}

/**
 * Parse `[n] label\n    url` entries
 */
export function parseRegistryEntries(block: string): Source[] {
  const sources: Source[] = [];
  for (const match of block.matchAll(REGISTRY_ENTRY)) {
    sources.push({ url: match[3].trim(), label: match[2].trim() });
  }
  return sources;
}

export type SourceCategory =
  | 'usedInDrafts'
  | 'candidate'
  | 'legal'
  | 'media'
  | 'economic'
  | 'internal'
  | 'other';

/**
 * Categories in display order with their headings
 */
export const SOURCE_CATEGORIES: ReadonlyArray<readonly [SourceCategory, string]> = [
  ['usedInDrafts', '**Used in Drafts**'],
  ['candidate', '**Candidates for Next Column**'],
  ['legal', 'Legal Sources'],
  ['media', 'Media Sources'],
  ['economic', 'Economic Sources'],
  ['internal', 'Internal Documents'],
  ['other', 'Other Sources'],
];

const CANDIDATE_KEYWORDS = [
  'research', 'analysis', 'report', 'study', 'project',
  'draft', 'document', 'paper', 'article', 'summary',
];

// Checked in this order after the candidate keywords; first hit wins
const DOMAIN_KEYWORDS: ReadonlyArray<readonly [SourceCategory, readonly string[]]> = [
  ['legal', ['.gov', '.senado', '.camara', 'senate', 'congress', 'judicial', 'legal', 'court', 'law']],
  [
    'media',
    [
      'news', 'folha', 'globo', 'estadao', 'uol', 'bbc', 'cnn', 'press', 'media',
      'jornalismo', 'nytimes', 'wsj', 'reuters', 'guardian', 'apnews',
    ],
  ],
  [
    'economic',
    [
      'economic', 'financial', 'trade', 'economy', 'banco', 'bcb', 'bank', 'imf',
      'world bank', 'commerce', 'bloomberg', 'forbes',
    ],
  ],
  ['internal', ['note', 'transcript', 'internal', 'memo', 'meeting', 'summary']],
];

/**
 * Assign each source to one category.
 * Used links come first, then research-relevance keywords, then domain
 * keywords matched against the lowercased url and label.
 */
export function tagSources(
  sources: readonly Source[],
  usedLinks?: ReadonlySet<string>
): Record<SourceCategory, Source[]> {
  const categories: Record<SourceCategory, Source[]> = {
    usedInDrafts: [],
    candidate: [],
    legal: [],
    media: [],
    economic: [],
    internal: [],
    other: [],
  };

  for (const source of sources) {
    const url = source.url.toLowerCase();
    const label = source.label.toLowerCase();
    const matches = (keywords: readonly string[]): boolean =>
      keywords.some((kw) => url.includes(kw) || label.includes(kw));

    if (usedLinks?.has(source.url)) {
      categories.usedInDrafts.push(source);
      continue;
    }

    if (matches(CANDIDATE_KEYWORDS)) {
      categories.candidate.push(source);
      continue;
    }

    const domain = DOMAIN_KEYWORDS.find(([, keywords]) => matches(keywords));
    categories[domain ? domain[0] : 'other'].push(source);
  }

  return categories;
}

/**
 * Re-emit the registry grouped by category, alphabetized by label within a
 * category and renumbered across the whole registry. Text after the
 * registry is dropped. Documents without a parsable registry pass through.
 */
export function reorganizeSourcesSection(
  text: string,
  usedLinks?: ReadonlySet<string>
): string {
  const start = findRegistryStart(text);
  if (start < 0) return text;

  const sources = dedupeSources(parseRegistryEntries(text.slice(start)));
  if (sources.length === 0) return text;

  const categorized = tagSources(sources, usedLinks);
  const out = [`${REGISTRY_RULE}\n`, `${REGISTRY_TITLE}\n`, `${REGISTRY_RULE}\n\n`];

  let n = 1;
  for (const [category, heading] of SOURCE_CATEGORIES) {
    const entries = categorized[category];
    if (entries.length === 0) continue;

    out.push(`${heading}:\n\n`);
    const sorted = [...entries].sort((a, b) =>
      compareText(a.label.toLowerCase(), b.label.toLowerCase())
    );
    for (const source of sorted) {
      out.push(formatEntry(n++, source));
    }
    out.push('\n');
  }

  return text.slice(0, start) + out.join('');
}
