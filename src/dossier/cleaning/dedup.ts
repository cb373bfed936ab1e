/**
 * Paragraph-level deduplication
 */

import { generateHash, normalizeText } from '../../utils/index.js';
import { DEFAULT_MIN_BLOCK_SIZE } from '../options.js';

/**
 * Drop repeated paragraphs of at least `minBlockSize` characters.
 * Shorter paragraphs are always kept; the first copy of a long one wins.
 * Paragraphs compare equal when their whitespace-normalized text does.
 */
export function deduplicateBlocks(text: string, minBlockSize = DEFAULT_MIN_BLOCK_SIZE): string {
  const seen = new Set<string>();
  const kept: string[] = [];

  for (const paragraph of text.split('\n\n')) {
    if (paragraph.length < minBlockSize) {
      kept.push(paragraph);
      continue;
    }
    const hash = generateHash(normalizeText(paragraph));
    if (seen.has(hash)) continue;
    seen.add(hash);
    kept.push(paragraph);
  }

  return kept.join('\n\n');
}
