/**
 * Deliverable extraction
 * Keeps only the sections whose opening line names a deliverable
 */

export const DEFAULT_DELIVERABLE_PATTERNS: readonly string[] = [
  '##',
  'constraint',
  'draft',
  'decision',
  'output',
  'result',
  'deliverable',
];

/**
 * Keep the lines that open a deliverable section and the non-blank lines
 * that follow. A section ends at the next matching line, or at a blank
 * line once it has content beyond its opening line. Matching is a
 * case-insensitive substring test.
 */
export function extractDeliverables(
  text: string,
  patterns: readonly string[] = DEFAULT_DELIVERABLE_PATTERNS
): string {
  const needles = patterns.map((p) => p.toLowerCase());
  const kept: string[] = [];
  let section: string[] = [];
  let inSection = false;

  for (const line of text.split('\n')) {
    const lower = line.toLowerCase();
    if (needles.some((needle) => lower.includes(needle))) {
      kept.push(...section);
      section = [line];
      inSection = true;
    } else if (inSection) {
      if (line.trim()) {
        section.push(line);
      } else if (section.length > 1) {
        kept.push(...section);
        section = [];
        inSection = false;
      }
    }
  }
  kept.push(...section);

  return kept.join('\n');
}
