/**
 * Research log appendix
 * Detection and removal of existing appendices, and rendering the single
 * appendix a working document carries
 */

import type { Artifact } from '../types.js';

export const APPENDIX_HEADER = 'APPENDIX: RESEARCH LOG & TOOL ARTIFACTS';
/** Trailing part of the header, counted on its own by the integrity check */
export const APPENDIX_HEADER_TAIL = 'RESEARCH LOG & TOOL ARTIFACTS';

const APPENDIX_RULE = '='.repeat(70);

/**
 * True for a line that spells the appendix header, ignoring case,
 * punctuation, spacing and decoration
 */
export function isAppendixHeaderLine(line: string): boolean {
  const letters = line.replace(/[^A-Za-z]/g, '').toUpperCase();
  return letters.includes('APPENDIX') && letters.includes('RESEARCHLOGTOOLARTIFACTS');
}

/**
 * Cut the text at the first appendix header line
 */
export function stripExistingAppendix(text: string): string {
  const lines = text.split('\n');
  const index = lines.findIndex(isAppendixHeaderLine);
  if (index < 0) return text;
  return lines.slice(0, index).join('\n').trimEnd();
}

/**
 * Drop any remaining line that spells the appendix header
 */
export function removeAppendixHeaderLines(text: string): string {
  return text
    .split('\n')
    .filter((line) => !isAppendixHeaderLine(line))
    .join('\n');
}

/**
 * Keep the first appendix header and remove every later one
 */
export function dedupeAppendixHeader(text: string): string {
  const parts = text.split(APPENDIX_HEADER);
  if (parts.length <= 2) return text;
  return parts[0] + APPENDIX_HEADER + parts.slice(1).join('');
}

/**
 * Occurrences of a literal marker in the text
 */
export function countOccurrences(text: string, marker: string): number {
  if (!marker) return 0;
  return text.split(marker).length - 1;
}

/**
 * One artifact as it appears in the appendix
 */
export function formatArtifact(artifact: Artifact): string {
  return `[${artifact.label}] ${artifact.snippet}...`;
}

/**
 * Render the appendix block, or '' when there are no artifacts
 */
export function renderAppendix(artifacts: readonly Artifact[]): string {
  if (artifacts.length === 0) return '';
  return (
    `\n\n${APPENDIX_RULE}\n${APPENDIX_HEADER}\n${APPENDIX_RULE}\n\n` +
    'This section contains metadata, tool-call fragments, and provenance\n' +
    'information from the research extraction process.\n\n' +
    artifacts.map(formatArtifact).join('\n\n')
  );
}
