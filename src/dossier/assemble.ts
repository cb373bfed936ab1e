/**
 * Working document assembly
 */

import {
  APPENDIX_HEADER,
  APPENDIX_HEADER_TAIL,
  countOccurrences,
  dedupeAppendixHeader,
  renderAppendix,
} from './cleaning/appendix.js';
import { IntegrityWarning } from './errors.js';
import type { Artifact } from './types.js';

export interface WorkingParts {
  index: string;
  /** Coverage audit lines from the tagged index */
  coverage?: readonly string[];
  body: string;
  artifacts: readonly Artifact[];
}

/**
 * Index, coverage audit, body and at most one appendix, in that order
 */
export function assembleWorkingDocument(parts: WorkingParts): string {
  let text = parts.index;
  if (parts.coverage && parts.coverage.length > 0) {
    text += '\n' + parts.coverage.join('\n');
  }
  text += '\n' + parts.body;
  text += renderAppendix(parts.artifacts);
  return dedupeAppendixHeader(text);
}

/**
 * Compare appendix marker counts with what the artifact list implies:
 * one of each when artifacts were found, none otherwise
 */
export function checkAppendixIntegrity(text: string, artifactsFound: boolean): IntegrityWarning[] {
  const expected = artifactsFound ? 1 : 0;
  const warnings: IntegrityWarning[] = [];

  for (const marker of [APPENDIX_HEADER, APPENDIX_HEADER_TAIL]) {
    const actual = countOccurrences(text, marker);
    if (actual !== expected) {
      warnings.push(new IntegrityWarning(marker, expected, actual));
    }
  }

  return warnings;
}
