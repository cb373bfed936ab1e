/**
 * Artifact quarantine
 * Moves search fragments, image and model references and citation widgets
 * out of the body so the appendix can list them
 */

import type { Artifact, ArtifactLabel } from '../types.js';
import { APPENDIX_HEADER_TAIL, isAppendixHeaderLine } from './appendix.js';
import { ZERO_WIDTH } from './text.js';

const SNIPPET_LENGTH = 200;
const MIN_ARTIFACT_LENGTH = 20;

// First matching pattern decides what happens to a line
const ARTIFACT_PATTERNS: ReadonlyArray<readonly [RegExp, ArtifactLabel]> = [
  [/\[Search Query\].*?(?=\n\n|\n[A-Z]|$)/s, 'Search Fragment'],
  [/\[JSON\/Tool Call\].*/s, 'JSON/Tool Call'],
  [/\{".*?\}/s, 'JSON/Tool Call'],
  [/\[Image.*?\]/s, 'Image Reference'],
  [/\[GPT Model.*?\]/s, 'Model Info'],
  [/\[Citation Widget.*?\]/s, 'Citation Widget'],
];

const TOOL_CALL_ANNOTATION = /\[\s*JSON\s*\/\s*Tool\s*Call\s*\]/i;
const REJECTED_SNIPPETS = ['APPENDIX: RESEARCH LOG', APPENDIX_HEADER_TAIL, 'JSON/Tool Call'];

export interface QuarantineResult {
  text: string;
  artifacts: Artifact[];
}

type LineVerdict = { keep: true } | { keep: false; artifact?: Artifact };

function classifyLine(line: string): LineVerdict {
  const visible = line.replace(ZERO_WIDTH, '');
  if (isAppendixHeaderLine(visible) || TOOL_CALL_ANNOTATION.test(visible)) {
    return { keep: false };
  }

  for (const [pattern, label] of ARTIFACT_PATTERNS) {
    const match = pattern.exec(visible);
    if (!match) continue;

    const snippet = match[0].slice(0, SNIPPET_LENGTH);
    if (isAppendixHeaderLine(snippet) || label === 'JSON/Tool Call') {
      return { keep: false };
    }
    // Short matches fall through to the next pattern
    if (match[0].length > MIN_ARTIFACT_LENGTH) {
      return { keep: false, artifact: { label, snippet } };
    }
  }

  return { keep: true };
}

/**
 * Remove artifact lines from the text and return what they carried.
 * Tool-call JSON and stray appendix headers are dropped without a record.
 */
export function quarantineArtifacts(text: string): QuarantineResult {
  const kept: string[] = [];
  const artifacts: Artifact[] = [];

  for (const line of text.split('\n')) {
    const verdict = classifyLine(line);
    if (verdict.keep) {
      kept.push(line);
      continue;
    }
    const { artifact } = verdict;
    if (artifact && !REJECTED_SNIPPETS.some((marker) => artifact.snippet.includes(marker))) {
      artifacts.push(artifact);
    }
  }

  return { text: kept.join('\n'), artifacts };
}
