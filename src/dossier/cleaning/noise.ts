/**
 * Noise removal stages
 * Tool-call residue, citation markers and UI markup left in exported text
 */

import { escapeRegExp } from '../excerpt.js';
import { ZERO_WIDTH, collapseBlankLines, replaceUntilStable } from './text.js';

/** Keys that mark a JSON object as tool-call payload */
export const TOOL_KEYS = [
  'search_query',
  'tool_call',
  'function',
  'action',
  'open',
  'click',
  'find',
  'screenshot',
  'response_length',
  'file_path',
  'command',
  'terminal',
  'browser',
  'task_violates_safety_guidelines',
  'updates',
  'comments',
  'title',
  'prompt',
] as const;

const TOOL_JSON = new RegExp(`\\{\\s*['"]?(?:${TOOL_KEYS.join('|')})['"]?[\\s\\S]*?\\}`, 'g');
const TOOL_CALL_BRACKET = /\[tool_call:[\s\S]*?\]/g;
const TOOL_INVOCATION_LINES = [/^\s*(?:\*\*)?tool\s*\(.*/gm, /^\s*(?:\*\*)?tool\s+\w+.*/gm];
const TOOL_STATUS = /(?:Successfully created|Successfully updated|Failed with error).*?\n/g;
const REMINDER_LINES = /^[^\n]*(?:Make sure to|remember to|don't forget to).*?$/gim;
const TRUNCATION_NOTICE = /^The file is too long and its contents have been truncated\..*?$/gim;
const TOOL_CALL_ANNOTATION = /\[\s*JSON\s*\/\s*Tool\s*Call\s*\]/i;
const QUOTED_TOOL_FIELD = /["'](?:task_violates_safety_guidelines|updates|comments)["']/;

/** Instruction sections a tool prompt leaves behind, removed up to the next `##` */
const BOILERPLATE_SECTIONS = [
  'How to invoke the file_search tool',
  'How to handle results from file_search',
  'Tool usage instructions',
].map(
  (heading) =>
    new RegExp(`^##\\s+${escapeRegExp(heading).replace(/ /g, '\\s+')}[\\s\\S]*?(?=^##\\s|(?![\\s\\S]))`, 'gim')
);

function isToolNoiseLine(line: string): boolean {
  const visible = line.replace(ZERO_WIDTH, '');
  if (TOOL_CALL_ANNOTATION.test(visible)) return true;
  if (visible.trimStart().startsWith('{') && TOOL_KEYS.some((key) => visible.includes(key))) {
    return true;
  }
  return QUOTED_TOOL_FIELD.test(visible);
}

/**
 * Remove tool-call JSON, invocation lines, status chatter, reminder lines,
 * tool instruction sections and truncation notices
 */
export function stripToolNoise(text: string): string {
  let out = replaceUntilStable(text, TOOL_JSON);
  out = out.replace(TOOL_CALL_BRACKET, '');
  for (const pattern of TOOL_INVOCATION_LINES) {
    out = out.replace(pattern, '');
  }
  out = out.replace(TOOL_STATUS, '');
  out = out.replace(REMINDER_LINES, '');
  for (const pattern of BOILERPLATE_SECTIONS) {
    out = out.replace(pattern, '');
  }
  out = out.replace(TRUNCATION_NOTICE, '');
  out = out
    .split('\n')
    .filter((line) => !isToolNoiseLine(line))
    .join('\n');
  return collapseBlankLines(out).trim();
}

function stripCitationMarkersOnce(text: string): string {
  let out = text
    .replace(/<citeturn[^>]*>/gi, '')
    .replace(/<navlist>[\s\S]*?<\/navlist>/gi, '')
    .replace(/\bturn\d+news\d+\b/gi, '')
    .replace(/【[^】]*†[^】]*】/g, '')
    .replace(/【[^】]*】/g, '')
    .replace(/\[REF REMOVED\]/gi, '');
  out = replaceUntilStable(out, /\[\d+\](?!\S)/g).replace(/ {2,}/g, ' ');
  return collapseBlankLines(out).trim();
}

/**
 * Remove inline citation tokens, bracketed numeric references and
 * lenticular-bracket source markers, repeating until the text is stable
 */
export function stripCitationMarkers(text: string): string {
  let previous: string;
  let current = text;
  do {
    previous = current;
    current = stripCitationMarkersOnce(previous);
  } while (current !== previous);
  return current;
}

/**
 * Remove HTML-like tags, private-use glyph spans, non-printing characters,
 * residual citation tokens, appendix header text and long `=` separators
 */
export function sanitizeUiMarkup(text: string): string {
  let out = text
    .replace(/[\ue000-\uf8ff][\s\S]*?[\ue000-\uf8ff]/g, '')
    .replace(/[\ue000-\uf8ff]/g, '')
    .replace(/[\u00ad\ufffd\ufffe]/g, '');
  out = replaceUntilStable(out, /<\/?[a-zA-Z][^>]*\/?>\s*/g);
  out = out
    .replace(/<span[^>]*>[\s\S]*?<\/span>/g, '')
    .replace(/APPENDIX:\s*RESEARCH\s+LOG\s*&\s*TOOL\s+ARTIFACTS\s*/gi, '')
    .replace(/(?:cite)?turn\d+(?:search|news|view|file)\w*/gi, '')
    .replace(/\bciteturn\d+\w+\b/gi, '')
    .replace(/^={60,}.*?$/gm, '')
    .replace(/ {2,}/g, ' ');
  return collapseBlankLines(out).trim();
}
