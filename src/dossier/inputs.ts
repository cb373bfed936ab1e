/**
 * Line-list inputs: used links, deliverable patterns and conversation ids
 */

import { readFile } from 'fs/promises';
import { isNotFoundError } from '../utils/index.js';
import { InputError } from './errors.js';

async function readListFile(filePath: string, label: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFoundError(err)) {
      throw new InputError(`${label} file not found: ${filePath}`);
    }
    throw new InputError(
      `Failed to read ${label.toLowerCase()} file: ${filePath}\n${err instanceof Error ? err.message : String(err)}`
    );
  }
  return content.replace(/^\uFEFF/, '').split(/\r?\n/);
}

/**
 * URLs cited in drafts, one per line; blank and `#` lines are ignored
 */
export async function readUsedLinks(filePath: string): Promise<Set<string>> {
  const lines = await readListFile(filePath, 'Used-links');
  return new Set(
    lines.filter((line) => !line.startsWith('#')).map((line) => line.trim()).filter(Boolean)
  );
}

/**
 * Deliverable patterns, one per non-blank line
 */
export async function readPatterns(filePath: string): Promise<string[]> {
  const lines = await readListFile(filePath, 'Patterns');
  return lines.map((line) => line.trim()).filter(Boolean);
}

/**
 * Conversation ids, one per line; blank and `#` lines are ignored
 */
export async function readIds(filePath: string): Promise<string[]> {
  const lines = await readListFile(filePath, 'IDs');
  return lines.map((line) => line.trim()).filter((line) => line && !line.startsWith('#'));
}
