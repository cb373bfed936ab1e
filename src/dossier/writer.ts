/**
 * Dossier writer
 * Saves the raw, working and markdown documents
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { formatLocalTimestamp, safeSlug } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';
import type { DossierBuild } from './build.js';
import { FormatWriteWarning, InputError, OutputError } from './errors.js';

export const OUTPUT_FORMATS = ['txt', 'md'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface WriteOptions {
  outputDir: string;
  /** Named builds get their own directory */
  name?: string;
  topics: readonly string[];
  formats: readonly OutputFormat[];
  now: Date;
  timeZone: string;
}

export interface WriteResult {
  /** Paths written, in format order */
  files: string[];
  warnings: FormatWriteWarning[];
}

/**
 * Output path without extension.
 * Named: `<outputDir>/<name>/<YYYY-MM-DD_HHMMSS>`.
 * Otherwise: `<outputDir>/dossier__<topics>__<YYYYMMDD_HHMMSS>`.
 * @throws InputError when the name has no usable characters
 */
export function resolveOutputBase(options: Omit<WriteOptions, 'formats'>): string {
  const stamp = formatLocalTimestamp(options.now.getTime() / 1000, options.timeZone);
  const date = stamp.slice(0, 10);
  const time = stamp.slice(11, 19).replace(/:/g, '');

  if (options.name !== undefined) {
    const dir = safeSlug(options.name);
    if (!dir || dir === '.' || dir === '..') {
      throw new InputError(`Invalid dossier name: '${options.name}'`);
    }
    return join(options.outputDir, dir, `${date}_${time}`);
  }

  const topics = safeSlug(options.topics.join(', ')) || 'all';
  return join(options.outputDir, `dossier__${topics}__${date.replace(/-/g, '')}_${time}`);
}

/**
 * Write every requested format. A format that fails becomes a warning.
 * @throws OutputError when nothing could be written
 */
export async function writeDossier(build: DossierBuild, options: WriteOptions): Promise<WriteResult> {
  const logger = createLogger({ module: 'dossier-writer' });
  const base = resolveOutputBase(options);
  const files: string[] = [];
  const warnings: FormatWriteWarning[] = [];

  const save = async (format: OutputFormat, path: string, content: string): Promise<void> => {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, 'utf-8');
      files.push(path);
    } catch (err) {
      const warning = new FormatWriteWarning(format, err);
      logger.warn({ format, path }, warning.message);
      warnings.push(warning);
    }
  };

  for (const format of options.formats) {
    if (format === 'md') {
      await save('md', `${base}.md`, build.markdown);
      continue;
    }
    await save('txt', `${base}.txt`, build.raw);
    if (build.working) {
      await save('txt', `${base}__working.txt`, build.working.text);
    }
  }

  if (files.length === 0) {
    throw new OutputError('No output format could be written', warnings);
  }

  return { files, warnings };
}
