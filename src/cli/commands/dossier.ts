/**
 * Dossier CLI commands
 * build, check-config
 */

import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'path';
import { getConfig, loadColumnConfig, type ColumnConfig } from '../../config/index.js';
import { loadConversationRecords } from '../../conversation/index.js';
import {
  buildDossier,
  DEFAULT_DELIVERABLE_PATTERNS,
  InputError,
  MAX_CONTEXT,
  MIN_CONTEXT,
  OUTPUT_FORMATS,
  readIds,
  readPatterns,
  readUsedLinks,
  selectConversationIds,
  writeDossier,
  type DossierMode,
  type OutputFormat,
} from '../../dossier/index.js';
import { createLogger } from '../../utils/logger.js';

/** Options for the build command */
export interface BuildCommandOptions {
  input: string;
  topic: string[];
  id: string[];
  idsFile?: string;
  mode: DossierMode;
  context: number;
  split?: boolean;
  dedup: boolean;
  deliverables?: boolean;
  patternsFile?: string;
  usedLinksFile?: string;
  config?: string;
  format: string[];
  name?: string;
  out?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse --mode
 */
export function parseMode(value: string): DossierMode {
  if (value === 'full' || value === 'excerpts') return value;
  throw new InvalidArgumentError("Expected 'full' or 'excerpts'.");
}

/**
 * Parse --context as an integer in range
 */
export function parseContext(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < MIN_CONTEXT || n > MAX_CONTEXT) {
    throw new InvalidArgumentError(`Expected an integer from ${MIN_CONTEXT} to ${MAX_CONTEXT}.`);
  }
  return n;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Validate requested output formats, keeping the first occurrence of each
 * @throws InputError on an unknown format
 */
export function parseFormats(values: readonly string[]): OutputFormat[] {
  const formats: OutputFormat[] = [];
  for (const value of values) {
    const format = value.toLowerCase();
    if (!isOutputFormat(format)) {
      throw new InputError(`Unknown output format: ${value} (expected ${OUTPUT_FORMATS.join(', ')})`);
    }
    if (!formats.includes(format)) formats.push(format);
  }
  return formats;
}

/**
 * Command-line topics followed by the column config's search terms,
 * trimmed, without blanks
 */
export function collectTopics(topics: readonly string[], config?: ColumnConfig): string[] {
  return [...topics, ...(config?.search_terms ?? [])].map((t) => t.trim()).filter(Boolean);
}

/**
 * Load inputs, build and write one dossier
 * @returns Paths of the written files
 */
export async function runBuild(options: BuildCommandOptions): Promise<string[]> {
  const logger = createLogger({ module: 'cli' });
  const formats = parseFormats(options.format);

  const loaded = await loadConversationRecords(resolve(options.input));
  for (const error of loaded.errors) {
    logger.warn({ line: error.line }, `Skipped record: ${error.error}`);
  }
  if (loaded.invalidTimes > 0) {
    logger.warn({ count: loaded.invalidTimes }, 'Unreadable timestamps treated as unknown');
  }

  const config: ColumnConfig | undefined = options.config
    ? await loadColumnConfig(resolve(options.config))
    : undefined;
  const topics = collectTopics(options.topic, config);

  const requested = [...options.id, ...(options.idsFile ? await readIds(resolve(options.idsFile)) : [])];
  const ids = requested.length > 0 ? requested : selectConversationIds(loaded.records, topics);

  let patterns: string[] | undefined;
  if (options.patternsFile) {
    patterns = await readPatterns(resolve(options.patternsFile));
  } else if (options.deliverables) {
    patterns = [...DEFAULT_DELIVERABLE_PATTERNS];
  }

  const usedLinks = options.usedLinksFile ? await readUsedLinks(resolve(options.usedLinksFile)) : undefined;

  const build = buildDossier(loaded.records, {
    topics,
    sourceLabel: options.input,
    ids,
    options: {
      mode: options.mode,
      context: options.context,
      dedup: options.dedup,
      split: options.split ?? false,
      patterns,
      usedLinks,
      config,
    },
  });

  const result = await writeDossier(build, {
    outputDir: resolve(options.out ?? getConfig().outputDir),
    name: options.name,
    topics,
    formats,
    now: build.context.now,
    timeZone: build.context.timeZone,
  });

  for (const warning of build.warnings) {
    console.error(`WARNING: ${warning.message}`);
  }
  for (const warning of result.warnings) {
    console.error(`WARNING: ${warning.message}`);
  }

  return result.files;
}

/**
 * Register dossier commands on the program
 */
export function registerDossierCommands(program: Command): void {
  // Build command
  program
    .command('build')
    .description('Build a dossier from normalized conversation records')
    .requiredOption('--input <path>', 'Conversations file (JSONL or JSON array)')
    .option('--topic <topic>', 'Topic to select and excerpt by (repeatable)', collect, [])
    .option('--id <id>', 'Conversation id to include (repeatable)', collect, [])
    .option('--ids-file <path>', 'File with one conversation id per line')
    .option('--mode <mode>', 'full or excerpts', parseMode, 'full')
    .option('--context <n>', 'Messages around each excerpt hit', parseContext, 2)
    .option('--split', 'Also write the cleaned working document')
    .option('--no-dedup', 'Keep repeated paragraphs in the working document')
    .option('--deliverables', 'Keep only deliverable sections in the working document')
    .option('--patterns-file <path>', 'Deliverable patterns, one per line')
    .option('--used-links-file <path>', 'URLs cited in drafts, one per line')
    .option('--config <path>', 'Column config JSON')
    .option('--format <formats...>', 'Output formats (txt, md)', ['txt', 'md'])
    .option('--name <name>', 'Write into <out>/<name>/ with a timestamped file name')
    .option('--out <dir>', 'Output directory')
    .action(async (options: BuildCommandOptions) => {
      try {
        const files = await runBuild(options);
        console.log(`Wrote ${files.length} file${files.length !== 1 ? 's' : ''}:`);
        for (const file of files) {
          console.log(`  + ${file}`);
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        createLogger({ module: 'cli' }).error({ err }, 'Dossier build failed');
        console.error(`Error: ${message}`);
        process.exitCode = 1;
      }
    });

  // Check-config command
  program
    .command('check-config <file>')
    .description('Validate a column config file')
    .action(async (file: string) => {
      try {
        const config = await loadColumnConfig(resolve(file));
        const buckets = Object.keys(config.thread_filters?.include ?? {});
        console.log(`Config OK: ${config.column_name ?? file}`);
        console.log(`  Include buckets: ${buckets.length > 0 ? buckets.join(', ') : '(none)'}`);
        console.log(`  Exclude terms: ${config.thread_filters?.exclude?.length ?? 0}`);
      } catch (err) {
        console.error(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
      }
    });
}
