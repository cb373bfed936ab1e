/**
 * Dossier build
 * Selection, grouping, rendering and the optional working document
 */

import {
  getConfig,
  renderCompletenessCheck,
  renderControlLayer,
  type ColumnConfig,
} from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import { assembleWorkingDocument, checkAppendixIntegrity } from './assemble.js';
import { cleanDossierText } from './cleaning/pipeline.js';
import { EmptyResultError, InputError, type DossierWarning } from './errors.js';
import { compileTopicPattern } from './excerpt.js';
import { buildGroups, toConversationItem } from './groups.js';
import { resolveBuildOptions, type BuildOptions, type BuildOptionsInput } from './options.js';
import { renderMarkdown, renderRaw, type RenderSettings } from './render.js';
import { splitRegistry } from './sources.js';
import type { Artifact, ConversationRecord, RenderContext } from './types.js';
import { generateTaggedIndex, generateWorkingIndex } from './working-index.js';

const RULE = '='.repeat(70);

export interface BuildRequest {
  topics: readonly string[];
  /** Printed in the dossier header, usually the input file */
  sourceLabel: string;
  ids: readonly string[];
  options?: BuildOptionsInput;
  /** Defaults to the configured time zone and the current time */
  context?: Partial<RenderContext>;
}

export interface WorkingDocument {
  /** Full working document */
  text: string;
  index: string;
  /** Cleaned body, with control layer when a column config was given */
  body: string;
  artifacts: Artifact[];
  artifactsFound: boolean;
}

export interface DossierBuild {
  raw: string;
  markdown: string;
  working?: WorkingDocument;
  conversations: ConversationRecord[];
  options: BuildOptions;
  context: RenderContext;
  warnings: DossierWarning[];
}

/**
 * Ids of the conversations whose title mentions a topic, oldest first
 */
export function selectConversationIds(
  records: readonly ConversationRecord[],
  topics: readonly string[]
): string[] {
  const pattern = compileTopicPattern(topics);
  return records
    .filter((record) => pattern.test(record.title))
    .sort((a, b) => a.createTime - b.createTime)
    .map((record) => record.id);
}

function findDuplicateIds(records: readonly ConversationRecord[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const { id } of records) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  return [...duplicates];
}

/**
 * The requested records, in request order, each once
 * @throws InputError on duplicate input ids, no ids or unknown ids
 */
export function selectConversations(
  records: readonly ConversationRecord[],
  ids: readonly string[]
): ConversationRecord[] {
  const duplicates = findDuplicateIds(records);
  if (duplicates.length > 0) {
    throw new InputError(`Duplicate conversation ids in input: ${duplicates.join(', ')}`);
  }

  const wanted = [...new Set(ids.map((id) => id.trim()).filter(Boolean))];
  if (wanted.length === 0) {
    throw new InputError('No conversation ids selected');
  }

  const byId = new Map(records.map((record) => [record.id, record]));
  const missing = wanted.filter((id) => !byId.has(id));
  if (missing.length > 0) {
    throw new InputError(`Conversation ids not found in input: ${missing.join(', ')}`);
  }

  return wanted.flatMap((id) => {
    const record = byId.get(id);
    return record ? [record] : [];
  });
}

/**
 * Control layer and completeness check placed before the working body
 */
export function renderFrontMatter(
  config: ColumnConfig,
  conversations: readonly ConversationRecord[],
  ctx: RenderContext
): string {
  const completeness = renderCompletenessCheck(
    conversations.map((c) => c.createTime),
    ctx.now,
    ctx.timeZone
  );
  return (
    renderControlLayer(config) +
    `COMPLETENESS CHECK\n${RULE}\n${completeness}\n${RULE}\n\n`
  );
}

function buildWorkingDocument(
  raw: string,
  conversations: readonly ConversationRecord[],
  topics: readonly string[],
  options: BuildOptions,
  ctx: RenderContext
): { working: WorkingDocument; warnings: DossierWarning[] } {
  const logger = createLogger({ module: 'dossier-build' });

  const cleaned = cleanDossierText(
    raw,
    {
      dedup: options.dedup,
      minBlockSize: options.minBlockSize,
      patterns: options.patterns,
      usedLinks: options.usedLinks,
    },
    (progress) => logger.debug(progress, 'Cleaning stage complete')
  );

  if (!splitRegistry(cleaned.text).body.trim()) {
    throw new EmptyResultError();
  }

  const { config } = options;
  const body = config ? renderFrontMatter(config, conversations, ctx) + cleaned.text : cleaned.text;
  const { index, coverage } = config
    ? generateTaggedIndex(body, conversations, config, ctx)
    : { index: generateWorkingIndex(body, conversations, topics, ctx), coverage: [] };

  const text = assembleWorkingDocument({ index, coverage, body, artifacts: cleaned.artifacts });
  const artifactsFound = cleaned.artifacts.length > 0;
  const warnings = checkAppendixIntegrity(text, artifactsFound);
  for (const warning of warnings) {
    logger.warn({ marker: warning.marker, expected: warning.expected, actual: warning.actual }, warning.message);
  }

  return {
    working: { text, index, body, artifacts: cleaned.artifacts, artifactsFound },
    warnings,
  };
}

/**
 * Build the raw and markdown dossiers, and the working document when
 * `split` is set
 * @throws InputError, EmptyResultError, ConfigError
 */
export function buildDossier(
  records: readonly ConversationRecord[],
  request: BuildRequest
): DossierBuild {
  const appConfig = getConfig();
  const options = resolveBuildOptions({ minBlockSize: appConfig.minBlockSize, ...request.options });
  if (options.mode === 'excerpts' && !request.topics.some((topic) => topic.trim())) {
    throw new InputError('Provide at least one topic when using excerpts mode');
  }
  const ctx: RenderContext = {
    timeZone: request.context?.timeZone ?? appConfig.timeZone,
    now: request.context?.now ?? new Date(),
  };

  const conversations = selectConversations(records, request.ids);
  const groups = buildGroups(conversations.map(toConversationItem));
  const settings: RenderSettings = {
    topics: request.topics,
    sourceLabel: request.sourceLabel,
    mode: options.mode,
    context: options.context,
  };

  createLogger({ module: 'dossier-build' }).debug(
    { conversations: conversations.length, groups: groups.length, mode: options.mode },
    'Rendering dossier'
  );

  const raw = renderRaw(groups, settings, ctx);
  const markdown = renderMarkdown(groups, settings, ctx);

  if (!options.split) {
    return { raw, markdown, conversations, options, context: ctx, warnings: [] };
  }

  const { working, warnings } = buildWorkingDocument(raw, conversations, request.topics, options, ctx);
  return { raw, markdown, working, conversations, options, context: ctx, warnings };
}
