/**
 * Column config
 * Per-dossier JSON file that tags threads into buckets and adds a control layer
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { formatLocalDate, isNotFoundError } from '../utils/index.js';

const StringList = z.array(z.string());

export const ThreadFiltersSchema = z
  .object({
    include: z
      .record(
        z.string().refine((name) => name.trim().length > 0, {
          message: 'bucket names must be non-empty strings',
        }),
        StringList
      )
      .optional(),
    exclude: StringList.optional(),
  })
  .strict();

export const SegmentScoringSchema = z
  .object({
    mechanism_terms: StringList.optional(),
    bridging_terms: StringList.optional(),
    context_window: z.number().int().min(0).optional(),
    min_score: z.number().min(0).optional(),
  })
  .strict();

export const ControlLayerSectionsSchema = z
  .object({
    scope_router: z.string().optional(),
    do_not_repeat_rules: StringList.optional(),
    mechanism_focus: z.string().optional(),
    evidence_vs_inference: z.string().optional(),
    stress_tests: StringList.optional(),
  })
  .strict();

/**
 * Column config file schema. Unknown keys are rejected at every level.
 */
export const ColumnConfigSchema = z
  .object({
    column_name: z.string().optional(),
    column_objective: z.string().optional(),
    dossier_contract: z.string().optional(),
    search_terms: StringList.optional(),
    thread_filters: ThreadFiltersSchema.optional(),
    segment_scoring: SegmentScoringSchema.optional(),
    op_v2_constraints: StringList.optional(),
    control_layer_sections: ControlLayerSectionsSchema.optional(),
  })
  .strict();

export type ColumnConfig = z.infer<typeof ColumnConfigSchema>;
export type ThreadFilters = z.infer<typeof ThreadFiltersSchema>;

/**
 * Validate an already-parsed column config value
 */
export function parseColumnConfig(data: unknown): ColumnConfig {
  const result = ColumnConfigSchema.safeParse(data);
  if (!result.success) {
    throw ConfigError.fromZodError(result.error, 'Column config');
  }
  return result.data;
}

/**
 * Load a column config from a JSON file
 * @throws ConfigError for a missing file, malformed JSON or schema violations
 */
export async function loadColumnConfig(configPath: string): Promise<ColumnConfig> {
  const fullPath = resolve(configPath);

  let content: string;
  try {
    content = await readFile(fullPath, 'utf-8');
  } catch (err) {
    if (isNotFoundError(err)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    throw new ConfigError(
      `Error loading config: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new ConfigError(
      `Error loading config: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseColumnConfig(data);
}

/**
 * Result of testing a title against the thread filters
 */
export interface ThreadFilterMatch {
  included: boolean;
  bucket: string | null;
}

/**
 * Test a thread title against include/exclude filters.
 * Excludes win; otherwise the first include bucket with a matching term.
 */
export function matchThreadFilter(title: string, config: ColumnConfig): ThreadFilterMatch {
  if (!title) {
    return { included: false, bucket: null };
  }

  const titleLower = title.toLowerCase();
  const filters = config.thread_filters ?? {};

  for (const term of filters.exclude ?? []) {
    if (titleLower.includes(term.toLowerCase())) {
      return { included: false, bucket: null };
    }
  }

  for (const [bucket, terms] of Object.entries(filters.include ?? {})) {
    if (terms.some((term) => titleLower.includes(term.toLowerCase()))) {
      return { included: true, bucket };
    }
  }

  return { included: false, bucket: null };
}

/**
 * Short tag for a bucket name: first `_` token, uppercased, at most 10 chars.
 * Different buckets can map to the same tag.
 */
export function shortTag(bucket: string | null | undefined): string {
  if (!bucket) return 'OTHER';
  const tag = bucket.split('_')[0].toUpperCase().slice(0, 10);
  return tag || 'OTHER';
}

const RULE = '='.repeat(70);

/**
 * Render the control-layer front matter for a config
 */
export function renderControlLayer(config: ColumnConfig): string {
  const lines = [RULE, `CONTROL LAYER — ${config.column_name ?? 'Report'}`, RULE, ''];
  const sections = config.control_layer_sections ?? {};

  if (sections.scope_router !== undefined) {
    lines.push('SCOPE ROUTER', '', sections.scope_router, '');
  }

  if (sections.do_not_repeat_rules !== undefined) {
    lines.push('DO-NOT-REPEAT RULES', '');
    for (const rule of sections.do_not_repeat_rules) {
      lines.push(`• ${rule}`);
    }
    lines.push('');
  }

  if (sections.mechanism_focus !== undefined) {
    lines.push('MECHANISM FOCUS', '', sections.mechanism_focus, '');
  }

  if (sections.evidence_vs_inference !== undefined) {
    lines.push('EVIDENCE VS INFERENCE', '', sections.evidence_vs_inference, '');
  }

  if (sections.stress_tests !== undefined) {
    lines.push('STRESS TESTS', '');
    for (const test of sections.stress_tests) {
      lines.push(`• ${test}`);
    }
    lines.push('');
  }

  lines.push(RULE, '');
  return lines.join('\n');
}

const WEEK_SECONDS = 7 * 86400;

/**
 * Summarize the date coverage of the conversations in a dossier
 */
export function renderCompletenessCheck(
  createTimes: number[],
  now: Date,
  timeZone: string
): string {
  if (createTimes.length === 0) {
    return 'No conversations found.';
  }

  const dates = createTimes.filter((t) => t > 0);
  if (dates.length === 0) {
    return 'No date information available.';
  }

  const nowSeconds = now.getTime() / 1000;
  const latest = Math.max(...dates);
  const recent = dates.filter((d) => nowSeconds - d < WEEK_SECONDS).length;

  return [
    `Searched conversations up to ${formatLocalDate(nowSeconds, timeZone)}.`,
    `Last relevant match: ${formatLocalDate(latest, timeZone)}.`,
    `Recent matches (< 7 days): ${recent}.`,
    `Total conversations in dossier: ${createTimes.length}.`,
  ].join('\n');
}
