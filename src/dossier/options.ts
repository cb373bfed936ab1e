/**
 * Build options
 */

import { z } from 'zod';
import { ColumnConfigSchema, ConfigError } from '../config/index.js';

export const MIN_CONTEXT = 0;
export const MAX_CONTEXT = 200;
export const DEFAULT_MIN_BLOCK_SIZE = 200;

export const BuildOptionsSchema = z
  .object({
    mode: z.enum(['full', 'excerpts']).default('full'),
    context: z.number().int().min(MIN_CONTEXT).max(MAX_CONTEXT).default(2),
    dedup: z.boolean().default(true),
    split: z.boolean().default(false),
    patterns: z.array(z.string()).optional(),
    usedLinks: z.set(z.string()).optional(),
    config: ColumnConfigSchema.optional(),
    minBlockSize: z.number().int().min(1).default(DEFAULT_MIN_BLOCK_SIZE),
  })
  .strict();

export type BuildOptionsInput = z.input<typeof BuildOptionsSchema>;
export type BuildOptions = Readonly<z.output<typeof BuildOptionsSchema>>;

/**
 * Validate build options and freeze them for one build
 * @throws ConfigError on invalid values
 */
export function resolveBuildOptions(input: BuildOptionsInput = {}): BuildOptions {
  const result = BuildOptionsSchema.safeParse(input);
  if (!result.success) {
    throw ConfigError.fromZodError(result.error, 'Build options');
  }
  return Object.freeze(result.data);
}
