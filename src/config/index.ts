/**
 * Configuration module
 * Handles loading and validating configuration from environment
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { resolve } from 'path';
import { ConfigError } from './errors.js';

export { ConfigError } from './errors.js';

/**
 * Check that a string names a time zone the runtime can format with
 */
function isKnownTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Configuration schema with zod validation
 * All options have sensible defaults
 */
export const ConfigSchema = z.object({
  // Output
  outputDir: z
    .string()
    .default('./dossiers')
    .describe('Directory dossier files are written to'),
  timeZone: z
    .string()
    .default('UTC')
    .refine(isKnownTimeZone, { message: 'Unknown time zone' })
    .describe('IANA time zone used for rendered timestamps'),

  // Cleaning
  minBlockSize: z
    .coerce
    .number()
    .int()
    .min(1)
    .default(200)
    .describe('Paragraphs shorter than this are never deduplicated'),

  // Logging Configuration
  logLevel: z
    .enum(['debug', 'info', 'warn', 'error'])
    .default('info')
    .describe('Logging verbosity level'),
  logFormat: z
    .enum(['json', 'pretty'])
    .default('pretty')
    .describe('Log output format'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Load .env file from specified path or default locations
 */
export function loadEnvFile(envPath?: string): void {
  if (envPath) {
    dotenv.config({ path: resolve(envPath) });
  } else {
    // Try multiple locations
    dotenv.config({ path: resolve(process.cwd(), '.env') });
    dotenv.config({ path: resolve(process.cwd(), '.env.local') });
  }
}

/**
 * Build raw config object from environment variables
 */
function buildRawConfig(): Record<string, unknown> {
  return {
    outputDir: process.env.DOSSIER_OUTPUT_DIR,
    timeZone: process.env.DOSSIER_TIMEZONE,
    minBlockSize: process.env.DOSSIER_MIN_BLOCK_SIZE,
    logLevel: process.env.DOSSIER_LOG_LEVEL,
    logFormat: process.env.DOSSIER_LOG_FORMAT,
  };
}

/**
 * Load and validate configuration from environment
 * @param envPath Optional path to .env file
 * @throws ConfigError if validation fails
 */
export function loadConfig(envPath?: string): Config {
  loadEnvFile(envPath);

  const result = ConfigSchema.safeParse(buildRawConfig());

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Validate a partial config object
 */
export function validateConfig(config: unknown): Config {
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Get default configuration values
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

// Singleton config instance
let _config: Config | null = null;

/**
 * Get the global configuration instance (singleton)
 * Loads from environment on first access
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Set the global configuration instance
 * Useful for testing or programmatic configuration
 */
export function setConfig(config: Config): void {
  _config = validateConfig(config);
}

/**
 * Reset the global configuration instance
 * Forces reload on next getConfig() call
 */
export function resetConfig(): void {
  _config = null;
}

export * from './column.js';
