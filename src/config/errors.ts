/**
 * Configuration errors
 */

import type { z, ZodError } from 'zod';

/**
 * Configuration error with helpful messages
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZodError(error: ZodError, subject = 'Configuration'): ConfigError {
    const messages = error.issues.map(
      (issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    return new ConfigError(
      `${subject} validation failed:\n${messages.join('\n')}`,
      error.issues
    );
  }
}
