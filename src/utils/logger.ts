/**
 * Logger utility using pino
 */

import pino from 'pino';
import { getConfig } from '../config/index.js';

let _logger: pino.Logger | null = null;

/**
 * Get the logger instance
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    const config = getConfig();

    const transport = config.logFormat === 'pretty'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            destination: 2,
          },
        }
      : undefined;

    _logger = pino(
      {
        name: 'dossier',
        level: config.logLevel,
        transport,
      },
      transport ? undefined : pino.destination(2)
    );
  }
  return _logger;
}

/**
 * Create a child logger with context
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return getLogger().child(context);
}

/**
 * Drop the cached logger so the next call picks up a changed config
 */
export function resetLogger(): void {
  _logger = null;
}
