/**
 * Thread dossier
 * Main library entry point
 */

// Re-export modules for programmatic use
export * from './config/index.js';
export * from './dossier/index.js';
export * from './utils/index.js';
export {
  NormalizedConversationSchema,
  NormalizedMessageSchema,
  parseTime,
  parseConversationRecords,
  loadConversationRecords,
  type NormalizedConversation,
  type NormalizedMessage,
  type LoadResult,
  type RecordError,
} from './conversation/index.js';
export { createLogger, getLogger, resetLogger } from './utils/logger.js';
export { version } from './version.js';
