/**
 * Conversation records and their loader
 */

export type { Message, ConversationRecord } from './types.js';

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
} from './source.js';
