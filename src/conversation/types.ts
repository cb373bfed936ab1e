/**
 * Conversation record types
 */

/**
 * A single message. Ordered by timestamp; ties keep source order.
 */
export interface Message {
  readonly timestamp: number;
  readonly role: string;
  readonly text: string;
}

/**
 * A normalized conversation as supplied by the upstream loader.
 * `createTime` and message timestamps are epoch seconds, 0 when unknown.
 */
export interface ConversationRecord {
  readonly id: string;
  readonly title: string;
  readonly createTime: number;
  readonly messages: readonly Message[];
}
