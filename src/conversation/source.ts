/**
 * Conversation source
 * Reads normalized conversation records from JSONL (one record per line)
 * or from a JSON array of the same records
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { InputError } from '../dossier/errors.js';
import { isNotFoundError } from '../utils/index.js';
import type { ConversationRecord, Message } from './types.js';

const TimeSchema = z.union([z.string(), z.number()]).nullable().optional();

/**
 * Normalized message as written by the upstream normalizer
 */
export const NormalizedMessageSchema = z
  .object({
    role: z.string().default('unknown'),
    content: z.string().nullable().optional(),
    text: z.string().nullable().optional(),
    timestamp: TimeSchema,
  })
  .passthrough();

/**
 * Normalized conversation record
 */
export const NormalizedConversationSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().nullable().optional(),
    created_at: TimeSchema,
    create_time: TimeSchema,
    messages: z.array(NormalizedMessageSchema).default([]),
  })
  .passthrough();

export type NormalizedConversation = z.infer<typeof NormalizedConversationSchema>;
export type NormalizedMessage = z.infer<typeof NormalizedMessageSchema>;

/**
 * A line or array entry that could not be read
 */
export interface RecordError {
  line: number;
  error: string;
}

/**
 * Load result with statistics
 */
export interface LoadResult {
  records: ConversationRecord[];
  errors: RecordError[];
  /** Number of times that could not be parsed and were coerced to 0 */
  invalidTimes: number;
}

/**
 * Convert a timestamp value to epoch seconds.
 * Numbers are taken as seconds; strings as numeric seconds or ISO dates.
 * Returns null for values that cannot be read.
 */
export function parseTime(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return 0;

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  const trimmed = value.trim();
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }

  const ms = Date.parse(trimmed);
  return Number.isNaN(ms) ? null : ms / 1000;
}

/**
 * Title with tabs/newlines flattened
 */
function cleanTitle(title: string | null | undefined): string {
  return (title ?? '').replace(/[\t\n]/g, ' ').trim();
}

/**
 * Convert a validated record, counting unreadable times
 */
function toRecord(conv: NormalizedConversation, counter: { invalid: number }): ConversationRecord {
  const coerce = (value: string | number | null | undefined): number => {
    const parsed = parseTime(value);
    if (parsed === null) {
      counter.invalid++;
      return 0;
    }
    return parsed;
  };

  const messages: Message[] = [];
  for (const msg of conv.messages) {
    const text = (msg.content ?? msg.text ?? '').trim();
    if (!text) continue;
    messages.push({ timestamp: coerce(msg.timestamp), role: msg.role || 'unknown', text });
  }
  // Array.prototype.sort is stable, so equal timestamps keep source order
  messages.sort((a, b) => a.timestamp - b.timestamp);

  return {
    id: conv.id,
    title: cleanTitle(conv.title),
    createTime: coerce(conv.created_at ?? conv.create_time),
    messages,
  };
}

/**
 * Parse and validate one JSON value as a conversation record
 */
function parseEntry(
  data: unknown,
  line: number,
  counter: { invalid: number }
): ConversationRecord | RecordError {
  const result = NormalizedConversationSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    return {
      line,
      error: `${issue.path.join('.') || 'record'}: ${issue.message}`,
    };
  }
  return toRecord(result.data, counter);
}

/**
 * Parse JSONL or JSON-array content into conversation records
 * @throws InputError when a JSON array document cannot be parsed
 */
export function parseConversationRecords(content: string): LoadResult {
  const text = content.replace(/^\uFEFF/, '');
  const counter = { invalid: 0 };
  const records: ConversationRecord[] = [];
  const errors: RecordError[] = [];

  const collect = (entry: ConversationRecord | RecordError): void => {
    if ('error' in entry) errors.push(entry);
    else records.push(entry);
  };

  if (text.trimStart().startsWith('[')) {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      throw new InputError(
        `Failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`
      );
    }
    if (!Array.isArray(data)) {
      throw new InputError('Expected a JSON array of conversations');
    }
    data.forEach((entry, index) => collect(parseEntry(entry, index + 1, counter)));
  } else {
    const lines = text.split('\n');
    lines.forEach((line, index) => {
      if (!line.trim()) return;
      let data: unknown;
      try {
        data = JSON.parse(line);
      } catch (err) {
        errors.push({
          line: index + 1,
          error: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
        });
        return;
      }
      collect(parseEntry(data, index + 1, counter));
    });
  }

  return { records, errors, invalidTimes: counter.invalid };
}

/**
 * Load conversation records from a file
 * @throws InputError when the file is missing or unreadable
 */
export async function loadConversationRecords(filePath: string): Promise<LoadResult> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFoundError(err)) {
      throw new InputError(`Conversations file not found: ${filePath}`);
    }
    throw new InputError(
      `Failed to read conversations file: ${filePath}\n${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseConversationRecords(content);
}
