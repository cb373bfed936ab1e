/**
 * Utility functions
 */

import { createHash } from 'crypto';

/**
 * Generate a hex sha256 digest, optionally shortened
 */
export function generateHash(content: string, length = 64): string {
  return createHash('sha256')
    .update(content)
    .digest('hex')
    .slice(0, length);
}

/**
 * Collapse whitespace runs to single spaces and trim
 */
export function normalizeText(text: string): string {
  return (text ?? '').trim().replace(/\s+/g, ' ');
}

/**
 * Filesystem-safe slug that keeps letters, digits, `_`, `-` and `.`
 * Spaces become underscores.
 */
export function safeSlug(text: string, maxLength = 80): string {
  const slug = (text ?? '')
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/[^\p{L}\p{N}_\-.\s]/gu, '')
    .trim()
    .replace(/ /g, '_');
  return slug.slice(0, maxLength);
}

/**
 * Uppercase the first character and lowercase the rest
 */
export function capitalize(text: string): string {
  if (!text) return text;
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
      timeZoneName: 'longOffset',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Render epoch seconds as ISO-8601 with the zone's UTC offset,
 * e.g. `2024-02-01T09:00:00-03:00`. Zero or missing times render as ''.
 */
export function formatLocalTimestamp(seconds: number, timeZone = 'UTC'): string {
  if (!seconds || !Number.isFinite(seconds)) return '';

  const parts: Record<string, string> = {};
  for (const part of getFormatter(timeZone).formatToParts(new Date(seconds * 1000))) {
    parts[part.type] = part.value;
  }

  const zoneName = parts.timeZoneName ?? 'GMT';
  const offset = zoneName === 'GMT' ? '+00:00' : zoneName.replace('GMT', '');

  return `${parts.year}-${parts.month}-${parts.day}T${parts.hour}:${parts.minute}:${parts.second}${offset}`;
}

/**
 * Date part (YYYY-MM-DD) of formatLocalTimestamp, '' for missing times
 */
export function formatLocalDate(seconds: number, timeZone = 'UTC'): string {
  return formatLocalTimestamp(seconds, timeZone).slice(0, 10);
}

/**
 * True for fs errors raised because a path does not exist
 */
export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
