/**
 * Utility tests
 */

import { describe, it, expect } from 'vitest';
import {
  capitalize,
  formatLocalDate,
  formatLocalTimestamp,
  generateHash,
  isNotFoundError,
  normalizeText,
  safeSlug,
} from './index.js';

describe('generateHash', () => {
  it('should return a stable sha256 hex digest', () => {
    expect(generateHash('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });

  it('should shorten to the requested length', () => {
    expect(generateHash('abc', 8)).toBe('ba7816bf');
  });
});

describe('normalizeText', () => {
  it('should collapse whitespace and trim', () => {
    expect(normalizeText('  a\n\n b\tc  ')).toBe('a b c');
  });
});

describe('safeSlug', () => {
  it('should keep letters, digits and separators', () => {
    expect(safeSlug('Trip, Budget & Plans!')).toBe('Trip_Budget__Plans');
  });

  it('should keep non-ASCII letters', () => {
    expect(safeSlug('Reunião de São Paulo')).toBe('Reunião_de_São_Paulo');
  });

  it('should limit the length', () => {
    expect(safeSlug('a'.repeat(100), 10)).toBe('aaaaaaaaaa');
  });

  it('should strip path separators', () => {
    expect(safeSlug('../x')).toBe('..x');
    expect(safeSlug('///')).toBe('');
  });
});

describe('capitalize', () => {
  it('should capitalize roles', () => {
    expect(capitalize('assistant')).toBe('Assistant');
    expect(capitalize('USER')).toBe('User');
    expect(capitalize('')).toBe('');
  });
});

describe('formatLocalTimestamp', () => {
  const noonUtc = Date.UTC(2024, 1, 1, 12, 0, 0) / 1000;

  it('should render UTC with a +00:00 offset', () => {
    expect(formatLocalTimestamp(noonUtc)).toBe('2024-02-01T12:00:00+00:00');
  });

  it('should render other zones with their offset', () => {
    expect(formatLocalTimestamp(noonUtc, 'America/Sao_Paulo')).toBe('2024-02-01T09:00:00-03:00');
    expect(formatLocalTimestamp(noonUtc, 'Asia/Kolkata')).toBe('2024-02-01T17:30:00+05:30');
  });

  it('should render missing times as empty', () => {
    expect(formatLocalTimestamp(0)).toBe('');
    expect(formatLocalTimestamp(Number.NaN)).toBe('');
  });
});

describe('formatLocalDate', () => {
  it('should use the date in the given zone', () => {
    const lateUtc = Date.UTC(2024, 1, 1, 23, 30) / 1000;

    expect(formatLocalDate(lateUtc)).toBe('2024-02-01');
    expect(formatLocalDate(lateUtc, 'Asia/Tokyo')).toBe('2024-02-02');
    expect(formatLocalDate(0)).toBe('');
  });
});

describe('isNotFoundError', () => {
  it('should detect ENOENT errors only', () => {
    const missing = Object.assign(new Error('missing'), { code: 'ENOENT' });
    const denied = Object.assign(new Error('denied'), { code: 'EACCES' });

    expect(isNotFoundError(missing)).toBe(true);
    expect(isNotFoundError(denied)).toBe(false);
    expect(isNotFoundError('ENOENT')).toBe(false);
  });
});
