import { describe, expect, it } from 'vitest';
import {
  ITEMS_RAW_MAX_LENGTH,
  countItems,
  normalizeAmount,
  normalizeContactId,
  normalizeOrderDate,
  parseOrderId,
  splitGalleries,
  truncateItems,
} from '../src/services/normalize.js';

describe('normalizeOrderDate', () => {
  it('parses "Mon D, YYYY" dates', () => {
    expect(normalizeOrderDate('Jan 2, 2025')).toBe('2025-01-02T00:00:00');
    expect(normalizeOrderDate('dec 31, 2024')).toBe('2024-12-31T00:00:00');
  });

  it('parses ISO calendar dates', () => {
    expect(normalizeOrderDate('2025-03-07')).toBe('2025-03-07T00:00:00');
    expect(normalizeOrderDate('2025-3-7')).toBe('2025-03-07T00:00:00');
  });

  it('returns the input verbatim when it cannot be parsed', () => {
    expect(normalizeOrderDate('garbage')).toBe('garbage');
    expect(normalizeOrderDate('Feb 30, 2025')).toBe('Feb 30, 2025');
    expect(normalizeOrderDate('Foo 2, 2025')).toBe('Foo 2, 2025');
    expect(normalizeOrderDate('2025-13-01')).toBe('2025-13-01');
    expect(normalizeOrderDate('01/02/2025')).toBe('01/02/2025');
    expect(normalizeOrderDate('')).toBe('');
  });
});

describe('normalizeAmount', () => {
  it('strips thousands separators', () => {
    expect(normalizeAmount('1,234.50')).toBe(1234.5);
    expect(normalizeAmount('150.00')).toBe(150);
    expect(normalizeAmount('-12.5')).toBe(-12.5);
  });

  it('falls back to zero', () => {
    expect(normalizeAmount('')).toBe(0);
    expect(normalizeAmount('n/a')).toBe(0);
    expect(normalizeAmount('$5')).toBe(0);
    expect(normalizeAmount('0x10')).toBe(0);
  });
});

describe('normalizeContactId', () => {
  it('accepts only all-digit values', () => {
    expect(normalizeContactId('12345')).toBe(12345);
    expect(normalizeContactId('C-12')).toBeNull();
    expect(normalizeContactId('')).toBeNull();
  });

  it('rejects ids too large to hold exactly', () => {
    expect(normalizeContactId('9007199254740991')).toBe(9007199254740991);
    expect(normalizeContactId('12345678901234567891')).toBeNull();
  });
});

describe('parseOrderId', () => {
  it('parses integers and rejects everything else', () => {
    expect(parseOrderId('1001')).toBe(1001);
    expect(parseOrderId('+7')).toBe(7);
    expect(parseOrderId('12.5')).toBeNull();
    expect(parseOrderId('ORD-1')).toBeNull();
  });
});

describe('item helpers', () => {
  it('splits galleries on commas and trims each entry', () => {
    expect(splitGalleries('Spring Recital, Fall Show ,Headshots')).toEqual([
      'Spring Recital',
      'Fall Show',
      'Headshots',
    ]);
  });

  it('counts newline separated items', () => {
    expect(countItems('')).toBe(0);
    expect(countItems('8x10 Print')).toBe(1);
    expect(countItems('8x10 Print\nDigital Download\nMug')).toBe(3);
  });

  it('truncates long item lists and maps empty text to null', () => {
    expect(truncateItems('x'.repeat(600))).toHaveLength(ITEMS_RAW_MAX_LENGTH);
    expect(truncateItems('Mug')).toBe('Mug');
    expect(truncateItems('')).toBeNull();
  });

  it('truncates by code point without splitting surrogate pairs', () => {
    expect(truncateItems('\u{1F4F7}'.repeat(600))).toBe('\u{1F4F7}'.repeat(ITEMS_RAW_MAX_LENGTH));
  });
});
