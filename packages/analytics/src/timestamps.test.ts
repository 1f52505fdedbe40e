import { describe, expect, it } from 'vitest';

import { formatOffset, parseTimestamp } from './timestamps.js';

describe('parseTimestamp', () => {
  it.each([
    ['02:15', 135],
    ['1:02:03', 3723],
    ['00:00', 0],
    ['95', 95],
    ['12.9', 12],
  ])('parses %j as %i seconds', (value, seconds) => {
    expect(parseTimestamp(value)).toBe(seconds);
  });

  it.each([['N/A'], [''], ['1:2:3:4'], ['ab:cd'], ['-5'], ['1:-2']])('treats %j as 0', (value) => {
    expect(parseTimestamp(value)).toBe(0);
  });

  it('handles non-string values', () => {
    expect(parseTimestamp(undefined)).toBe(0);
    expect(parseTimestamp(42.7)).toBe(42);
    expect(parseTimestamp(-3)).toBe(0);
  });
});

describe('formatOffset', () => {
  it('renders minutes and hours', () => {
    expect(formatOffset(135)).toBe('2:15');
    expect(formatOffset(3723)).toBe('1:02:03');
    expect(formatOffset(5)).toBe('0:05');
  });
});
