// Path: src/utils/duration.test.ts

import { describe, it, expect } from 'vitest';
import { parseDuration, formatDuration } from './duration.js';

describe('parseDuration', () => {
  it.each([
    ['14m', 840000],
    ['90s', 90000],
    ['1h30m', 5400000],
    ['500ms', 500],
    ['1.5s', 1500],
    ['60000', 60000],
    [' 2m ', 120000],
    [0, 0],
    [250, 250],
  ])('should parse %j as %d ms', (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it.each(['', 'soon', '14 m', 'm14', '10x', '-5s', '5m10'])('should reject %j', (input) => {
    expect(parseDuration(input)).toBeUndefined();
  });

  it('should reject negative and non-finite numbers', () => {
    expect(parseDuration(-1)).toBeUndefined();
    expect(parseDuration(Number.POSITIVE_INFINITY)).toBeUndefined();
  });
});

describe('formatDuration', () => {
  it.each([
    [500, '500ms'],
    [45000, '45s'],
    [840000, '14m'],
    [5400000, '1h30m'],
    [3661000, '1h1m1s'],
  ])('should format %d as %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});
