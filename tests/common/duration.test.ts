import { describe, expect, it } from 'vitest';

import { parseDuration } from '@/common/duration.js';

describe('parseDuration', () => {
  it('parses single and compound units', () => {
    expect(parseDuration('500ms')).toBe(500);
    expect(parseDuration('30s')).toBe(30_000);
    expect(parseDuration('1m30s')).toBe(90_000);
    expect(parseDuration('1.5s')).toBe(1500);
    expect(parseDuration('2h')).toBe(7_200_000);
    expect(parseDuration(' 2s ')).toBe(2000);
  });

  it('rejects text that is not a positive duration', () => {
    expect(parseDuration('')).toBeUndefined();
    expect(parseDuration('10')).toBeUndefined();
    expect(parseDuration('0s')).toBeUndefined();
    expect(parseDuration('5x')).toBeUndefined();
    expect(parseDuration('soon')).toBeUndefined();
    expect(parseDuration('3s later')).toBeUndefined();
  });
});
