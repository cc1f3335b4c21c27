import { describe, it, expect } from 'vitest';
import { expectedProfit, formatDuration, rateDifference } from './math.js';

describe('math helpers', () => {
  it('keeps the sign of the rate difference', () => {
    expect(rateDifference(0.0003, 0.0001)).toBeCloseTo(0.0002, 12);
    expect(rateDifference(0.0001, 0.0003)).toBeCloseTo(-0.0002, 12);
  });

  it('sizes the expected profit on the absolute difference', () => {
    expect(expectedProfit(10_000, -0.0003)).toBeCloseTo(3, 10);
  });

  it('formats durations as whole milliseconds', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(12.9)).toBe('12ms');
    expect(formatDuration(-4)).toBe('0ms');
  });
});
