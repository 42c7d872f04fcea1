import { describe, it, expect } from 'vitest';
import { formatFixed, roundTo } from './format.js';

describe('formatFixed', () => {
  it('pads to the requested digits', () => {
    expect(formatFixed(1, 2)).toBe('1.00');
    expect(formatFixed(0, 4)).toBe('0.0000');
    expect(formatFixed(100, 1)).toBe('100.0');
  });

  it('rounds exact ties to even', () => {
    expect(formatFixed(0.125, 2)).toBe('0.12');
    expect(formatFixed(0.375, 2)).toBe('0.38');
    expect(formatFixed(0.5, 0)).toBe('0');
    expect(formatFixed(1.5, 0)).toBe('2');
    expect(formatFixed(87.5, 0)).toBe('88');
  });

  it('rounds on the stored binary value', () => {
    // 2.675 is stored slightly below the tie
    expect(formatFixed(2.675, 2)).toBe('2.67');
    // so is 0.15
    expect(formatFixed(0.15, 1)).toBe('0.1');
  });

  it('rounds repeating fractions', () => {
    expect(formatFixed((2 / 3) * 100, 1)).toBe('66.7');
    expect(formatFixed(1 / 3, 6)).toBe('0.333333');
    expect(formatFixed(0.9999996, 6)).toBe('1.000000');
  });

  it('keeps the sign of negative values', () => {
    expect(formatFixed(-1.25, 1)).toBe('-1.2');
  });

  it('leaves non-finite values as text', () => {
    expect(formatFixed(Infinity, 2)).toBe('Infinity');
  });
});

describe('roundTo', () => {
  it('returns the rounded number', () => {
    expect(roundTo(2 / 3, 6)).toBe(0.666667);
    expect(roundTo(0.7, 6)).toBe(0.7);
    expect(roundTo(1 / 0.7, 6)).toBe(1.428571);
  });
});
