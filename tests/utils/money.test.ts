import { describe, it, expect } from 'vitest';
import { roundToTwoDecimals, formatAmount, sumAmounts, roundHalfEven } from '@ledgerline/types';

describe('roundToTwoDecimals', () => {
  it('should round to two decimal places', () => {
    expect(roundToTwoDecimals(100.456)).toBe(100.46);
    expect(roundToTwoDecimals(100.454)).toBe(100.45);
    expect(roundToTwoDecimals(100)).toBe(100);
  });

  it('should round negative amounts', () => {
    expect(roundToTwoDecimals(-5000.004)).toBe(-5000);
  });
});

describe('formatAmount', () => {
  it('should always print two decimals', () => {
    expect(formatAmount(150000)).toBe('150000.00');
    expect(formatAmount(-5000)).toBe('-5000.00');
    expect(formatAmount(0.1 + 0.2)).toBe('0.30');
  });
});

describe('sumAmounts', () => {
  it('should sum amounts correctly', () => {
    expect(sumAmounts([100, 200, 300])).toBe(600);
    expect(sumAmounts([100.1, 200.2, 300.3])).toBe(600.6);
  });

  it('should handle empty array', () => {
    expect(sumAmounts([])).toBe(0);
  });

  it('should handle negative amounts', () => {
    expect(sumAmounts([100, -50, 25])).toBe(75);
  });
});

describe('roundHalfEven', () => {
  it('should send exact halves to the even neighbour', () => {
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(1.5)).toBe(2);
  });

  it('should round other values to the nearest integer', () => {
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
    expect(roundHalfEven(3)).toBe(3);
  });
});
