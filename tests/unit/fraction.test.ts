import { describe, expect, it } from 'vitest';

import {
  addFractions,
  checkedAddFractions,
  compareFractions,
  formatFraction,
  fraction,
  FractionError,
  fractionsEqual,
  multiplyFractions,
  parseFraction,
  subtractFractions,
  sumFractions,
  ZERO
} from '../../src/core/fraction.js';

describe('fraction arithmetic', () => {
  it('reduces and normalizes the sign onto the numerator', () => {
    expect(fraction(6, 8)).toEqual({ numerator: 3, denominator: 4 });
    expect(fraction(3, -6)).toEqual({ numerator: -1, denominator: 2 });
    expect(fraction(0, 7)).toEqual(ZERO);
  });

  it('throws FractionError for a zero denominator', () => {
    expect(() => fraction(1, 0)).toThrow(FractionError);
  });

  it('adds across different denominators exactly', () => {
    expect(addFractions(fraction(1, 3), fraction(1, 6))).toEqual(fraction(1, 2));
    expect(sumFractions([fraction(1, 4), fraction(1, 4), fraction(1, 4)])).toEqual(fraction(3, 4));
    expect(subtractFractions(fraction(1, 2), fraction(1, 2))).toEqual(ZERO);
    expect(multiplyFractions(fraction(3, 2), fraction(1, 4))).toEqual(fraction(3, 8));
  });

  it('keeps sums exact and refuses results that leave the safe-integer range', () => {
    const left = fraction(1, Number.MAX_SAFE_INTEGER);
    const right = fraction(1, Number.MAX_SAFE_INTEGER - 1);

    expect(checkedAddFractions(left, right)).toBeUndefined();
    expect(() => addFractions(left, right)).toThrow(FractionError);
    expect(checkedAddFractions(fraction(1, 1021), fraction(1, 1019))).toEqual(fraction(2040, 1040399));
  });

  it('compares large fractions exactly', () => {
    const max = Number.MAX_SAFE_INTEGER;
    expect(compareFractions(fraction(max, max - 1), fraction(max - 1, max - 2))).toBe(-1);
    expect(compareFractions(fraction(max - 1, max - 2), fraction(max, max - 1))).toBe(1);
  });

  it('compares by value rather than by representation', () => {
    expect(fractionsEqual(fraction(2, 4), fraction(1, 2))).toBe(true);
    expect(compareFractions(fraction(1, 3), fraction(1, 2))).toBeLessThan(0);
    expect(compareFractions(fraction(3, 8), fraction(1, 4))).toBeGreaterThan(0);
  });

  it('formats and parses n/d text', () => {
    expect(formatFraction(fraction(3, 4))).toBe('3/4');
    expect(parseFraction('6/8')).toEqual(fraction(3, 4));
    expect(parseFraction('2')).toEqual(fraction(2, 1));
    expect(parseFraction('1/0')).toBeUndefined();
    expect(parseFraction('one half')).toBeUndefined();
  });
});
