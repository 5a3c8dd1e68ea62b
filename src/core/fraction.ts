/**
 * Exact rational durations measured in whole notes.
 * Every value produced here is reduced with a positive denominator, so structural
 * equality (`toEqual`, `fractionsEqual`) matches numeric equality.
 */
export interface Fraction {
  readonly numerator: number;
  readonly denominator: number;
}

/** Thrown for a zero denominator, a non-integer component, or a result too large to represent. */
export class FractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FractionError';
  }
}

/** The empty duration. */
export const ZERO: Fraction = { numerator: 0, denominator: 1 };

/** Build a reduced fraction. */
export function fraction(numerator: number, denominator = 1): Fraction {
  if (!Number.isSafeInteger(numerator) || !Number.isSafeInteger(denominator)) {
    throw new FractionError(`Fraction components must be safe integers, got ${numerator}/${denominator}.`);
  }
  if (denominator === 0) {
    throw new FractionError(`Fraction ${numerator}/0 has a zero denominator.`);
  }
  if (numerator === 0) {
    return ZERO;
  }

  const sign = denominator < 0 ? -1 : 1;
  const divisor = gcd(Math.abs(numerator), Math.abs(denominator));
  return {
    numerator: (sign * numerator) / divisor,
    denominator: Math.abs(denominator) / divisor
  };
}

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

function bigGcd(left: bigint, right: bigint): bigint {
  let a = left;
  let b = right;
  while (b !== 0n) {
    const remainder = a % b;
    a = b;
    b = remainder;
  }
  return a;
}

/** Reduce an exact bigint ratio (positive denominator), `undefined` when it leaves the safe-integer range. */
function reduceExact(numerator: bigint, denominator: bigint): Fraction | undefined {
  if (numerator === 0n) {
    return ZERO;
  }
  const divisor = bigGcd(numerator < 0n ? -numerator : numerator, denominator);
  const reducedNumerator = numerator / divisor;
  const reducedDenominator = denominator / divisor;
  if (reducedNumerator > MAX_SAFE || -reducedNumerator > MAX_SAFE || reducedDenominator > MAX_SAFE) {
    return undefined;
  }
  return { numerator: Number(reducedNumerator), denominator: Number(reducedDenominator) };
}

/** Exact sum, or `undefined` when the reduced result has no safe-integer form. */
export function checkedAddFractions(left: Fraction, right: Fraction): Fraction | undefined {
  return reduceExact(
    BigInt(left.numerator) * BigInt(right.denominator) + BigInt(right.numerator) * BigInt(left.denominator),
    BigInt(left.denominator) * BigInt(right.denominator)
  );
}

export function addFractions(left: Fraction, right: Fraction): Fraction {
  const sum = checkedAddFractions(left, right);
  if (!sum) {
    throw new FractionError(`Sum of ${formatFraction(left)} and ${formatFraction(right)} is too large to represent.`);
  }
  return sum;
}

export function subtractFractions(left: Fraction, right: Fraction): Fraction {
  return addFractions(left, { numerator: -right.numerator, denominator: right.denominator });
}

export function multiplyFractions(left: Fraction, right: Fraction): Fraction {
  const product = reduceExact(
    BigInt(left.numerator) * BigInt(right.numerator),
    BigInt(left.denominator) * BigInt(right.denominator)
  );
  if (!product) {
    throw new FractionError(
      `Product of ${formatFraction(left)} and ${formatFraction(right)} is too large to represent.`
    );
  }
  return product;
}

/** -1, 0 or 1 as `left` is below, equal to, or above `right`. */
export function compareFractions(left: Fraction, right: Fraction): number {
  const difference =
    BigInt(left.numerator) * BigInt(right.denominator) - BigInt(right.numerator) * BigInt(left.denominator);
  return difference < 0n ? -1 : difference > 0n ? 1 : 0;
}

export function fractionsEqual(left: Fraction, right: Fraction): boolean {
  return compareFractions(left, right) === 0;
}

/** Exact sum of a duration list; throws `FractionError` when it cannot be represented. */
export function sumFractions(values: Iterable<Fraction>): Fraction {
  let total = ZERO;
  for (const value of values) {
    total = addFractions(total, value);
  }
  return total;
}

/** Exact sum of a duration list, `undefined` when it cannot be represented. */
export function checkedSumFractions(values: Iterable<Fraction>): Fraction | undefined {
  let total = ZERO;
  for (const value of values) {
    const next = checkedAddFractions(total, value);
    if (!next) {
      return undefined;
    }
    total = next;
  }
  return total;
}

/** Floating-point view, only for width weighting (never for beat comparisons). */
export function fractionToNumber(value: Fraction): number {
  return value.numerator / value.denominator;
}

/** `3/4`-style rendering used in messages and notation text. */
export function formatFraction(value: Fraction): string {
  return `${value.numerator}/${value.denominator}`;
}

/** Parse `n/d` (or a bare integer) into a reduced fraction, `undefined` on malformed input. */
export function parseFraction(text: string): Fraction | undefined {
  const match = /^(-?\d+)(?:\/(\d+))?$/.exec(text.trim());
  if (!match) {
    return undefined;
  }

  const numerator = Number.parseInt(match[1] ?? '', 10);
  const denominator = match[2] === undefined ? 1 : Number.parseInt(match[2], 10);
  if (!Number.isSafeInteger(numerator) || !Number.isSafeInteger(denominator) || denominator === 0) {
    return undefined;
  }

  return fraction(numerator, denominator);
}

function gcd(left: number, right: number): number {
  let a = left;
  let b = right;
  while (b !== 0) {
    const remainder = a % b;
    a = b;
    b = remainder;
  }
  return a === 0 ? 1 : a;
}
