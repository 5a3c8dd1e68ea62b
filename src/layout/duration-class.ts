import { compareFractions, fraction, type Fraction } from '../core/fraction.js';

/** Power-of-two note values, longest first. */
export const DURATION_CLASSES = ['whole', 'half', 'quarter', 'eighth', '16th', '32nd', '64th', '128th'] as const;

export type DurationClass = (typeof DURATION_CLASSES)[number];

/** Beam levels below a quarter note carry one flag each. */
export function flagCount(durationClass: DurationClass): number {
  return Math.max(0, DURATION_CLASSES.indexOf(durationClass) - 2);
}

/**
 * Largest power-of-two note value not exceeding `duration`, clamped to whole..128th.
 * A dotted quarter (3/8) is a quarter; a breve (2/1) is a whole.
 */
export function durationClassOf(duration: Fraction): DurationClass {
  for (const [level, durationClass] of DURATION_CLASSES.entries()) {
    if (compareFractions(fraction(1, 2 ** level), duration) <= 0) {
      return durationClass;
    }
  }
  return '128th';
}

/** The shorter of two classes. */
export function shorterClass(left: DurationClass, right: DurationClass): DurationClass {
  return DURATION_CLASSES.indexOf(left) >= DURATION_CLASSES.indexOf(right) ? left : right;
}

export function isDurationClass(value: string): value is DurationClass {
  return DURATION_CLASSES.some((entry) => entry === value);
}
