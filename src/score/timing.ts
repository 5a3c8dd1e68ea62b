import { checkedSumFractions, fraction, fractionsEqual, type Fraction } from '../core/fraction.js';
import { isMeasureRepeat, tokenDuration, type NotationToken } from '../core/notation.js';
import type { TimeSignature } from '../core/score.js';

/** Bar and channel a validation runs against, echoed in mismatch errors. */
export interface BeatLocation {
  barIndex?: number;
  channelIndex?: number;
}

/** A channel whose beat sum differs from the bar length its time signature requires. */
export interface BeatMismatch extends BeatLocation {
  readonly kind: 'beat-mismatch';
  readonly expected: Fraction;
  readonly actual: Fraction;
}

/** A channel whose exact beat sum is too fine-grained to represent, so it cannot fill the bar. */
export interface BeatOverflow extends BeatLocation {
  readonly kind: 'beat-overflow';
  readonly expected: Fraction;
}

export type BeatValidation = { ok: true } | { ok: false; error: BeatMismatch | BeatOverflow };

/** Whole-note length of one bar: beats / beatUnit. */
export function requiredBarDuration(time: TimeSignature): Fraction {
  return fraction(time.beats, time.beatUnit);
}

/**
 * Exact sum of note and rest durations; grace notes and markings take no time.
 * `undefined` when the reduced sum has no safe-integer numerator and denominator.
 */
export function channelDuration(tokens: readonly NotationToken[]): Fraction | undefined {
  const durations: Fraction[] = [];
  for (const token of tokens) {
    const duration = tokenDuration(token);
    if (duration) {
      durations.push(duration);
    }
  }
  return checkedSumFractions(durations);
}

/** Check a decoded channel against its time signature. Measure repeats always pass. */
export function validateBeats(
  tokens: readonly NotationToken[],
  time: TimeSignature,
  location: BeatLocation = {}
): BeatValidation {
  if (isMeasureRepeat(tokens)) {
    return { ok: true };
  }

  const expected = requiredBarDuration(time);
  const actual = channelDuration(tokens);
  if (!actual) {
    return { ok: false, error: { kind: 'beat-overflow', expected, ...location } };
  }
  if (fractionsEqual(expected, actual)) {
    return { ok: true };
  }

  return { ok: false, error: { kind: 'beat-mismatch', expected, actual, ...location } };
}
