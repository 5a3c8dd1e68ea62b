import { isValidKeyIndex, KEY_INDEX_MAX, KEY_INDEX_MIN } from '../core/key-signature.js';
import type { Signature, SignatureInput } from '../core/score.js';

/** Straight eighths. */
export const DEFAULT_SWING = 50;

/** Largest beat unit a time signature may use (a 128th note). */
export const MAX_BEAT_UNIT = 128;

function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;
}

/** Reason a signature record is malformed, or `undefined` when it is well formed. */
export function signatureProblem(input: SignatureInput): string | undefined {
  if (!isValidKeyIndex(input.key)) {
    return `key must be an integer in [${KEY_INDEX_MIN}, ${KEY_INDEX_MAX}], got ${input.key}`;
  }
  if (!Number.isInteger(input.time.beats) || input.time.beats <= 0) {
    return `beats must be a positive integer, got ${input.time.beats}`;
  }
  if (!isPowerOfTwo(input.time.beatUnit) || input.time.beatUnit > MAX_BEAT_UNIT) {
    return `beat unit must be a power of two up to ${MAX_BEAT_UNIT}, got ${input.time.beatUnit}`;
  }
  if (!Number.isInteger(input.tempo) || input.tempo <= 0) {
    return `tempo must be a positive integer, got ${input.tempo}`;
  }
  const swing = input.swing ?? DEFAULT_SWING;
  if (!Number.isInteger(swing) || swing < 0 || swing > 100) {
    return `swing must be an integer percentage, got ${swing}`;
  }
  return undefined;
}

export function normalizeSignature(input: SignatureInput): Signature {
  return {
    key: input.key,
    time: { beats: input.time.beats, beatUnit: input.time.beatUnit },
    tempo: input.tempo,
    swing: input.swing ?? DEFAULT_SWING
  };
}
