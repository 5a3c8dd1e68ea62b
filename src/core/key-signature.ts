/** Lowest key index: seven flats. */
export const KEY_INDEX_MIN = -14;
/** Highest key index: seven sharps. */
export const KEY_INDEX_MAX = 14;

/** Major key names for the standard (even) key indices, keyed by sharps minus flats. */
const STANDARD_KEY_NAMES: Readonly<Record<number, string>> = {
  [-7]: 'Cb',
  [-6]: 'Gb',
  [-5]: 'Db',
  [-4]: 'Ab',
  [-3]: 'Eb',
  [-2]: 'Bb',
  [-1]: 'F',
  0: 'C',
  1: 'G',
  2: 'D',
  3: 'A',
  4: 'E',
  5: 'B',
  6: 'F#',
  7: 'C#'
};

/** True for integer key indices inside the key table. */
export function isValidKeyIndex(key: number): boolean {
  return Number.isInteger(key) && key >= KEY_INDEX_MIN && key <= KEY_INDEX_MAX;
}

/**
 * Odd key indices sit a quarter tone between two standard keys; their
 * signatures carry quarter-tone accidentals, so microtonal spelling is enabled.
 */
export function isMicrotonalKey(key: number): boolean {
  return Math.abs(key) % 2 === 1;
}

/**
 * Number of accidental glyphs drawn for the key signature.
 * Quarter-tone keys draw one extra half-accidental glyph.
 */
export function keyAccidentalCount(key: number): number {
  return Math.ceil(Math.abs(key) / 2);
}

/** Display name, e.g. `D` for key 4, `Eb` for key -6, `G+1/4` for key 3. */
export function keyName(key: number): string {
  if (!isMicrotonalKey(key)) {
    return STANDARD_KEY_NAMES[key / 2] ?? `key ${key}`;
  }

  const lower = STANDARD_KEY_NAMES[(key - 1) / 2];
  return lower ? `${lower}+1/4` : `key ${key}`;
}
