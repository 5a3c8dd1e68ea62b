import { describe, expect, it } from 'vitest';

import { fraction } from '../../src/core/fraction.js';
import { isMicrotonalKey, keyAccidentalCount, keyName } from '../../src/core/key-signature.js';
import {
  compareDynamics,
  dynamicLevel,
  notePitches,
  pitchClassQuarterTones,
  staffSteps
} from '../../src/core/notation.js';

describe('pitch classes', () => {
  it('wraps accidentals across the octave boundary', () => {
    expect(pitchClassQuarterTones({ letter: 'B', accidental: 'sharp', octave: 4 })).toBe(0);
    expect(pitchClassQuarterTones({ letter: 'C', accidental: 'double-flat', octave: 4 })).toBe(20);
    expect(pitchClassQuarterTones({ letter: 'B', accidental: 'double-sharp', octave: 2 })).toBe(2);
  });

  it('places quarter-tone accidentals between the semitones', () => {
    expect(pitchClassQuarterTones({ letter: 'E', accidental: 'quarter-sharp', octave: 4 })).toBe(9);
    expect(pitchClassQuarterTones({ letter: 'F', accidental: 'three-quarter-sharp', octave: 4 })).toBe(13);
    expect(pitchClassQuarterTones({ letter: 'A', octave: 0 })).toBe(18);
  });

  it('counts staff steps from middle C', () => {
    expect(staffSteps({ letter: 'C', octave: 4 })).toBe(0);
    expect(staffSteps({ letter: 'B', octave: 3 })).toBe(-1);
    expect(staffSteps({ letter: 'E', octave: 5 })).toBe(9);
  });
});

describe('dynamics', () => {
  it('orders graded dynamics by loudness', () => {
    expect(compareDynamics('p', 'f')).toBe(-3);
    expect(compareDynamics('fff', 'ppp')).toBe(7);
    expect(compareDynamics('mf', 'mf')).toBe(0);
  });

  it('treats accent dynamics as equal to anything', () => {
    expect(dynamicLevel('sfz')).toBeUndefined();
    expect(compareDynamics('sfz', 'p')).toBe(0);
    expect(compareDynamics('fffff', 'n')).toBe(0);
  });
});

describe('key signatures', () => {
  it('names the standard keys', () => {
    expect(keyName(0)).toBe('C');
    expect(keyName(4)).toBe('D');
    expect(keyName(-6)).toBe('Eb');
    expect(keyName(14)).toBe('C#');
    expect(keyName(-14)).toBe('Cb');
  });

  it('names quarter-tone keys after the key below them', () => {
    expect(keyName(3)).toBe('G+1/4');
    expect(keyName(-3)).toBe('Bb+1/4');
    expect(isMicrotonalKey(-3)).toBe(true);
    expect(keyAccidentalCount(3)).toBe(2);
  });

  it('falls back to the index outside the key table', () => {
    expect(keyName(16)).toBe('key 16');
  });
});

describe('notePitches', () => {
  it('lists the written pitch before the chord members', () => {
    expect(
      notePitches({
        kind: 'note',
        pitch: { letter: 'C', octave: 4 },
        chord: [{ letter: 'E', octave: 4 }],
        duration: fraction(1, 4),
        articulations: [],
        tie: false
      })
    ).toEqual([
      { letter: 'C', octave: 4 },
      { letter: 'E', octave: 4 }
    ]);
  });
});
