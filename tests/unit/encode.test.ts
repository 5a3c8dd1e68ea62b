import { describe, expect, it } from 'vitest';

import { fraction } from '../../src/core/fraction.js';
import type { NotationToken } from '../../src/core/notation.js';
import { decodeNotation } from '../../src/parser/decode.js';
import { encodeNotation, NotationEncodeError } from '../../src/parser/encode.js';

describe('encodeNotation', () => {
  it('omits duration prefixes that match the running duration', () => {
    const tokens: NotationToken[] = [
      { kind: 'note', pitch: { letter: 'C', octave: 4 }, duration: fraction(1, 4), articulations: [], tie: false },
      { kind: 'note', pitch: { letter: 'D', octave: 4 }, duration: fraction(1, 8), articulations: [], tie: false },
      { kind: 'rest', duration: fraction(1, 8) },
      { kind: 'rest', duration: fraction(1, 2) }
    ];
    expect(encodeNotation(tokens)).toBe('C41/8D4R1/2R');
  });

  it('writes prefixes in canonical order around the anchor', () => {
    const tokens: NotationToken[] = [
      {
        kind: 'note',
        pitch: { letter: 'F', accidental: 'sharp', octave: 5 },
        duration: fraction(1, 4),
        dynamic: 'sfz',
        articulations: ['accent', 'staccato'],
        ornament: 'trill',
        bend: 'fall',
        tie: true,
        slur: 'end'
      }
    ];
    expect(encodeNotation(tokens)).toBe('sfz>.~\\\\F#5-)');
  });

  it('groups consecutive grace notes in braces', () => {
    const tokens: NotationToken[] = [
      { kind: 'grace', pitch: { letter: 'D', octave: 4 } },
      { kind: 'grace', pitch: { letter: 'E', octave: 4 } },
      { kind: 'note', pitch: { letter: 'C', octave: 4 }, duration: fraction(1, 4), articulations: [], tie: false },
      { kind: 'marking', marking: 'breath' }
    ];
    expect(encodeNotation(tokens)).toBe('{D4E4}C4,');
  });

  it('writes chords in brackets and trailing grace groups with a leading >', () => {
    const tokens: NotationToken[] = [
      {
        kind: 'note',
        pitch: { letter: 'C', octave: 4 },
        chord: [{ letter: 'G', octave: 4 }],
        duration: fraction(1, 4),
        articulations: [],
        tie: true
      },
      { kind: 'grace', pitch: { letter: 'D', octave: 4 }, after: true },
      { kind: 'grace', pitch: { letter: 'E', octave: 4 } },
      { kind: 'note', pitch: { letter: 'F', octave: 4 }, duration: fraction(1, 4), articulations: [], tie: false }
    ];
    expect(encodeNotation(tokens)).toBe('[C4G4]-{>D4}{E4}F4');
  });

  it.each([
    'C4D4E4',
    '1/8C4D4R3/8E4',
    '>>>C4<<p^.$C#4',
    '{D4Eb4}1/2(G4-G4)',
    '1/2mf[C4E4G4]{>A4B4}(D4',
    "1/16'Bbb-|@A9+oC0",
    '!pC4!aD4!mE4!oF4,G4;A4:B4',
    '%'
  ])('decodes the encoding of %j back to the same tokens', (raw) => {
    const decoded = decodeNotation(raw);
    if (!decoded.ok) {
      throw new Error(`fixture ${raw} does not decode`);
    }
    expect(decodeNotation(encodeNotation(decoded.tokens))).toEqual(decoded);
  });

  it('rejects octaves that have no single-character spelling', () => {
    expect(() =>
      encodeNotation([
        { kind: 'note', pitch: { letter: 'C', octave: 10 }, duration: fraction(1, 4), articulations: [], tie: false }
      ])
    ).toThrow(NotationEncodeError);
  });
});
