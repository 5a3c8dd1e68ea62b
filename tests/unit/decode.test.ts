import { describe, expect, it } from 'vitest';

import { fraction } from '../../src/core/fraction.js';
import type { NotationToken } from '../../src/core/notation.js';
import { decodeErrorToDiagnostic, type DecodeErrorKind } from '../../src/parser/decode-context.js';
import { decodeNotation } from '../../src/parser/decode.js';

function tokensOf(raw: string, microtonal = false): NotationToken[] {
  const result = decodeNotation(raw, { microtonal });
  if (!result.ok) {
    throw new Error(`decode failed: ${result.error.kind} at ${result.error.position}`);
  }
  return result.tokens;
}

const QUARTER = fraction(1, 4);

describe('decodeNotation', () => {
  it('decodes plain pitches with the default quarter duration', () => {
    expect(tokensOf('C4D4E4')).toEqual([
      { kind: 'note', pitch: { letter: 'C', octave: 4 }, duration: QUARTER, articulations: [], tie: false },
      { kind: 'note', pitch: { letter: 'D', octave: 4 }, duration: QUARTER, articulations: [], tie: false },
      { kind: 'note', pitch: { letter: 'E', octave: 4 }, duration: QUARTER, articulations: [], tie: false }
    ]);
  });

  it('keeps an explicit duration in force for later notes and rests', () => {
    const tokens = tokensOf('1/8C4D4R3/8E4');
    expect(tokens.map((token) => ('duration' in token ? token.duration : undefined))).toEqual([
      fraction(1, 8),
      fraction(1, 8),
      fraction(1, 8),
      fraction(3, 8)
    ]);
  });

  it('reads accidentals with longest match first', () => {
    const tokens = tokensOf('Bbb3Eb4F#4Gx4An5');
    expect(tokens.map((token) => (token.kind === 'note' ? token.pitch.accidental : undefined))).toEqual([
      'double-flat',
      'flat',
      'sharp',
      'double-sharp',
      'natural'
    ]);
  });

  it('reads octave -1 from a dash and a tie after it', () => {
    expect(tokensOf('C--')).toEqual([
      { kind: 'note', pitch: { letter: 'C', octave: -1 }, duration: QUARTER, articulations: [], tie: true }
    ]);
  });

  it('attaches prefixes and suffixes to the anchored note', () => {
    expect(tokensOf('1/2mf_.$$//(G5-')).toEqual([
      {
        kind: 'note',
        pitch: { letter: 'G', octave: 5 },
        duration: fraction(1, 2),
        dynamic: 'mf',
        articulations: ['staccato', 'tenuto'],
        ornament: 'inverted-turn',
        bend: 'doit',
        tie: true,
        slur: 'start'
      }
    ]);
  });

  it('sorts articulations into canonical order and ignores repeats', () => {
    const [note] = tokensOf("'|^^C4");
    expect(note).toMatchObject({ articulations: ['marcato', 'staccatissimo', 'pedal'] });
  });

  it('reads a slur end suffix', () => {
    const [, second] = tokensOf('(C4D4)');
    expect(second).toMatchObject({ kind: 'note', slur: 'end', tie: false });
  });

  it('prefers markings over articulation prefixes for doubled symbols', () => {
    expect(tokensOf('>>>C4')).toEqual([
      { kind: 'marking', marking: 'decrescendo-start' },
      { kind: 'note', pitch: { letter: 'C', octave: 4 }, duration: QUARTER, articulations: ['accent'], tie: false }
    ]);
  });

  it('decodes every stand-alone marking', () => {
    expect(tokensOf(',:;<<>>!p!a!m!o').map((token) => (token.kind === 'marking' ? token.marking : token.kind))).toEqual([
      'breath',
      'caesura-long',
      'caesura-short',
      'crescendo-start',
      'decrescendo-start',
      'pizzicato-start',
      'arco-start',
      'mute-start',
      'open-start'
    ]);
  });

  it('decodes grace groups as zero-duration pitches before their target', () => {
    expect(tokensOf('{D4Eb4}C4')).toEqual([
      { kind: 'grace', pitch: { letter: 'D', octave: 4 } },
      { kind: 'grace', pitch: { letter: 'E', accidental: 'flat', octave: 4 } },
      { kind: 'note', pitch: { letter: 'C', octave: 4 }, duration: QUARTER, articulations: [], tie: false }
    ]);
  });

  it('decodes trailing grace groups after the note they ornament', () => {
    expect(tokensOf('C4{>D4E4}{F4}G4')).toEqual([
      { kind: 'note', pitch: { letter: 'C', octave: 4 }, duration: QUARTER, articulations: [], tie: false },
      { kind: 'grace', pitch: { letter: 'D', octave: 4 }, after: true },
      { kind: 'grace', pitch: { letter: 'E', octave: 4 }, after: true },
      { kind: 'grace', pitch: { letter: 'F', octave: 4 } },
      { kind: 'note', pitch: { letter: 'G', octave: 4 }, duration: QUARTER, articulations: [], tie: false }
    ]);
  });

  it('decodes a chord as one note with its further pitches', () => {
    expect(tokensOf('1/2mf[C4Eb4G4]-')).toEqual([
      {
        kind: 'note',
        pitch: { letter: 'C', octave: 4 },
        chord: [
          { letter: 'E', accidental: 'flat', octave: 4 },
          { letter: 'G', octave: 4 }
        ],
        duration: fraction(1, 2),
        dynamic: 'mf',
        articulations: [],
        tie: true
      }
    ]);
  });

  it('decodes a single bracketed pitch as a plain note', () => {
    expect(tokensOf('[D4]')).toEqual(tokensOf('D4'));
  });

  it('decodes a lone % as a measure repeat', () => {
    expect(tokensOf('%')).toEqual([{ kind: 'marking', marking: 'measure-repeat' }]);
  });

  it('decodes an empty channel to no tokens', () => {
    expect(tokensOf('')).toEqual([]);
  });

  it('accepts quarter-tone accidentals only in microtonal mode', () => {
    expect(decodeNotation('Ct4')).toEqual({ ok: false, error: { kind: 'invalid-accidental', position: 1 } });
    expect(tokensOf('Ct4Dt#4Edb4Fd4', true).map((token) => (token.kind === 'note' ? token.pitch.accidental : ''))).toEqual([
      'quarter-sharp',
      'three-quarter-sharp',
      'three-quarter-flat',
      'quarter-flat'
    ]);
  });
});

describe('decodeNotation errors', () => {
  const cases: Array<[string, DecodeErrorKind, number]> = [
    ['Q', 'unrecognized-token', 0],
    ['C4 D4', 'unrecognized-token', 2],
    ['C', 'unrecognized-token', 1],
    ['1C4', 'unrecognized-token', 1],
    ['0/4C4', 'invalid-duration', 0],
    ['1/2048C4', 'invalid-duration', 0],
    ['C4mf', 'dangling-modifier', 2],
    ['>R', 'dangling-modifier', 0],
    ['1/8>,C4', 'dangling-modifier', 0],
    ['p f C4', 'unrecognized-token', 1],
    ['mfpC4', 'unrecognized-token', 0],
    ['~*C4', 'duplicate-modifier', 1],
    ['C4--', 'duplicate-modifier', 3],
    ['(C4)', 'duplicate-modifier', 3],
    ['{C4', 'unbalanced-grace', 0],
    ['C4}', 'unbalanced-grace', 2],
    ['{C4{D4}}E4', 'unbalanced-grace', 3],
    ['C4{D4}', 'grace-without-target', 2],
    ['{D4}R', 'grace-without-target', 0],
    ['{}C4', 'grace-without-target', 0],
    ["{'D4}C4", 'invalid-grace-content', 1],
    ['{[C4]}D4', 'invalid-grace-content', 1],
    ['{>D4}C4', 'grace-without-target', 0],
    ['R{>D4}', 'grace-without-target', 1],
    ['{D4}{>E4}C4', 'grace-without-target', 4],
    ['C4{>}', 'grace-without-target', 2],
    ['[]C4', 'invalid-chord', 0],
    ['[C4E4', 'invalid-chord', 0],
    ['[C4-E4]', 'invalid-chord', 3],
    ['C4%', 'misplaced-measure-repeat', 2],
    ['R-', 'unrecognized-token', 1]
  ];

  it.each(cases)('rejects %j as %s at %d', (raw, kind, position) => {
    expect(decodeNotation(raw)).toEqual({ ok: false, error: { kind, position } });
  });

  it('converts a decode error into a located diagnostic', () => {
    expect(decodeErrorToDiagnostic({ kind: 'unrecognized-token', position: 0 }, { bar: 2, channel: 1 })).toEqual({
      code: 'NOTATION_UNRECOGNIZED_TOKEN',
      severity: 'error',
      message: 'Unrecognized notation token at column 0.',
      source: { bar: 2, channel: 1, position: 0 }
    });
  });
});
