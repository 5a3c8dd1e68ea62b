import { fractionsEqual, formatFraction, type Fraction } from '../core/fraction.js';
import type { NotationToken, NoteToken, Pitch } from '../core/notation.js';
import { DEFAULT_DURATION } from './decode-context.js';
import {
  ACCIDENTAL_SYMBOLS,
  ARTICULATION_TEXT,
  BEND_SYMBOLS,
  CHORD_CLOSE_CHAR,
  CHORD_OPEN_CHAR,
  GRACE_AFTER_CHAR,
  GRACE_CLOSE_CHAR,
  GRACE_OPEN_CHAR,
  MARKING_SYMBOLS,
  ORNAMENT_SYMBOLS,
  OCTAVE_VALUES,
  REST_CHAR,
  SLUR_END_CHAR,
  SLUR_START_CHAR,
  symbolFor,
  TIE_CHAR
} from './notation-symbols.js';

/** Raised for tokens that have no notation spelling (e.g. an octave outside -1..9). */
export class NotationEncodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotationEncodeError';
  }
}

function encodeOctave(octave: number): string {
  const entry = Object.entries(OCTAVE_VALUES).find(([, value]) => value === octave);
  if (!entry) {
    throw new NotationEncodeError(`Octave ${octave} cannot be written.`);
  }
  return entry[0];
}

/** Spell a pitch as `LETTER accidental? OCTAVE`. */
export function encodePitch(pitch: Pitch): string {
  const accidental = pitch.accidental ? (symbolFor(ACCIDENTAL_SYMBOLS, pitch.accidental) ?? '') : '';
  return `${pitch.letter}${accidental}${encodeOctave(pitch.octave)}`;
}

function encodeDurationPrefix(duration: Fraction, current: Fraction): string {
  return fractionsEqual(duration, current) ? '' : formatFraction(duration);
}

function encodeNote(note: NoteToken, current: Fraction): string {
  const parts = [encodeDurationPrefix(note.duration, current), note.dynamic ?? ''];
  for (const articulation of note.articulations) {
    parts.push(ARTICULATION_TEXT[articulation]);
  }
  if (note.ornament) {
    parts.push(symbolFor(ORNAMENT_SYMBOLS, note.ornament) ?? '');
  }
  if (note.bend) {
    parts.push(symbolFor(BEND_SYMBOLS, note.bend) ?? '');
  }
  if (note.slur === 'start') {
    parts.push(SLUR_START_CHAR);
  }
  if (note.chord && note.chord.length > 0) {
    parts.push(CHORD_OPEN_CHAR, encodePitch(note.pitch), ...note.chord.map(encodePitch), CHORD_CLOSE_CHAR);
  } else {
    parts.push(encodePitch(note.pitch));
  }
  if (note.tie) {
    parts.push(TIE_CHAR);
  }
  if (note.slur === 'end') {
    parts.push(SLUR_END_CHAR);
  }
  return parts.join('');
}

/**
 * Canonical notation text for a token sequence.
 * Duration prefixes appear only where the duration changes, so
 * `decodeNotation(encodeNotation(tokens))` yields `tokens` again.
 */
export function encodeNotation(tokens: readonly NotationToken[]): string {
  let current = DEFAULT_DURATION;
  // Placement of the open grace group, if any.
  let group: 'before' | 'after' | undefined;
  let text = '';

  for (const token of tokens) {
    if (token.kind === 'grace') {
      const placement = token.after ? 'after' : 'before';
      if (group !== placement) {
        if (group) {
          text += GRACE_CLOSE_CHAR;
        }
        text += placement === 'after' ? GRACE_OPEN_CHAR + GRACE_AFTER_CHAR : GRACE_OPEN_CHAR;
        group = placement;
      }
      text += encodePitch(token.pitch);
      continue;
    }

    if (group) {
      text += GRACE_CLOSE_CHAR;
      group = undefined;
    }

    switch (token.kind) {
      case 'note':
        text += encodeNote(token, current);
        current = token.duration;
        break;
      case 'rest':
        text += encodeDurationPrefix(token.duration, current) + REST_CHAR;
        current = token.duration;
        break;
      case 'marking':
        text += symbolFor(MARKING_SYMBOLS, token.marking) ?? '';
        break;
    }
  }

  if (group) {
    text += GRACE_CLOSE_CHAR;
  }
  return text;
}
