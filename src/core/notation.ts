import type { Fraction } from './fraction.js';

/** Natural pitch names in staff order starting from C. */
export const PITCH_LETTERS = ['C', 'D', 'E', 'F', 'G', 'A', 'B'] as const;

export type PitchLetter = (typeof PITCH_LETTERS)[number];

/** Accidentals from double flat to double sharp, including quarter-tone steps. */
export type Accidental =
  | 'double-flat'
  | 'three-quarter-flat'
  | 'flat'
  | 'quarter-flat'
  | 'natural'
  | 'quarter-sharp'
  | 'sharp'
  | 'three-quarter-sharp'
  | 'double-sharp';

/** Alteration of each accidental in quarter tones. */
export const ACCIDENTAL_QUARTER_TONES: Readonly<Record<Accidental, number>> = {
  'double-flat': -4,
  'three-quarter-flat': -3,
  flat: -2,
  'quarter-flat': -1,
  natural: 0,
  'quarter-sharp': 1,
  sharp: 2,
  'three-quarter-sharp': 3,
  'double-sharp': 4
};

/** Accidentals that only exist in quarter-tone keys. */
export function isMicrotonalAccidental(accidental: Accidental): boolean {
  return ACCIDENTAL_QUARTER_TONES[accidental] % 2 !== 0;
}

/** Written pitch; `octave` follows scientific pitch notation (C4 is middle C). */
export interface Pitch {
  readonly letter: PitchLetter;
  readonly octave: number;
  readonly accidental?: Accidental;
}

/** Graded dynamics from softest to loudest. */
export const GRADED_DYNAMICS = [
  'ppppp',
  'pppp',
  'ppp',
  'pp',
  'p',
  'mp',
  'mf',
  'f',
  'ff',
  'fff',
  'ffff',
  'fffff'
] as const;

/** Accent dynamics and niente, which sit outside the loudness scale. */
export const ACCENT_DYNAMICS = ['sf', 'sfz', 'fp', 'sfp', 'n'] as const;

export type Dynamic = (typeof GRADED_DYNAMICS)[number] | (typeof ACCENT_DYNAMICS)[number];

export type Articulation =
  | 'marcato'
  | 'accent'
  | 'staccato'
  | 'staccatissimo'
  | 'tenuto'
  | 'closed-mute'
  | 'open-mute'
  | 'harmonic'
  | 'pedal';

/** Canonical articulation order; decoded sets are sorted by it. */
export const ARTICULATION_ORDER: readonly Articulation[] = [
  'marcato',
  'accent',
  'staccato',
  'staccatissimo',
  'tenuto',
  'closed-mute',
  'open-mute',
  'harmonic',
  'pedal'
];

export type Ornament = 'trill' | 'turn' | 'inverted-turn' | 'tremolo';

/** Scoop/plop bend into the note, doit/fall bend out of it. */
export type PitchBend = 'scoop' | 'plop' | 'doit' | 'fall';

export type SlurRole = 'start' | 'end';

export type MarkingKind =
  | 'breath'
  | 'caesura-short'
  | 'caesura-long'
  | 'crescendo-start'
  | 'decrescendo-start'
  | 'pizzicato-start'
  | 'arco-start'
  | 'mute-start'
  | 'open-start'
  | 'measure-repeat';

export interface NoteToken {
  readonly kind: 'note';
  /** First written pitch; the only one for a single note. */
  readonly pitch: Pitch;
  /** Further pitches sounding with `pitch`, in written order. Absent for a single note. */
  readonly chord?: readonly Pitch[];
  readonly duration: Fraction;
  readonly dynamic?: Dynamic;
  readonly articulations: readonly Articulation[];
  readonly ornament?: Ornament;
  readonly bend?: PitchBend;
  /** Tied into the following note. */
  readonly tie: boolean;
  readonly slur?: SlurRole;
}

export interface RestToken {
  readonly kind: 'rest';
  readonly duration: Fraction;
}

/**
 * Ornamental pitch that takes no beat time. It leads into the next note,
 * or with `after` set it trails off the preceding one.
 */
export interface GraceToken {
  readonly kind: 'grace';
  readonly pitch: Pitch;
  readonly after?: true;
}

export interface MarkingToken {
  readonly kind: 'marking';
  readonly marking: MarkingKind;
}

/** One decoded event of a channel notation string. */
export type NotationToken = NoteToken | RestToken | GraceToken | MarkingToken;

/** Diatonic distance from middle C (C4 = 0, D4 = 1, B3 = -1). */
export function staffSteps(pitch: Pitch): number {
  return PITCH_LETTERS.indexOf(pitch.letter) + (pitch.octave - 4) * 7;
}

/** Semitone offsets of the natural letters above C, in quarter tones. */
const LETTER_QUARTER_TONES: Readonly<Record<PitchLetter, number>> = {
  C: 0,
  D: 4,
  E: 8,
  F: 10,
  G: 14,
  A: 18,
  B: 22
};

/** Pitch class in quarter tones (0-23), with accidentals wrapping across octaves. */
export function pitchClassQuarterTones(pitch: Pitch): number {
  const alteration = pitch.accidental ? ACCIDENTAL_QUARTER_TONES[pitch.accidental] : 0;
  const raw = LETTER_QUARTER_TONES[pitch.letter] + alteration;
  return ((raw % 24) + 24) % 24;
}

/** Position of a graded dynamic on the loudness scale, `undefined` for accent dynamics. */
export function dynamicLevel(dynamic: Dynamic): number | undefined {
  const index = GRADED_DYNAMICS.findIndex((entry) => entry === dynamic);
  return index >= 0 ? index : undefined;
}

/** Order two graded dynamics by loudness; accent dynamics compare as equal to anything. */
export function compareDynamics(left: Dynamic, right: Dynamic): number {
  const leftLevel = dynamicLevel(left);
  const rightLevel = dynamicLevel(right);
  if (leftLevel === undefined || rightLevel === undefined) {
    return 0;
  }
  return leftLevel - rightLevel;
}

/** Every written pitch of a note, chord members included. */
export function notePitches(token: NoteToken): readonly Pitch[] {
  return token.chord ? [token.pitch, ...token.chord] : [token.pitch];
}

/** Duration contributed to the beat count; grace notes and markings contribute none. */
export function tokenDuration(token: NotationToken): Fraction | undefined {
  return token.kind === 'note' || token.kind === 'rest' ? token.duration : undefined;
}

/** True when the sequence is a single measure-repeat sign. */
export function isMeasureRepeat(tokens: readonly NotationToken[]): boolean {
  const [only] = tokens;
  return tokens.length === 1 && only?.kind === 'marking' && only.marking === 'measure-repeat';
}
