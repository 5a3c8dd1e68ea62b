import type {
  Accidental,
  Articulation,
  Dynamic,
  MarkingKind,
  Ornament,
  PitchBend
} from '../core/notation.js';
import { ACCENT_DYNAMICS, GRADED_DYNAMICS } from '../core/notation.js';

/** Symbol table entry: notation text and the value it stands for. */
export type SymbolTable<T> = ReadonlyArray<readonly [string, T]>;

// Every table lists two-character symbols ahead of the single characters they
// start with, so `consumeSymbol` implements greedy longest match.

export const ACCIDENTAL_SYMBOLS: SymbolTable<Accidental> = [
  ['bb', 'double-flat'],
  ['db', 'three-quarter-flat'],
  ['t#', 'three-quarter-sharp'],
  ['b', 'flat'],
  ['d', 'quarter-flat'],
  ['n', 'natural'],
  ['t', 'quarter-sharp'],
  ['#', 'sharp'],
  ['x', 'double-sharp']
];

export const ARTICULATION_SYMBOLS: SymbolTable<readonly Articulation[]> = [
  ['_.', ['tenuto', 'staccato']],
  ['^.', ['marcato', 'staccato']],
  ['^_', ['marcato', 'tenuto']],
  ['>.', ['accent', 'staccato']],
  ['>_', ['accent', 'tenuto']],
  ['^', ['marcato']],
  ['>', ['accent']],
  ['.', ['staccato']],
  ["'", ['staccatissimo']],
  ['_', ['tenuto']],
  ['+', ['closed-mute']],
  ['o', ['open-mute']],
  ['@', ['harmonic']],
  ['|', ['pedal']]
];

export const ORNAMENT_SYMBOLS: SymbolTable<Ornament> = [
  ['$$', 'inverted-turn'],
  ['$', 'turn'],
  ['~', 'trill'],
  ['*', 'tremolo']
];

export const BEND_SYMBOLS: SymbolTable<PitchBend> = [
  ['//', 'doit'],
  ['/', 'scoop'],
  ['\\\\', 'fall'],
  ['\\', 'plop']
];

/** Stand-alone markings; `>>` must win over the `>` accent prefix. */
export const MARKING_SYMBOLS: SymbolTable<MarkingKind> = [
  ['>>', 'decrescendo-start'],
  ['<<', 'crescendo-start'],
  ['!p', 'pizzicato-start'],
  ['!a', 'arco-start'],
  ['!m', 'mute-start'],
  ['!o', 'open-start'],
  [',', 'breath'],
  [';', 'caesura-short'],
  [':', 'caesura-long'],
  ['%', 'measure-repeat']
];

/** Characters a dynamic run is made of. */
export const DYNAMIC_CHARS = 'pmfszn';

const DYNAMIC_NAMES: ReadonlySet<string> = new Set<string>([...GRADED_DYNAMICS, ...ACCENT_DYNAMICS]);

export function isDynamic(text: string): text is Dynamic {
  return DYNAMIC_NAMES.has(text);
}

export const PITCH_LETTER_CHARS = 'CDEFGAB';

export const REST_CHAR = 'R';

/** Written octave characters: `-` is octave -1. */
export const OCTAVE_VALUES: Readonly<Record<string, number>> = {
  '-': -1,
  '0': 0,
  '1': 1,
  '2': 2,
  '3': 3,
  '4': 4,
  '5': 5,
  '6': 6,
  '7': 7,
  '8': 8,
  '9': 9
};

export const TIE_CHAR = '-';
export const SLUR_START_CHAR = '(';
export const SLUR_END_CHAR = ')';
export const GRACE_OPEN_CHAR = '{';
export const GRACE_CLOSE_CHAR = '}';
/** Follows `{` to mark a group that trails the preceding note. */
export const GRACE_AFTER_CHAR = '>';
export const CHORD_OPEN_CHAR = '[';
export const CHORD_CLOSE_CHAR = ']';

/** Single-character spelling of each articulation, used by the encoder. */
export const ARTICULATION_TEXT: Readonly<Record<Articulation, string>> = {
  marcato: '^',
  accent: '>',
  staccato: '.',
  staccatissimo: "'",
  tenuto: '_',
  'closed-mute': '+',
  'open-mute': 'o',
  harmonic: '@',
  pedal: '|'
};

/** Reverse lookup for a symbol table with unique values. */
export function symbolFor<T>(table: SymbolTable<T>, value: T): string | undefined {
  return table.find((entry) => entry[1] === value)?.[0];
}
