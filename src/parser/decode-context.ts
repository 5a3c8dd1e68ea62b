import type { Diagnostic, DiagnosticSource } from '../core/diagnostics.js';
import { fraction, type Fraction } from '../core/fraction.js';

/** Structured decoder failure kinds. */
export type DecodeErrorKind =
  | 'unrecognized-token'
  | 'invalid-accidental'
  | 'invalid-duration'
  | 'dangling-modifier'
  | 'duplicate-modifier'
  | 'unbalanced-grace'
  | 'grace-without-target'
  | 'invalid-grace-content'
  | 'invalid-chord'
  | 'misplaced-measure-repeat';

/** Decoder failure addressed by zero-based character offset. */
export interface DecodeError {
  readonly kind: DecodeErrorKind;
  readonly position: number;
}

/** Diagnostic code and message template for each decode failure. */
const DECODE_ERROR_TEXT: Readonly<Record<DecodeErrorKind, { code: string; message: string }>> = {
  'unrecognized-token': { code: 'NOTATION_UNRECOGNIZED_TOKEN', message: 'Unrecognized notation token' },
  'invalid-accidental': {
    code: 'NOTATION_INVALID_ACCIDENTAL',
    message: 'Quarter-tone accidental used outside a quarter-tone key'
  },
  'invalid-duration': { code: 'NOTATION_INVALID_DURATION', message: 'Duration must be a positive fraction' },
  'dangling-modifier': {
    code: 'NOTATION_DANGLING_MODIFIER',
    message: 'Modifier is not followed by a note it can attach to'
  },
  'duplicate-modifier': {
    code: 'NOTATION_DUPLICATE_MODIFIER',
    message: 'Modifier of this kind is already set on the same note'
  },
  'unbalanced-grace': { code: 'NOTATION_UNBALANCED_GRACE', message: 'Grace group braces do not balance' },
  'grace-without-target': {
    code: 'NOTATION_GRACE_WITHOUT_TARGET',
    message: 'Grace notes must be followed by the note they ornament'
  },
  'invalid-grace-content': {
    code: 'NOTATION_INVALID_GRACE_CONTENT',
    message: 'Grace groups may only contain pitches'
  },
  'invalid-chord': {
    code: 'NOTATION_INVALID_CHORD',
    message: 'Chord brackets must enclose one or more pitches'
  },
  'misplaced-measure-repeat': {
    code: 'NOTATION_MISPLACED_MEASURE_REPEAT',
    message: "Measure repeat '%' must be the only content of a channel"
  }
};

/** Convert a decode failure into a canonical diagnostic. */
export function decodeErrorToDiagnostic(error: DecodeError, source: DiagnosticSource = {}): Diagnostic {
  const text = DECODE_ERROR_TEXT[error.kind];
  return {
    code: text.code,
    severity: 'error',
    message: `${text.message} at column ${error.position}.`,
    source: { ...source, position: error.position }
  };
}

/** Decoder options. */
export interface DecodeOptions {
  /** Allow quarter-tone accidentals (set when the active key is a quarter-tone key). */
  microtonal?: boolean;
}

/** Duration in force before the first explicit duration prefix. */
export const DEFAULT_DURATION: Fraction = fraction(1, 4);

/** Mutable scanner state for one decode invocation. */
export interface DecodeContext {
  readonly text: string;
  readonly microtonal: boolean;
  position: number;
  /** Sticky duration applied to notes and rests without a prefix. */
  duration: Fraction;
}

/** Create a scanner positioned at the start of `text`. */
export function createDecodeContext(text: string, options: DecodeOptions = {}): DecodeContext {
  return {
    text,
    microtonal: options.microtonal ?? false,
    position: 0,
    duration: DEFAULT_DURATION
  };
}

/** Character `offset` places ahead of the cursor, `undefined` past the end. */
export function peek(ctx: DecodeContext, offset = 0): string | undefined {
  const index = ctx.position + offset;
  return index < ctx.text.length ? ctx.text.charAt(index) : undefined;
}

export function atEnd(ctx: DecodeContext): boolean {
  return ctx.position >= ctx.text.length;
}

/**
 * Match the longest symbol of `table` at the cursor and consume it.
 * Tables list two-character symbols before their one-character prefixes.
 */
export function consumeSymbol<T>(ctx: DecodeContext, table: ReadonlyArray<readonly [string, T]>): T | undefined {
  for (const [symbol, value] of table) {
    if (ctx.text.startsWith(symbol, ctx.position)) {
      ctx.position += symbol.length;
      return value;
    }
  }
  return undefined;
}

/** Consume a run of characters from `charset`, returning the run text. */
export function consumeRun(ctx: DecodeContext, charset: string): string {
  const start = ctx.position;
  while (!atEnd(ctx) && charset.includes(ctx.text.charAt(ctx.position))) {
    ctx.position += 1;
  }
  return ctx.text.slice(start, ctx.position);
}
