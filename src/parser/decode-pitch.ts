import { isMicrotonalAccidental, PITCH_LETTERS, type Pitch, type PitchLetter } from '../core/notation.js';
import { consumeSymbol, peek, type DecodeContext, type DecodeError } from './decode-context.js';
import { ACCIDENTAL_SYMBOLS, OCTAVE_VALUES } from './notation-symbols.js';

export type PitchScan = { ok: true; pitch: Pitch } | { ok: false; error: DecodeError };

function toPitchLetter(char: string | undefined): PitchLetter | undefined {
  return PITCH_LETTERS.find((letter) => letter === char);
}

/** Scan `LETTER accidental? OCTAVE` at the cursor. */
export function scanPitch(ctx: DecodeContext): PitchScan {
  const start = ctx.position;
  const letter = toPitchLetter(peek(ctx));
  if (!letter) {
    return { ok: false, error: { kind: 'unrecognized-token', position: start } };
  }
  ctx.position += 1;

  const accidentalPosition = ctx.position;
  const accidental = consumeSymbol(ctx, ACCIDENTAL_SYMBOLS);
  if (accidental && !ctx.microtonal && isMicrotonalAccidental(accidental)) {
    return { ok: false, error: { kind: 'invalid-accidental', position: accidentalPosition } };
  }

  const octaveChar = peek(ctx);
  const octave = octaveChar === undefined ? undefined : OCTAVE_VALUES[octaveChar];
  if (octave === undefined) {
    return { ok: false, error: { kind: 'unrecognized-token', position: ctx.position } };
  }
  ctx.position += 1;

  return { ok: true, pitch: accidental ? { letter, accidental, octave } : { letter, octave } };
}
