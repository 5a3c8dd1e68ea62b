import { fraction, type Fraction } from '../core/fraction.js';
import {
  ARTICULATION_ORDER,
  type Articulation,
  type Dynamic,
  type NotationToken,
  type NoteToken,
  type Ornament,
  type Pitch,
  type PitchBend,
  type SlurRole
} from '../core/notation.js';
import {
  atEnd,
  consumeRun,
  consumeSymbol,
  createDecodeContext,
  peek,
  type DecodeContext,
  type DecodeError,
  type DecodeErrorKind,
  type DecodeOptions
} from './decode-context.js';
import { scanPitch } from './decode-pitch.js';
import {
  ARTICULATION_SYMBOLS,
  BEND_SYMBOLS,
  CHORD_CLOSE_CHAR,
  CHORD_OPEN_CHAR,
  DYNAMIC_CHARS,
  GRACE_AFTER_CHAR,
  GRACE_CLOSE_CHAR,
  GRACE_OPEN_CHAR,
  isDynamic,
  MARKING_SYMBOLS,
  ORNAMENT_SYMBOLS,
  PITCH_LETTER_CHARS,
  REST_CHAR,
  SLUR_END_CHAR,
  SLUR_START_CHAR,
  TIE_CHAR
} from './notation-symbols.js';

/** Largest numerator or denominator accepted in a duration prefix. */
export const MAX_DURATION_COMPONENT = 1024;

export type DecodeResult = { ok: true; tokens: NotationToken[] } | { ok: false; error: DecodeError };

/** Prefixes collected ahead of the next anchor. */
interface PendingModifiers {
  /** Position of the first prefix, reported when the prefixes dangle. */
  first?: number;
  /** Position of the first prefix a rest cannot take (anything but a duration). */
  firstNoteOnly?: number;
  duration?: Fraction;
  dynamic?: Dynamic;
  articulations: Set<Articulation>;
  ornament?: Ornament;
  bend?: PitchBend;
  slurStart: boolean;
}

function emptyPending(): PendingModifiers {
  return { articulations: new Set(), slurStart: false };
}

function hasPending(pending: PendingModifiers): boolean {
  return pending.first !== undefined;
}

function fail(kind: DecodeErrorKind, position: number): DecodeResult {
  return { ok: false, error: { kind, position } };
}

function markPrefix(pending: PendingModifiers, position: number, noteOnly: boolean): void {
  pending.first ??= position;
  if (noteOnly) {
    pending.firstNoteOnly ??= position;
  }
}

type PrefixScan = { matched: false } | { matched: true; error?: DecodeError };

const NO_MATCH: PrefixScan = { matched: false };
const MATCHED: PrefixScan = { matched: true };

function prefixError(kind: DecodeErrorKind, position: number): PrefixScan {
  return { matched: true, error: { kind, position } };
}

function scanDuration(ctx: DecodeContext, pending: PendingModifiers): PrefixScan {
  const start = ctx.position;
  const numeratorText = consumeRun(ctx, '0123456789');
  if (numeratorText.length === 0) {
    return NO_MATCH;
  }
  if (peek(ctx) !== '/') {
    return prefixError('unrecognized-token', ctx.position);
  }
  ctx.position += 1;
  const denominatorText = consumeRun(ctx, '0123456789');
  if (denominatorText.length === 0) {
    return prefixError('unrecognized-token', ctx.position);
  }

  const numerator = Number(numeratorText);
  const denominator = Number(denominatorText);
  if (
    numerator <= 0 ||
    denominator <= 0 ||
    numerator > MAX_DURATION_COMPONENT ||
    denominator > MAX_DURATION_COMPONENT
  ) {
    return prefixError('invalid-duration', start);
  }
  if (pending.duration) {
    return prefixError('duplicate-modifier', start);
  }
  pending.duration = fraction(numerator, denominator);
  markPrefix(pending, start, false);
  return MATCHED;
}

function scanDynamic(ctx: DecodeContext, pending: PendingModifiers): PrefixScan {
  const start = ctx.position;
  const text = consumeRun(ctx, DYNAMIC_CHARS);
  if (text.length === 0) {
    return NO_MATCH;
  }
  if (!isDynamic(text)) {
    return prefixError('unrecognized-token', start);
  }
  if (pending.dynamic) {
    return prefixError('duplicate-modifier', start);
  }
  pending.dynamic = text;
  markPrefix(pending, start, true);
  return MATCHED;
}

function scanArticulation(ctx: DecodeContext, pending: PendingModifiers): PrefixScan {
  const start = ctx.position;
  const articulations = consumeSymbol(ctx, ARTICULATION_SYMBOLS);
  if (!articulations) {
    return NO_MATCH;
  }
  for (const articulation of articulations) {
    pending.articulations.add(articulation);
  }
  markPrefix(pending, start, true);
  return MATCHED;
}

function scanOrnament(ctx: DecodeContext, pending: PendingModifiers): PrefixScan {
  const start = ctx.position;
  const ornament = consumeSymbol(ctx, ORNAMENT_SYMBOLS);
  if (!ornament) {
    return NO_MATCH;
  }
  if (pending.ornament) {
    return prefixError('duplicate-modifier', start);
  }
  pending.ornament = ornament;
  markPrefix(pending, start, true);
  return MATCHED;
}

function scanBend(ctx: DecodeContext, pending: PendingModifiers): PrefixScan {
  const start = ctx.position;
  const bend = consumeSymbol(ctx, BEND_SYMBOLS);
  if (!bend) {
    return NO_MATCH;
  }
  if (pending.bend) {
    return prefixError('duplicate-modifier', start);
  }
  pending.bend = bend;
  markPrefix(pending, start, true);
  return MATCHED;
}

function scanSlurStart(ctx: DecodeContext, pending: PendingModifiers): PrefixScan {
  const start = ctx.position;
  if (peek(ctx) !== SLUR_START_CHAR) {
    return NO_MATCH;
  }
  ctx.position += 1;
  if (pending.slurStart) {
    return prefixError('duplicate-modifier', start);
  }
  pending.slurStart = true;
  markPrefix(pending, start, true);
  return MATCHED;
}

const PREFIX_SCANNERS = [scanDuration, scanDynamic, scanArticulation, scanOrnament, scanBend, scanSlurStart];

type NoteScan = { ok: true; note: NoteToken } | { ok: false; error: DecodeError };

type ChordScan = { ok: true; pitches: Pitch[] } | { ok: false; error: DecodeError };

/** Scan `[PITCH+]` at the cursor. */
function scanChord(ctx: DecodeContext): ChordScan {
  const open = ctx.position;
  ctx.position += 1;
  const pitches: Pitch[] = [];
  for (;;) {
    const char = peek(ctx);
    if (char === undefined) {
      return { ok: false, error: { kind: 'invalid-chord', position: open } };
    }
    if (char === CHORD_CLOSE_CHAR) {
      ctx.position += 1;
      break;
    }
    if (!PITCH_LETTER_CHARS.includes(char)) {
      return { ok: false, error: { kind: 'invalid-chord', position: ctx.position } };
    }
    const scanned = scanPitch(ctx);
    if (!scanned.ok) {
      return scanned;
    }
    pitches.push(scanned.pitch);
  }
  if (pitches.length === 0) {
    return { ok: false, error: { kind: 'invalid-chord', position: open } };
  }
  return { ok: true, pitches };
}

function buildNote(ctx: DecodeContext, pending: PendingModifiers): NoteScan {
  let pitches: Pitch[];
  if (peek(ctx) === CHORD_OPEN_CHAR) {
    const chord = scanChord(ctx);
    if (!chord.ok) {
      return chord;
    }
    pitches = chord.pitches;
  } else {
    const scanned = scanPitch(ctx);
    if (!scanned.ok) {
      return scanned;
    }
    pitches = [scanned.pitch];
  }
  const [pitch, ...chord] = pitches;
  if (!pitch) {
    return { ok: false, error: { kind: 'invalid-chord', position: ctx.position } };
  }

  let tie = false;
  let slurEnd = false;
  for (;;) {
    const suffix = peek(ctx);
    if (suffix === TIE_CHAR) {
      if (tie) {
        return { ok: false, error: { kind: 'duplicate-modifier', position: ctx.position } };
      }
      tie = true;
    } else if (suffix === SLUR_END_CHAR) {
      if (slurEnd || pending.slurStart) {
        return { ok: false, error: { kind: 'duplicate-modifier', position: ctx.position } };
      }
      slurEnd = true;
    } else {
      break;
    }
    ctx.position += 1;
  }

  const slur: SlurRole | undefined = pending.slurStart ? 'start' : slurEnd ? 'end' : undefined;
  const note: NoteToken = {
    kind: 'note',
    pitch,
    ...(chord.length > 0 ? { chord } : {}),
    duration: pending.duration ?? ctx.duration,
    ...(pending.dynamic ? { dynamic: pending.dynamic } : {}),
    articulations: ARTICULATION_ORDER.filter((articulation) => pending.articulations.has(articulation)),
    ...(pending.ornament ? { ornament: pending.ornament } : {}),
    ...(pending.bend ? { bend: pending.bend } : {}),
    tie,
    ...(slur ? { slur } : {})
  };
  return { ok: true, note };
}

/**
 * Decode one channel's notation text into tokens.
 *
 * Matching is greedy longest-match with at most two characters of lookahead.
 * A chord `[C4E4G4]` takes the place of a single pitch; a grace group opened
 * with `{>` trails the preceding note instead of leading into the next one.
 * Durations are sticky: a note or rest without a duration prefix reuses the
 * previous explicit duration of the same channel, starting from 1/4.
 */
export function decodeNotation(raw: string, options: DecodeOptions = {}): DecodeResult {
  if (raw === '%') {
    return { ok: true, tokens: [{ kind: 'marking', marking: 'measure-repeat' }] };
  }

  const ctx = createDecodeContext(raw, options);
  const tokens: NotationToken[] = [];
  let pending = emptyPending();
  let graceOpen: number | undefined;
  let graceCount = 0;
  let graceAfter = false;
  // Position of the grace group that still needs a target note.
  let awaitingTarget: number | undefined;

  while (!atEnd(ctx)) {
    const start = ctx.position;
    const char = peek(ctx);

    if (char === GRACE_OPEN_CHAR) {
      if (graceOpen !== undefined) {
        return fail('unbalanced-grace', start);
      }
      if (hasPending(pending)) {
        return fail('dangling-modifier', pending.first ?? start);
      }
      graceOpen = start;
      graceCount = 0;
      ctx.position += 1;
      graceAfter = peek(ctx) === GRACE_AFTER_CHAR;
      if (graceAfter) {
        const previous = tokens[tokens.length - 1];
        if (previous?.kind !== 'note' && !(previous?.kind === 'grace' && previous.after)) {
          return fail('grace-without-target', start);
        }
        ctx.position += 1;
      }
      continue;
    }

    if (char === GRACE_CLOSE_CHAR) {
      if (graceOpen === undefined) {
        return fail('unbalanced-grace', start);
      }
      if (graceCount === 0) {
        return fail('grace-without-target', graceOpen);
      }
      if (!graceAfter) {
        awaitingTarget ??= graceOpen;
      }
      graceOpen = undefined;
      ctx.position += 1;
      continue;
    }

    if (graceOpen !== undefined) {
      if (char === undefined || !PITCH_LETTER_CHARS.includes(char)) {
        return fail('invalid-grace-content', start);
      }
      const scanned = scanPitch(ctx);
      if (!scanned.ok) {
        return scanned;
      }
      tokens.push(
        graceAfter ? { kind: 'grace', pitch: scanned.pitch, after: true } : { kind: 'grace', pitch: scanned.pitch }
      );
      graceCount += 1;
      continue;
    }

    const marking = consumeSymbol(ctx, MARKING_SYMBOLS);
    if (marking) {
      if (hasPending(pending)) {
        return fail('dangling-modifier', pending.first ?? start);
      }
      if (awaitingTarget !== undefined) {
        return fail('grace-without-target', awaitingTarget);
      }
      if (marking === 'measure-repeat') {
        return fail('misplaced-measure-repeat', start);
      }
      tokens.push({ kind: 'marking', marking });
      continue;
    }

    let prefixMatched = false;
    for (const scanPrefix of PREFIX_SCANNERS) {
      const scanned = scanPrefix(ctx, pending);
      if (scanned.matched) {
        if (scanned.error) {
          return { ok: false, error: scanned.error };
        }
        prefixMatched = true;
        break;
      }
    }
    if (prefixMatched) {
      continue;
    }

    if (char === REST_CHAR) {
      if (pending.firstNoteOnly !== undefined) {
        return fail('dangling-modifier', pending.firstNoteOnly);
      }
      if (awaitingTarget !== undefined) {
        return fail('grace-without-target', awaitingTarget);
      }
      ctx.position += 1;
      const duration = pending.duration ?? ctx.duration;
      ctx.duration = duration;
      tokens.push({ kind: 'rest', duration });
      pending = emptyPending();
      continue;
    }

    if (char !== undefined && (char === CHORD_OPEN_CHAR || PITCH_LETTER_CHARS.includes(char))) {
      const built = buildNote(ctx, pending);
      if (!built.ok) {
        return built;
      }
      ctx.duration = built.note.duration;
      tokens.push(built.note);
      pending = emptyPending();
      awaitingTarget = undefined;
      continue;
    }

    return fail('unrecognized-token', start);
  }

  if (graceOpen !== undefined) {
    return fail('unbalanced-grace', graceOpen);
  }
  if (pending.first !== undefined) {
    return fail('dangling-modifier', pending.first);
  }
  if (awaitingTarget !== undefined) {
    return fail('grace-without-target', awaitingTarget);
  }

  return { ok: true, tokens };
}
