import type { Diagnostic, DiagnosticSource } from '../core/diagnostics.js';
import { formatFraction } from '../core/fraction.js';
import { decodeErrorToDiagnostic, type DecodeError } from '../parser/decode-context.js';
import type { BeatMismatch, BeatOverflow } from './timing.js';

/** Structural problems found while assembling or patching a score. */
export type StructureError =
  | { readonly kind: 'invalid-signature'; readonly signatureIndex: number; readonly reason: string }
  | { readonly kind: 'missing-signature' }
  | { readonly kind: 'dangling-signature'; readonly signatureIndex: number }
  | { readonly kind: 'channel-count-mismatch'; readonly expected: number; readonly actual: number }
  | { readonly kind: 'repeat-without-previous' }
  | { readonly kind: 'unmatched-repeat-open' }
  | { readonly kind: 'missing-jump-target'; readonly marker: 'ds' | 'to-coda'; readonly target: 'segno' | 'coda' }
  | { readonly kind: 'duplicate-jump-target'; readonly target: 'segno' | 'coda' }
  | { readonly kind: 'invalid-ending'; readonly number: number }
  | { readonly kind: 'patch-out-of-range' };

export type ScoreErrorDetail = DecodeError | BeatMismatch | BeatOverflow | StructureError;

/** One located assembly failure; `barIndex` is absent for score-wide problems. */
export interface ScoreError {
  readonly barIndex?: number;
  readonly channelIndex?: number;
  readonly error: ScoreErrorDetail;
}

/** Batch order: score-wide errors first, then by bar, then channel-less before channels. */
export function sortScoreErrors(errors: readonly ScoreError[]): ScoreError[] {
  const rank = (value: number | undefined): number => (value === undefined ? -1 : value);
  return errors
    .map((error, order) => ({ error, order }))
    .sort(
      (left, right) =>
        rank(left.error.barIndex) - rank(right.error.barIndex) ||
        rank(left.error.channelIndex) - rank(right.error.channelIndex) ||
        left.order - right.order
    )
    .map((entry) => entry.error);
}

function structureMessage(error: StructureError): { code: string; message: string } {
  switch (error.kind) {
    case 'invalid-signature':
      return {
        code: 'SCORE_INVALID_SIGNATURE',
        message: `Signature ${error.signatureIndex} is invalid: ${error.reason}.`
      };
    case 'missing-signature':
      return { code: 'SCORE_MISSING_SIGNATURE', message: 'A score needs at least one signature.' };
    case 'dangling-signature':
      return {
        code: 'SCORE_DANGLING_SIGNATURE',
        message: `Signature index ${error.signatureIndex} does not exist.`
      };
    case 'channel-count-mismatch':
      return {
        code: 'SCORE_CHANNEL_COUNT_MISMATCH',
        message: `Expected ${error.expected} channels, found ${error.actual}.`
      };
    case 'repeat-without-previous':
      return {
        code: 'SCORE_REPEAT_WITHOUT_PREVIOUS',
        message: "Measure repeat '%' has no previous bar to repeat."
      };
    case 'unmatched-repeat-open':
      return { code: 'SCORE_UNMATCHED_REPEAT_OPEN', message: 'Repeat open has no later repeat close.' };
    case 'missing-jump-target':
      return {
        code: 'SCORE_MISSING_JUMP_TARGET',
        message: `Jump '${error.marker}' needs a '${error.target}' marker.`
      };
    case 'duplicate-jump-target':
      return {
        code: 'SCORE_DUPLICATE_JUMP_TARGET',
        message: `Marker '${error.target}' appears more than once.`
      };
    case 'invalid-ending':
      return {
        code: 'SCORE_INVALID_ENDING',
        message: `Ending number ${error.number} must be a positive integer.`
      };
    case 'patch-out-of-range':
      return { code: 'SCORE_PATCH_OUT_OF_RANGE', message: 'Patch addresses a channel that does not exist.' };
  }
}

/** Convert a located score error into a canonical diagnostic. */
export function scoreErrorToDiagnostic(scoreError: ScoreError, sourceName?: string): Diagnostic {
  const source: DiagnosticSource = {
    ...(sourceName ? { name: sourceName } : {}),
    ...(scoreError.barIndex !== undefined ? { bar: scoreError.barIndex } : {}),
    ...(scoreError.channelIndex !== undefined ? { channel: scoreError.channelIndex } : {})
  };
  const { error } = scoreError;

  if (error.kind === 'beat-mismatch') {
    return {
      code: 'SCORE_BEAT_MISMATCH',
      severity: 'error',
      message: `Channel lasts ${formatFraction(error.actual)} but the time signature requires ${formatFraction(error.expected)}.`,
      source
    };
  }
  if (error.kind === 'beat-overflow') {
    return {
      code: 'SCORE_BEAT_OVERFLOW',
      severity: 'error',
      message: `Channel durations are too fine-grained to sum exactly; the time signature requires ${formatFraction(error.expected)}.`,
      source
    };
  }
  if ('position' in error) {
    return decodeErrorToDiagnostic(error, source);
  }

  const { code, message } = structureMessage(error);
  return { code, severity: 'error', message, ...(Object.keys(source).length > 0 ? { source } : {}) };
}
