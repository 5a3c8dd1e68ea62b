import type { Diagnostic } from '../core/diagnostics.js';
import type { Bar, BarInput, Channel, Score, Signature, SignatureInput } from '../core/score.js';
import { buildChannel } from './channel.js';
import { scoreErrorToDiagnostic, sortScoreErrors, type ScoreError } from './errors.js';
import { validateRepeats } from './repeats.js';
import { normalizeSignature, signatureProblem } from './signatures.js';

/** Assembly options. */
export interface AssembleOptions {
  /** Name attached to every diagnostic, e.g. a fixture file. */
  sourceName?: string;
}

/** Assembly outcome: a validated score, or every problem found in one batch. */
export type AssembleResult =
  | { ok: true; score: Score; diagnostics: Diagnostic[] }
  | { ok: false; errors: ScoreError[]; diagnostics: Diagnostic[] };

/** Finish an assembly or patch: sort the batch and derive diagnostics. */
export function completeAssembly(
  score: Score,
  errors: readonly ScoreError[],
  options: AssembleOptions
): AssembleResult {
  if (errors.length === 0) {
    return { ok: true, score, diagnostics: [] };
  }

  const sorted = sortScoreErrors(errors);
  return {
    ok: false,
    errors: sorted,
    diagnostics: sorted.map((error) => scoreErrorToDiagnostic(error, options.sourceName))
  };
}

/**
 * Build a score from signatures and bar inputs.
 *
 * Bar 0 without an override uses signature 0; later bars inherit the most recent
 * signature. Every problem is collected rather than stopping at the first one.
 */
export function assembleScore(
  signatureInputs: readonly SignatureInput[],
  barInputs: readonly BarInput[],
  options: AssembleOptions = {}
): AssembleResult {
  const errors: ScoreError[] = [];
  const invalidSignatures = new Set<number>();

  signatureInputs.forEach((input, signatureIndex) => {
    const reason = signatureProblem(input);
    if (reason) {
      invalidSignatures.add(signatureIndex);
      errors.push({ error: { kind: 'invalid-signature', signatureIndex, reason } });
    }
  });

  const signatures: Signature[] = signatureInputs.map(normalizeSignature);
  const [firstSignature] = signatures;
  if (!firstSignature) {
    errors.push({ error: { kind: 'missing-signature' } });
    return completeAssembly({ signatures: [], bars: [] }, errors, options);
  }

  const channelCount = barInputs[0]?.channels.length ?? 0;
  const bars: Bar[] = [];
  let signatureIndex = 0;
  let signature = firstSignature;

  barInputs.forEach((input, barIndex) => {
    let signatureOverride: number | undefined;
    if (input.signature !== undefined) {
      const overridden = Number.isInteger(input.signature) ? signatures[input.signature] : undefined;
      if (overridden) {
        signatureOverride = input.signature;
        signatureIndex = input.signature;
        signature = overridden;
      } else {
        errors.push({ barIndex, error: { kind: 'dangling-signature', signatureIndex: input.signature } });
      }
    }

    if (input.channels.length !== channelCount) {
      errors.push({
        barIndex,
        error: { kind: 'channel-count-mismatch', expected: channelCount, actual: input.channels.length }
      });
    }

    const channels: Channel[] = [];
    // Channels under an invalid signature cannot be decoded or counted against it.
    const checkable = invalidSignatures.has(signatureIndex) ? [] : input.channels;
    checkable.forEach((channelInput, channelIndex) => {
      const built = buildChannel(channelInput, signature, barIndex, channelIndex);
      if (!built.ok) {
        errors.push(built.error);
        return;
      }
      if (built.channel.kind === 'repeats-previous' && barIndex === 0) {
        errors.push({ barIndex, channelIndex, error: { kind: 'repeat-without-previous' } });
      }
      channels.push(built.channel);
    });

    bars.push({
      index: barIndex,
      ...(signatureOverride !== undefined ? { signatureOverride } : {}),
      signatureIndex,
      signature,
      channels,
      repeats: [...(input.repeats ?? [])]
    });
  });

  errors.push(...validateRepeats(bars));
  return completeAssembly({ signatures, bars }, errors, options);
}
