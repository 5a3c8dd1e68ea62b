import { isMicrotonalKey } from '../core/key-signature.js';
import { isMeasureRepeat } from '../core/notation.js';
import type { Channel, ChannelInput, Signature } from '../core/score.js';
import { decodeNotation } from '../parser/decode.js';
import type { ScoreError } from './errors.js';
import { requiredBarDuration, validateBeats } from './timing.js';

export type ChannelBuild = { ok: true; channel: Channel } | { ok: false; error: ScoreError };

/**
 * Decode and beat-check one channel against the bar's effective signature.
 * A lone `%` becomes a back reference; whether a previous bar exists is checked by the caller.
 */
export function buildChannel(
  input: ChannelInput,
  signature: Signature,
  barIndex: number,
  channelIndex: number
): ChannelBuild {
  const lyric = input.lyric === undefined ? {} : { lyric: input.lyric };
  const decoded = decodeNotation(input.notes, { microtonal: isMicrotonalKey(signature.key) });
  if (!decoded.ok) {
    return { ok: false, error: { barIndex, channelIndex, error: decoded.error } };
  }

  if (isMeasureRepeat(decoded.tokens)) {
    return { ok: true, channel: { kind: 'repeats-previous', source: input.notes, ...lyric } };
  }

  const beats = validateBeats(decoded.tokens, signature.time, { barIndex, channelIndex });
  if (!beats.ok) {
    return { ok: false, error: { barIndex, channelIndex, error: beats.error } };
  }

  return {
    ok: true,
    channel: {
      kind: 'notes',
      source: input.notes,
      tokens: decoded.tokens,
      duration: requiredBarDuration(signature.time),
      ...lyric
    }
  };
}
