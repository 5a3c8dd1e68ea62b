import type { NotesChannel, Score, Signature } from '../core/score.js';

/**
 * Content a channel actually plays, following `%` back references to the
 * nearest earlier bar with written notes. `undefined` when the address is out
 * of range or no written bar precedes the reference.
 */
export function resolveChannel(score: Score, barIndex: number, channelIndex: number): NotesChannel | undefined {
  for (let index = barIndex; index >= 0; index -= 1) {
    const channel = score.bars[index]?.channels[channelIndex];
    if (!channel) {
      return undefined;
    }
    if (channel.kind === 'notes') {
      return channel;
    }
  }
  return undefined;
}

/** Signature in force for a bar, `undefined` for an out-of-range index. */
export function effectiveSignature(score: Score, barIndex: number): Signature | undefined {
  return score.bars[barIndex]?.signature;
}
