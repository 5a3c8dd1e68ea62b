import type { Bar, Channel, Score } from '../core/score.js';
import { completeAssembly, type AssembleOptions, type AssembleResult } from './assemble.js';
import { buildChannel } from './channel.js';
import type { ScoreError } from './errors.js';

/** Replacement content for one channel; omitted fields keep their current value. */
export interface ChannelPatch {
  barIndex: number;
  channelIndex: number;
  notes?: string;
  lyric?: string;
}

function patchKey(patch: ChannelPatch): string {
  return `${patch.barIndex}:${patch.channelIndex}`;
}

/**
 * Apply channel edits to an assembled score.
 *
 * Only the patched channels are decoded and beat-checked again. Bars without a
 * patch are shared with the input score, which is never mutated. When several
 * patches address the same channel the last one wins.
 */
export function patchScore(
  score: Score,
  patches: readonly ChannelPatch[],
  options: AssembleOptions = {}
): AssembleResult {
  const errors: ScoreError[] = [];
  const byBar = new Map<number, Map<number, ChannelPatch>>();
  const seen = new Set<string>();

  for (const patch of [...patches].reverse()) {
    if (seen.has(patchKey(patch))) {
      continue;
    }
    seen.add(patchKey(patch));

    const channel = score.bars[patch.barIndex]?.channels[patch.channelIndex];
    if (!channel) {
      errors.push({
        barIndex: patch.barIndex,
        channelIndex: patch.channelIndex,
        error: { kind: 'patch-out-of-range' }
      });
      continue;
    }
    const barPatches = byBar.get(patch.barIndex) ?? new Map<number, ChannelPatch>();
    barPatches.set(patch.channelIndex, patch);
    byBar.set(patch.barIndex, barPatches);
  }

  const bars: Bar[] = score.bars.map((bar) => {
    const barPatches = byBar.get(bar.index);
    if (!barPatches) {
      return bar;
    }

    const channels: Channel[] = bar.channels.map((channel, channelIndex) => {
      const patch = barPatches.get(channelIndex);
      if (!patch) {
        return channel;
      }

      const lyric = patch.lyric ?? channel.lyric;
      const built = buildChannel(
        { notes: patch.notes ?? channel.source, ...(lyric === undefined ? {} : { lyric }) },
        bar.signature,
        bar.index,
        channelIndex
      );
      if (!built.ok) {
        errors.push(built.error);
        return channel;
      }
      if (built.channel.kind === 'repeats-previous' && bar.index === 0) {
        errors.push({ barIndex: bar.index, channelIndex, error: { kind: 'repeat-without-previous' } });
      }
      return built.channel;
    });

    return { ...bar, channels };
  });

  return completeAssembly({ signatures: score.signatures, bars }, errors, options);
}
