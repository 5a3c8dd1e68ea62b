import { DEFAULT_ENGRAVING_CONFIG, type WidthConfig } from '../config/engraving-config.js';
import { keyAccidentalCount } from '../core/key-signature.js';
import { notePitches, staffSteps, type NotationToken, type Pitch } from '../core/notation.js';
import type { Score } from '../core/score.js';
import { resolveChannel } from '../score/resolve.js';
import { durationClassOf, flagCount, shorterClass, type DurationClass } from './duration-class.js';
import { DEFAULT_GLYPH_METRICS, type GlyphMetrics } from './glyph-metrics.js';

/** Intrinsic (unstretched) size of one bar. */
export interface MeasureEstimate {
  barIndex: number;
  width: number;
  /** Largest note, rest and grace count among the bar's channels. */
  tokenCount: number;
  /** Shortest duration class present; it sets the slot width of every note in the bar. */
  durationClass: DurationClass;
}

/** Shortest note or rest class among several token lists, `whole` when there is none. */
export function governingClass(channels: ReadonlyArray<readonly NotationToken[]>): DurationClass {
  let governing: DurationClass = 'whole';
  for (const tokens of channels) {
    for (const token of tokens) {
      if (token.kind === 'note' || token.kind === 'rest') {
        governing = shorterClass(governing, durationClassOf(token.duration));
      }
    }
  }
  return governing;
}

/** Accidental cost tracker; the previous accidental position decides collisions. */
interface AccidentalState {
  previousSteps?: number;
  glyphs: number;
}

/** `stacked` marks a chord member after the first, which never counts as the bar's first glyph. */
function accidentalWidth(
  pitch: Pitch,
  state: AccidentalState,
  metrics: GlyphMetrics,
  config: WidthConfig,
  stacked = false
): number {
  if (!pitch.accidental) {
    return 0;
  }

  const spacing = config.accidentals;
  const steps = staffSteps(pitch);
  let factor: number;
  if (state.glyphs === 0 && !stacked) {
    factor = spacing.firstGlyphFactor;
  } else if (state.previousSteps !== undefined && Math.abs(steps - state.previousSteps) < spacing.collisionSteps) {
    factor = spacing.collisionFactor;
  } else {
    factor = spacing.clearFactor;
  }
  state.previousSteps = steps;
  return metrics.accidental * factor;
}

/** Width of one channel's tokens once the governing slot width is known. */
export function channelWidth(
  tokens: readonly NotationToken[],
  slotWidth: number,
  metrics: GlyphMetrics,
  config: WidthConfig
): number {
  const state: AccidentalState = { glyphs: 0 };
  let width = 0;

  for (const token of tokens) {
    switch (token.kind) {
      case 'note': {
        let glyph = metrics.notehead + flagCount(durationClassOf(token.duration)) * metrics.flag;
        if (token.dynamic) {
          glyph = Math.max(glyph, token.dynamic.length * metrics.dynamic);
        }
        for (const [index, pitch] of notePitches(token).entries()) {
          width += accidentalWidth(pitch, state, metrics, config, index > 0);
        }
        width += Math.max(slotWidth, glyph);
        break;
      }
      case 'rest':
        width += Math.max(slotWidth, metrics.rest);
        break;
      case 'grace':
        width += accidentalWidth(token.pitch, state, metrics, config) + metrics.notehead * config.graceScale;
        break;
      case 'marking':
        width += metrics.marking;
        break;
    }
    state.glyphs += 1;
  }
  return width;
}

function countedTokens(tokens: readonly NotationToken[]): number {
  return tokens.filter((token) => token.kind !== 'marking').length;
}

/**
 * Estimate the intrinsic width of one bar.
 *
 * Measure repeats are measured as the content they repeat. Bar 0, and every
 * bar whose signature index differs from its predecessor, also pays for the
 * time signature glyph and the key signature accidentals.
 */
export function estimateMeasureWidth(
  score: Score,
  barIndex: number,
  metrics: GlyphMetrics = DEFAULT_GLYPH_METRICS,
  config: WidthConfig = DEFAULT_ENGRAVING_CONFIG.widths
): MeasureEstimate {
  const bar = score.bars[barIndex];
  if (!bar) {
    throw new RangeError(`Bar ${barIndex} is outside the score (${score.bars.length} bars).`);
  }

  const channels = bar.channels.map(
    (_channel, channelIndex) => resolveChannel(score, barIndex, channelIndex)?.tokens ?? []
  );
  const durationClass = governingClass(channels);
  const slotWidth = config.measureUnit * config.slotFractions[durationClass];

  let widest = 0;
  let tokenCount = 0;
  for (const tokens of channels) {
    widest = Math.max(widest, channelWidth(tokens, slotWidth, metrics, config));
    tokenCount = Math.max(tokenCount, countedTokens(tokens));
  }

  const previous = score.bars[barIndex - 1];
  const signatureChange =
    !previous || previous.signatureIndex !== bar.signatureIndex
      ? metrics.timeSignature + keyAccidentalCount(bar.signature.key) * metrics.accidental
      : 0;

  return {
    barIndex,
    width: widest + metrics.barline + signatureChange,
    tokenCount,
    durationClass
  };
}

/** Estimate every bar of a score in order. */
export function estimateScoreWidths(
  score: Score,
  metrics: GlyphMetrics = DEFAULT_GLYPH_METRICS,
  config: WidthConfig = DEFAULT_ENGRAVING_CONFIG.widths
): MeasureEstimate[] {
  return score.bars.map((_bar, barIndex) => estimateMeasureWidth(score, barIndex, metrics, config));
}
