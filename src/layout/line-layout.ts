import { DEFAULT_ENGRAVING_CONFIG, type EngravingConfig, type LayoutConfig } from '../config/engraving-config.js';
import type { Diagnostic } from '../core/diagnostics.js';
import type { Score } from '../core/score.js';
import { DEFAULT_GLYPH_METRICS, type GlyphMetrics } from './glyph-metrics.js';
import type { LayoutError, LayoutLine, LayoutResult, MeasureSize, NumericLayoutOption } from './layout-types.js';
import { estimateScoreWidths } from './measure-width.js';
import { alignToReference, distributeWidths } from './proportion.js';

/** Bars of each line, as indices into the measure list. */
type LineBreaks = number[][];

function breakLines(measures: readonly MeasureSize[], pageWidth: number, config: LayoutConfig, barCap: number): LineBreaks {
  const limit = pageWidth * (1 + config.stretchTolerance);
  const lines: LineBreaks = [];
  let previousCount: number | undefined;
  let index = 0;

  while (index < measures.length) {
    const line = [index];
    let width = measures[index]?.width ?? 0;
    let tokens = measures[index]?.tokenCount ?? 0;
    index += 1;

    while (index < measures.length) {
      const next = measures[index];
      if (!next) {
        break;
      }
      if (previousCount !== undefined && line.length >= previousCount + config.maxBarCountDelta) {
        break;
      }
      if (line.length >= barCap || tokens + next.tokenCount > config.maxTokensPerLine || width + next.width > limit) {
        break;
      }
      line.push(index);
      width += next.width;
      tokens += next.tokenCount;
      index += 1;
    }

    lines.push(line);
    previousCount = line.length;
  }
  return lines;
}

function isBalanced(lines: LineBreaks, maxBarCountDelta: number): boolean {
  return lines.every((line, index) => {
    const previous = lines[index - 1];
    return !previous || previous.length - line.length <= maxBarCountDelta;
  });
}

type OptionRule = readonly [NumericLayoutOption, (value: number) => boolean, string];

const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;
const isNonNegativeInteger = (value: number): boolean => Number.isInteger(value) && value >= 0;
const isNonNegative = (value: number): boolean => Number.isFinite(value) && value >= 0;

const OPTION_RULES: readonly OptionRule[] = [
  ['maxBarsPerLine', isPositiveInteger, 'must be a positive integer'],
  ['maxTokensPerLine', isPositiveInteger, 'must be a positive integer'],
  ['maxBarCountDelta', isNonNegativeInteger, 'must be a non-negative integer'],
  ['stretchTolerance', isNonNegative, 'must be a finite number of at least 0'],
  ['alignmentTolerance', isNonNegative, 'must be a finite number of at least 0'],
  ['maxWidthRatio', (value) => Number.isFinite(value) && value >= 1, 'must be a finite number of at least 1']
];

function inputProblem(measures: readonly MeasureSize[], config: LayoutConfig): LayoutError | undefined {
  for (const [option, valid, reason] of OPTION_RULES) {
    const value = config[option];
    if (!valid(value)) {
      return { kind: 'invalid-option', option, value, reason };
    }
  }
  for (const measure of measures) {
    if (!isNonNegative(measure.width)) {
      return { kind: 'invalid-measure', barIndex: measure.barIndex, reason: `has width ${measure.width}` };
    }
    if (!isNonNegativeInteger(measure.tokenCount)) {
      return { kind: 'invalid-measure', barIndex: measure.barIndex, reason: `has token count ${measure.tokenCount}` };
    }
  }
  return undefined;
}

/**
 * Break measures into lines and assign each bar its final width.
 *
 * Lines are filled greedily, then the whole pass is repeated with a lower bar
 * cap while some line holds more than `maxBarCountDelta` bars fewer than the
 * line before it. Widths follow intrinsic widths with the narrow-to-wide ratio
 * capped, and equal-count neighbours are nudged until their barlines line up.
 */
export function layoutLines(
  measures: readonly MeasureSize[],
  pageWidth: number,
  options: Partial<LayoutConfig> = {}
): LayoutResult {
  const config: LayoutConfig = { ...DEFAULT_ENGRAVING_CONFIG.layout, ...options };
  const diagnostics: Diagnostic[] = [];

  if (!Number.isFinite(pageWidth) || pageWidth <= 0) {
    return { ok: false, error: { kind: 'invalid-page-width', pageWidth }, diagnostics };
  }
  const problem = inputProblem(measures, config);
  if (problem) {
    return { ok: false, error: problem, diagnostics };
  }
  for (const measure of measures) {
    if (measure.width > pageWidth) {
      return {
        ok: false,
        error: { kind: 'unsatisfiable', barIndex: measure.barIndex, width: measure.width, pageWidth },
        diagnostics
      };
    }
  }

  // A cap of maxBarCountDelta + 1 is always balanced, and every pass lowers the cap.
  const minimumCap = config.maxBarCountDelta + 1;
  let barCap = config.maxBarsPerLine;
  let lines = breakLines(measures, pageWidth, config, barCap);
  while (barCap > minimumCap && !isBalanced(lines, config.maxBarCountDelta)) {
    const longest = Math.max(...lines.map((line) => line.length));
    barCap = Math.max(minimumCap, Math.min(barCap, longest) - 1);
    lines = breakLines(measures, pageWidth, config, barCap);
  }
  if (barCap !== config.maxBarsPerLine) {
    diagnostics.push({
      code: 'LAYOUT_BALANCE_REPAIRED',
      severity: 'info',
      message: `Line breaking repeated with at most ${barCap} bars per line to keep line lengths balanced.`
    });
  }

  const laidOut: LayoutLine[] = [];
  let previous: { count: number; widths: number[]; justified: boolean } | undefined;

  lines.forEach((line, lineIndex) => {
    const intrinsic = line.map((index) => measures[index]?.width ?? 0);
    const intrinsicTotal = intrinsic.reduce((sum, width) => sum + width, 0);
    const firstBar = measures[line[0] ?? 0]?.barIndex ?? 0;
    const justified = config.justifyLastLine || lineIndex < lines.length - 1;
    const target = justified ? pageWidth : Math.min(pageWidth, intrinsicTotal);

    const distribution = distributeWidths(intrinsic, target, config.maxWidthRatio);
    let widths = distribution.widths;
    if (distribution.clamped) {
      diagnostics.push({
        code: 'LAYOUT_WIDTH_CLAMPED',
        severity: 'info',
        message: `Line ${lineIndex}: bars wider than ${config.maxWidthRatio}x the narrowest bar were clamped.`,
        source: { bar: firstBar }
      });
    }

    if (previous && justified && previous.justified && previous.count === line.length) {
      const aligned = alignToReference(widths, previous.widths, config.alignmentTolerance * pageWidth);
      if (aligned) {
        widths = distributeWidths(aligned, target, config.maxWidthRatio).widths;
        diagnostics.push({
          code: 'LAYOUT_LINE_ALIGNED',
          severity: 'info',
          message: `Line ${lineIndex}: barlines nudged toward line ${lineIndex - 1}.`,
          source: { bar: firstBar }
        });
      }
    }

    let xOffset = 0;
    const bars = line.map((index, position) => {
      const width = widths[position] ?? 0;
      const bar = { barIndex: measures[index]?.barIndex ?? index, xOffset, width };
      xOffset += width;
      return bar;
    });

    laidOut.push({
      lineIndex,
      width: xOffset,
      scale: intrinsicTotal > 0 ? xOffset / intrinsicTotal : 1,
      bars
    });
    previous = { count: line.length, widths, justified };
  });

  return { ok: true, lines: laidOut, diagnostics };
}

/** Options for laying out an assembled score in one call. */
export interface LayoutScoreOptions {
  metrics?: GlyphMetrics;
  config?: EngravingConfig;
}

/** Estimate every bar of `score` and break the result into lines. */
export function layoutScore(score: Score, pageWidth: number, options: LayoutScoreOptions = {}): LayoutResult {
  const config = options.config ?? DEFAULT_ENGRAVING_CONFIG;
  const measures = estimateScoreWidths(score, options.metrics ?? DEFAULT_GLYPH_METRICS, config.widths);
  return layoutLines(measures, pageWidth, config.layout);
}
