import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';

import { DURATION_CLASSES, isDurationClass, type DurationClass } from '../layout/duration-class.js';
import {
  isYamlRecord,
  readOptionalBoolean,
  readOptionalNonNegativeNumber,
  readOptionalPositiveInteger,
  readOptionalPositiveNumber,
  readOptionalRecord,
  rejectUnknownKeys,
  type FieldFailure,
  type YamlRecord
} from './yaml-fields.js';

/** Accidental spacing factors, each a multiple of the accidental glyph width. */
export interface AccidentalSpacing {
  /** Accidental on the first glyph of a channel. */
  firstGlyphFactor: number;
  /** Accidental close to the previous one on the staff. */
  collisionFactor: number;
  /** Accidental clear of the previous one. */
  clearFactor: number;
  /** Staff-step distance below which two accidentals collide. */
  collisionSteps: number;
}

/** Width estimator tunables. */
export interface WidthConfig {
  /** Nominal width of a bar holding one whole note. */
  measureUnit: number;
  /** Width of one note slot as a fraction of `measureUnit`, per governing duration class. */
  slotFractions: Record<DurationClass, number>;
  /** Grace note width relative to a notehead. */
  graceScale: number;
  accidentals: AccidentalSpacing;
}

/** Line breaking and justification tunables. */
export interface LayoutConfig {
  maxBarsPerLine: number;
  maxTokensPerLine: number;
  /** Fraction of the page width a line's intrinsic sum may exceed before it is closed. */
  stretchTolerance: number;
  /** Largest bar count drop allowed between consecutive lines. */
  maxBarCountDelta: number;
  /** Widest bar on a line relative to the narrowest. */
  maxWidthRatio: number;
  /** Barline drift allowed between equal-count lines, as a fraction of the page width. */
  alignmentTolerance: number;
  justifyLastLine: boolean;
}

export interface EngravingConfig {
  widths: WidthConfig;
  layout: LayoutConfig;
}

export const DEFAULT_ENGRAVING_CONFIG: Readonly<EngravingConfig> = {
  widths: {
    measureUnit: 3200,
    slotFractions: {
      whole: 1,
      half: 1 / 2,
      quarter: 1 / 3,
      eighth: 1 / 5,
      '16th': 1 / 8,
      '32nd': 1 / 12,
      '64th': 1 / 16,
      '128th': 1 / 20
    },
    graceScale: 0.6,
    accidentals: {
      firstGlyphFactor: 0.5,
      collisionFactor: 1,
      clearFactor: 0.25,
      collisionSteps: 7
    }
  },
  layout: {
    maxBarsPerLine: 9,
    maxTokensPerLine: 32,
    stretchTolerance: 0.25,
    maxBarCountDelta: 2,
    maxWidthRatio: 2,
    alignmentTolerance: 1 / 5,
    justifyLastLine: true
  }
};

/** Validation error for malformed engraving configuration. */
export class EngravingConfigError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Engraving config error in ${filePath}: ${message}`);
    this.name = 'EngravingConfigError';
    this.filePath = filePath;
  }
}

/** Deep copy of the defaults, safe to mutate. */
export function defaultEngravingConfig(): EngravingConfig {
  const { widths, layout } = DEFAULT_ENGRAVING_CONFIG;
  return {
    widths: {
      ...widths,
      slotFractions: { ...widths.slotFractions },
      accidentals: { ...widths.accidentals }
    },
    layout: { ...layout }
  };
}

/**
 * Parse a YAML engraving configuration and overlay it on the defaults.
 *
 * ```yaml
 * widths:
 *   measure_unit: 3200
 *   slot_fractions: { quarter: 1/3 }
 * layout:
 *   stretch_tolerance: 0.2
 * ```
 */
export function parseEngravingConfig(text: string, sourceName = '<inline>'): EngravingConfig {
  const fail: FieldFailure = (message) => {
    throw new EngravingConfigError(sourceName, message);
  };

  const config = defaultEngravingConfig();
  const parsed: unknown = parseYaml(text);
  if (parsed === null || parsed === undefined) {
    return config;
  }
  if (!isYamlRecord(parsed)) {
    return fail('config must be a YAML object');
  }
  rejectUnknownKeys(parsed, ['widths', 'layout'], fail);

  const widths = readOptionalRecord(parsed, 'widths', fail);
  if (widths) {
    applyWidths(config.widths, widths, fail);
  }
  const layout = readOptionalRecord(parsed, 'layout', fail);
  if (layout) {
    applyLayout(config.layout, layout, fail);
  }
  return config;
}

function applyWidths(target: WidthConfig, obj: YamlRecord, fail: FieldFailure): void {
  rejectUnknownKeys(obj, ['measure_unit', 'slot_fractions', 'grace_scale', 'accidentals'], fail, 'widths.');
  target.measureUnit = readOptionalPositiveNumber(obj, 'measure_unit', fail) ?? target.measureUnit;
  target.graceScale = readOptionalPositiveNumber(obj, 'grace_scale', fail) ?? target.graceScale;

  const slots = readOptionalRecord(obj, 'slot_fractions', fail);
  if (slots) {
    rejectUnknownKeys(slots, DURATION_CLASSES, fail, 'widths.slot_fractions.');
    for (const key of Object.keys(slots)) {
      const value = readOptionalPositiveNumber(slots, key, fail);
      if (value !== undefined && isDurationClass(key)) {
        target.slotFractions[key] = value;
      }
    }
  }

  const accidentals = readOptionalRecord(obj, 'accidentals', fail);
  if (accidentals) {
    rejectUnknownKeys(
      accidentals,
      ['first_glyph_factor', 'collision_factor', 'clear_factor', 'collision_steps'],
      fail,
      'widths.accidentals.'
    );
    const spacing = target.accidentals;
    spacing.firstGlyphFactor =
      readOptionalNonNegativeNumber(accidentals, 'first_glyph_factor', fail) ?? spacing.firstGlyphFactor;
    spacing.collisionFactor =
      readOptionalNonNegativeNumber(accidentals, 'collision_factor', fail) ?? spacing.collisionFactor;
    spacing.clearFactor = readOptionalNonNegativeNumber(accidentals, 'clear_factor', fail) ?? spacing.clearFactor;
    spacing.collisionSteps =
      readOptionalPositiveInteger(accidentals, 'collision_steps', fail) ?? spacing.collisionSteps;
  }
}

function applyLayout(target: LayoutConfig, obj: YamlRecord, fail: FieldFailure): void {
  rejectUnknownKeys(
    obj,
    [
      'max_bars_per_line',
      'max_tokens_per_line',
      'stretch_tolerance',
      'max_bar_count_delta',
      'max_width_ratio',
      'alignment_tolerance',
      'justify_last_line'
    ],
    fail,
    'layout.'
  );
  target.maxBarsPerLine = readOptionalPositiveInteger(obj, 'max_bars_per_line', fail) ?? target.maxBarsPerLine;
  target.maxTokensPerLine = readOptionalPositiveInteger(obj, 'max_tokens_per_line', fail) ?? target.maxTokensPerLine;
  target.stretchTolerance =
    readOptionalNonNegativeNumber(obj, 'stretch_tolerance', fail) ?? target.stretchTolerance;
  target.maxBarCountDelta =
    readOptionalPositiveInteger(obj, 'max_bar_count_delta', fail) ?? target.maxBarCountDelta;
  target.alignmentTolerance =
    readOptionalNonNegativeNumber(obj, 'alignment_tolerance', fail) ?? target.alignmentTolerance;
  target.justifyLastLine = readOptionalBoolean(obj, 'justify_last_line', fail) ?? target.justifyLastLine;

  const ratio = readWidthRatio(obj, fail);
  if (ratio !== undefined) {
    target.maxWidthRatio = ratio;
  }
}

function readWidthRatio(obj: YamlRecord, fail: FieldFailure): number | undefined {
  const ratio = readOptionalPositiveNumber(obj, 'max_width_ratio', fail);
  if (ratio !== undefined && ratio < 1) {
    return fail("'max_width_ratio' must be at least 1");
  }
  return ratio;
}

/** Read and parse a YAML engraving configuration from disk. */
export async function loadEngravingConfig(filePath: string): Promise<EngravingConfig> {
  const raw = await readFile(filePath, 'utf8');
  return parseEngravingConfig(raw, filePath);
}
