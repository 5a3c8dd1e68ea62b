import {
  DEFAULT_ENGRAVING_CONFIG,
  defaultEngravingConfig,
  loadEngravingConfig,
  type EngravingConfig
} from '../config/engraving-config.js';
import type { Diagnostic } from '../core/diagnostics.js';
import type { BarInput, Score, SignatureInput } from '../core/score.js';
import { DEFAULT_GLYPH_METRICS, loadGlyphMetrics, type GlyphMetrics } from '../layout/glyph-metrics.js';
import { layoutErrorToDiagnostic } from '../layout/layout-errors.js';
import type { LayoutLine } from '../layout/layout-types.js';
import { layoutLines } from '../layout/line-layout.js';
import { estimateScoreWidths, type MeasureEstimate } from '../layout/measure-width.js';
import { assembleScore, type AssembleResult } from '../score/assemble.js';
import { patchScore, type ChannelPatch } from '../score/patch.js';

/** Options shared by the score building entry points. */
export interface ScoreOptions {
  sourceName?: string;
}

/** Standard return envelope with diagnostics-first reporting. */
export interface ScoreResult {
  score?: Score;
  diagnostics: Diagnostic[];
}

/** Engraving inputs; omitted tables fall back to the built-in defaults. */
export interface EngraveOptions {
  sourceName?: string;
  metrics?: GlyphMetrics;
  config?: EngravingConfig;
}

/** Per-bar estimates and, when layout succeeds, the laid-out lines. */
export interface EngraveResult {
  measures: MeasureEstimate[];
  lines?: LayoutLine[];
  diagnostics: Diagnostic[];
}

/** File locations of the YAML engraving tables. */
export interface EngravingFiles {
  configPath?: string;
  metricsPath?: string;
}

function toScoreResult(result: AssembleResult): ScoreResult {
  return result.ok ? { score: result.score, diagnostics: result.diagnostics } : { diagnostics: result.diagnostics };
}

/** Decode, validate and assemble a score from signatures and per-bar channel notation. */
export function buildScore(
  signatures: readonly SignatureInput[],
  bars: readonly BarInput[],
  options: ScoreOptions = {}
): ScoreResult {
  return toScoreResult(assembleScore(signatures, bars, options));
}

/** Apply channel edits, validating only the edited channels. */
export function updateScore(score: Score, patches: readonly ChannelPatch[], options: ScoreOptions = {}): ScoreResult {
  return toScoreResult(patchScore(score, patches, options));
}

/** Estimate bar widths and break the score into lines of `pageWidth`. */
export function engraveScore(score: Score, pageWidth: number, options: EngraveOptions = {}): EngraveResult {
  const config = options.config ?? DEFAULT_ENGRAVING_CONFIG;
  const measures = estimateScoreWidths(score, options.metrics ?? DEFAULT_GLYPH_METRICS, config.widths);
  const layout = layoutLines(measures, pageWidth, config.layout);
  if (!layout.ok) {
    return {
      measures,
      diagnostics: [...layout.diagnostics, layoutErrorToDiagnostic(layout.error, options.sourceName)]
    };
  }

  const diagnostics = layout.diagnostics.map((diagnostic) =>
    options.sourceName ? { ...diagnostic, source: { ...diagnostic.source, name: options.sourceName } } : diagnostic
  );
  return { measures, lines: layout.lines, diagnostics };
}

/** Read the YAML engraving config and glyph metric table, defaulting whichever is omitted. */
export async function loadEngravingFiles(
  files: EngravingFiles
): Promise<{ config: EngravingConfig; metrics: GlyphMetrics }> {
  const [config, metrics] = await Promise.all([
    files.configPath ? loadEngravingConfig(files.configPath) : Promise.resolve(defaultEngravingConfig()),
    files.metricsPath ? loadGlyphMetrics(files.metricsPath) : Promise.resolve({ ...DEFAULT_GLYPH_METRICS })
  ]);
  return { config, metrics };
}
