import type { LayoutConfig } from '../config/engraving-config.js';
import type { Diagnostic } from '../core/diagnostics.js';

/** Minimal per-bar input the line breaker needs. */
export interface MeasureSize {
  barIndex: number;
  /** Intrinsic width. */
  width: number;
  tokenCount: number;
}

/** One bar placed on a line. */
export interface LineBar {
  barIndex: number;
  /** Left edge relative to the line start. */
  xOffset: number;
  width: number;
}

/** One laid-out line (system). */
export interface LayoutLine {
  lineIndex: number;
  /** Sum of the assigned bar widths. */
  width: number;
  /** Assigned width over intrinsic width. */
  scale: number;
  bars: LineBar[];
}

/** Numeric layout options, the ones `layoutLines` range-checks. */
export type NumericLayoutOption = Exclude<keyof LayoutConfig, 'justifyLastLine'>;

export type LayoutError =
  | { kind: 'unsatisfiable'; barIndex: number; width: number; pageWidth: number }
  | { kind: 'invalid-page-width'; pageWidth: number }
  | { kind: 'invalid-option'; option: NumericLayoutOption; value: number; reason: string }
  | { kind: 'invalid-measure'; barIndex: number; reason: string };

export type LayoutResult =
  | { ok: true; lines: LayoutLine[]; diagnostics: Diagnostic[] }
  | { ok: false; error: LayoutError; diagnostics: Diagnostic[] };
