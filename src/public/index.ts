export {
  buildScore,
  engraveScore,
  loadEngravingFiles,
  updateScore,
  type EngraveOptions,
  type EngraveResult,
  type EngravingFiles,
  type ScoreOptions,
  type ScoreResult
} from './api.js';

export type { Diagnostic, DiagnosticSeverity, DiagnosticSource } from '../core/diagnostics.js';
export { formatDiagnostic, hasErrors } from '../core/diagnostics.js';
export {
  addFractions,
  checkedAddFractions,
  checkedSumFractions,
  compareFractions,
  formatFraction,
  fraction,
  FractionError,
  fractionsEqual,
  multiplyFractions,
  parseFraction,
  subtractFractions,
  sumFractions,
  ZERO,
  type Fraction
} from '../core/fraction.js';
export { isMicrotonalKey, keyAccidentalCount, keyName } from '../core/key-signature.js';
export {
  compareDynamics,
  isMeasureRepeat,
  notePitches,
  pitchClassQuarterTones,
  staffSteps,
  type Accidental,
  type Articulation,
  type Dynamic,
  type GraceToken,
  type MarkingKind,
  type MarkingToken,
  type NotationToken,
  type NoteToken,
  type Ornament,
  type Pitch,
  type PitchBend,
  type RestToken
} from '../core/notation.js';
export type {
  Bar,
  BarInput,
  Channel,
  ChannelInput,
  NotesChannel,
  RepeatMarker,
  RepeatsPreviousChannel,
  Score,
  Signature,
  SignatureInput,
  TimeSignature
} from '../core/score.js';

export { decodeErrorToDiagnostic, type DecodeError, type DecodeOptions } from '../parser/decode-context.js';
export { decodeNotation, type DecodeResult } from '../parser/decode.js';
export { encodeNotation, NotationEncodeError } from '../parser/encode.js';

export { assembleScore, type AssembleOptions, type AssembleResult } from '../score/assemble.js';
export { scoreErrorToDiagnostic, type ScoreError, type ScoreErrorDetail } from '../score/errors.js';
export { patchScore, type ChannelPatch } from '../score/patch.js';
export { formatRepeatMarker, parseRepeatMarker } from '../score/repeats.js';
export { effectiveSignature, resolveChannel } from '../score/resolve.js';
export {
  channelDuration,
  requiredBarDuration,
  validateBeats,
  type BeatMismatch,
  type BeatOverflow
} from '../score/timing.js';

export {
  DEFAULT_ENGRAVING_CONFIG,
  EngravingConfigError,
  loadEngravingConfig,
  parseEngravingConfig,
  type EngravingConfig,
  type LayoutConfig,
  type WidthConfig
} from '../config/engraving-config.js';
export {
  DEFAULT_GLYPH_METRICS,
  GlyphMetricsError,
  loadGlyphMetrics,
  parseGlyphMetrics,
  type GlyphMetrics
} from '../layout/glyph-metrics.js';
export { layoutErrorToDiagnostic } from '../layout/layout-errors.js';
export type {
  LayoutError,
  LayoutLine,
  LayoutResult,
  LineBar,
  MeasureSize,
  NumericLayoutOption
} from '../layout/layout-types.js';
export { layoutLines, layoutScore, type LayoutScoreOptions } from '../layout/line-layout.js';
export { estimateMeasureWidth, estimateScoreWidths, type MeasureEstimate } from '../layout/measure-width.js';
