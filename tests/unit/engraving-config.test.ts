import path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  DEFAULT_ENGRAVING_CONFIG,
  EngravingConfigError,
  defaultEngravingConfig,
  loadEngravingConfig,
  parseEngravingConfig
} from '../../src/config/engraving-config.js';

describe('engraving config', () => {
  it('overlays a config file on the defaults', async () => {
    const config = await loadEngravingConfig(path.resolve('fixtures/config/engraving.yaml'));

    expect(config.widths.measureUnit).toBe(3000);
    expect(config.widths.slotFractions).toEqual({ ...DEFAULT_ENGRAVING_CONFIG.widths.slotFractions, quarter: 0.25 });
    expect(config.widths.accidentals).toEqual({ ...DEFAULT_ENGRAVING_CONFIG.widths.accidentals, collisionSteps: 5 });
    expect(config.widths.graceScale).toBe(0.6);
    expect(config.layout).toEqual({
      ...DEFAULT_ENGRAVING_CONFIG.layout,
      maxBarsPerLine: 6,
      stretchTolerance: 0.1,
      justifyLastLine: false
    });
  });

  it('treats an empty document as the defaults', () => {
    expect(parseEngravingConfig('')).toEqual(defaultEngravingConfig());
  });

  it('returns copies that do not alias the defaults', () => {
    const config = defaultEngravingConfig();
    config.widths.slotFractions.whole = 2;
    config.layout.maxBarsPerLine = 1;

    expect(DEFAULT_ENGRAVING_CONFIG.widths.slotFractions.whole).toBe(1);
    expect(DEFAULT_ENGRAVING_CONFIG.layout.maxBarsPerLine).toBe(9);
  });

  it('rejects unknown keys with their full path', () => {
    expect(() => parseEngravingConfig('widths:\n  slot_fractions:\n    crotchet: 1/3\n', 'engraving.yaml')).toThrow(
      "Engraving config error in engraving.yaml: unknown key 'widths.slot_fractions.crotchet'"
    );
    expect(() => parseEngravingConfig('spacing: {}\n')).toThrow(EngravingConfigError);
  });

  it('validates field ranges', () => {
    expect(() => parseEngravingConfig('widths:\n  measure_unit: 0\n')).toThrow("'measure_unit' must be positive");
    expect(() => parseEngravingConfig('layout:\n  stretch_tolerance: -0.5\n')).toThrow(
      "'stretch_tolerance' must not be negative"
    );
    expect(() => parseEngravingConfig('layout:\n  max_width_ratio: 0.5\n')).toThrow(
      "'max_width_ratio' must be at least 1"
    );
    expect(() => parseEngravingConfig('layout:\n  justify_last_line: sometimes\n')).toThrow(
      "'justify_last_line' must be a boolean"
    );
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseEngravingConfig('- 1\n- 2\n')).toThrow('config must be a YAML object');
  });
});
