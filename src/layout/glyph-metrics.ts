import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';

import { isYamlRecord, readOptionalPositiveNumber, rejectUnknownKeys } from '../config/yaml-fields.js';

/** Intrinsic glyph widths in font units, one per glyph category. */
export interface GlyphMetrics {
  notehead: number;
  accidental: number;
  flag: number;
  /** Width of one dynamic letter. */
  dynamic: number;
  rest: number;
  marking: number;
  timeSignature: number;
  barline: number;
}

/** Default widths in font units. */
export const DEFAULT_GLYPH_METRICS: Readonly<GlyphMetrics> = {
  notehead: 266,
  accidental: 240,
  flag: 200,
  dynamic: 300,
  rest: 230,
  marking: 180,
  timeSignature: 450,
  barline: 36
};

/** Validation error for malformed glyph metric tables. */
export class GlyphMetricsError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Glyph metrics error in ${filePath}: ${message}`);
    this.name = 'GlyphMetricsError';
    this.filePath = filePath;
  }
}

/** YAML key for each metric. */
const METRIC_KEYS: Readonly<Record<keyof GlyphMetrics, string>> = {
  notehead: 'notehead',
  accidental: 'accidental',
  flag: 'flag',
  dynamic: 'dynamic',
  rest: 'rest',
  marking: 'marking',
  timeSignature: 'time_signature',
  barline: 'barline'
};

/** Parse a YAML metric table; omitted categories keep their default width. */
export function parseGlyphMetrics(text: string, sourceName = '<inline>'): GlyphMetrics {
  const fail = (message: string): never => {
    throw new GlyphMetricsError(sourceName, message);
  };

  const parsed: unknown = parseYaml(text);
  if (parsed === null || parsed === undefined) {
    return { ...DEFAULT_GLYPH_METRICS };
  }
  if (!isYamlRecord(parsed)) {
    return fail('metrics must be a YAML object');
  }
  rejectUnknownKeys(parsed, Object.values(METRIC_KEYS), fail);

  const metrics: GlyphMetrics = { ...DEFAULT_GLYPH_METRICS };
  for (const [field, key] of Object.entries(METRIC_KEYS)) {
    const value = readOptionalPositiveNumber(parsed, key, fail);
    if (value !== undefined && isMetricField(field)) {
      metrics[field] = value;
    }
  }
  return metrics;
}

function isMetricField(field: string): field is keyof GlyphMetrics {
  return field in DEFAULT_GLYPH_METRICS;
}

/** Read and parse a YAML metric table from disk. */
export async function loadGlyphMetrics(filePath: string): Promise<GlyphMetrics> {
  const raw = await readFile(filePath, 'utf8');
  return parseGlyphMetrics(raw, filePath);
}
