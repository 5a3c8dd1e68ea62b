import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import {
  isYamlRecord,
  readOptionalArray,
  readOptionalPositiveNumber,
  readOptionalString,
  readRequiredString,
  type FieldFailure,
  type YamlRecord
} from '../config/yaml-fields.js';
import type { Diagnostic } from '../core/diagnostics.js';
import type { BarInput, ChannelInput, RepeatMarker, SignatureInput } from '../core/score.js';
import { layoutScore } from '../layout/line-layout.js';
import { layoutErrorToDiagnostic } from '../layout/layout-errors.js';
import { assembleScore } from '../score/assemble.js';
import { parseRepeatMarker } from '../score/repeats.js';

/** Expected fixture behavior. */
export type FixtureExpectation = 'pass' | 'fail';

/** One expected assembly error, matched on location and kind. */
export interface ExpectedScoreError {
  bar?: number;
  channel?: number;
  kind: string;
}

/** Parsed contents of one `*.score.yaml` fixture. */
export interface ScoreFixture {
  id: string;
  expected: FixtureExpectation;
  description?: string;
  signatures: SignatureInput[];
  bars: BarInput[];
  expectedErrors?: ExpectedScoreError[];
  pageWidth?: number;
  /** Bar count of each laid-out line. */
  expectedLines?: number[];
}

export interface ScoreFixtureRecord {
  path: string;
  fixture: ScoreFixture;
}

/** Result of running one fixture through assembly and layout. */
export interface ScoreFixtureOutcome {
  id: string;
  expected: FixtureExpectation;
  /** True when the observed behavior matches every expectation in the fixture. */
  pass: boolean;
  assembled: boolean;
  errors: ExpectedScoreError[];
  lineCounts?: number[];
  diagnostics: Diagnostic[];
  /** Human-readable expectation mismatches, empty when `pass`. */
  mismatches: string[];
}

/** Validation error for malformed score fixtures. */
export class ScoreFixtureError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Score fixture error in ${filePath}: ${message}`);
    this.name = 'ScoreFixtureError';
    this.filePath = filePath;
  }
}

const FIXTURE_SUFFIX = '.score.yaml';

/** Load and validate all score fixtures under `rootDir`, sorted by id. */
export async function loadScoreFixtures(rootDir: string): Promise<ScoreFixtureRecord[]> {
  const files = await findFixtureFiles(rootDir);
  const records: ScoreFixtureRecord[] = [];

  for (const filePath of files) {
    const raw = await readFile(filePath, 'utf8');
    records.push({ path: filePath, fixture: parseScoreFixture(raw, filePath) });
  }

  records.sort((left, right) => left.fixture.id.localeCompare(right.fixture.id));
  return records;
}

async function findFixtureFiles(rootDir: string): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.name.endsWith(FIXTURE_SUFFIX)) {
        matches.push(fullPath);
      }
    }
  }

  await walk(rootDir);
  return matches;
}

/** Parse one fixture document. */
export function parseScoreFixture(text: string, filePath: string): ScoreFixture {
  const fail: FieldFailure = (message) => {
    throw new ScoreFixtureError(filePath, message);
  };

  const parsed: unknown = parseYaml(text);
  if (!isYamlRecord(parsed)) {
    return fail('fixture must be a YAML object');
  }

  const id = readRequiredString(parsed, 'id', fail);
  const expected = readRequiredString(parsed, 'expected', fail);
  if (expected !== 'pass' && expected !== 'fail') {
    return fail("'expected' must be 'pass' or 'fail'");
  }

  const fixture: ScoreFixture = {
    id,
    expected,
    signatures: (readOptionalArray(parsed, 'signatures', fail) ?? []).map((entry, index) =>
      readSignature(entry, index, fail)
    ),
    bars: (readOptionalArray(parsed, 'bars', fail) ?? []).map((entry, index) => readBar(entry, index, fail))
  };

  const description = readOptionalString(parsed, 'description', fail);
  if (description !== undefined) {
    fixture.description = description;
  }
  const expectedErrors = readOptionalArray(parsed, 'expected_errors', fail);
  if (expectedErrors !== undefined) {
    fixture.expectedErrors = expectedErrors.map((entry, index) => readExpectedError(entry, index, fail));
  }
  const pageWidth = readOptionalPositiveNumber(parsed, 'page_width', fail);
  if (pageWidth !== undefined) {
    fixture.pageWidth = pageWidth;
  }
  const expectedLines = readOptionalArray(parsed, 'expected_lines', fail);
  if (expectedLines !== undefined) {
    fixture.expectedLines = expectedLines.map((count) =>
      typeof count === 'number' && Number.isInteger(count) && count > 0
        ? count
        : fail("'expected_lines' must list positive integers")
    );
  }
  return fixture;
}

function readRecordEntry(entry: unknown, label: string, fail: FieldFailure): YamlRecord {
  return isYamlRecord(entry) ? entry : fail(`${label} must be an object`);
}

function readInteger(obj: YamlRecord, key: string, label: string, fail: FieldFailure): number | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  return typeof value === 'number' && Number.isInteger(value) ? value : fail(`${label} '${key}' must be an integer`);
}

function readSignature(entry: unknown, index: number, fail: FieldFailure): SignatureInput {
  const label = `signatures[${index}]`;
  const obj = readRecordEntry(entry, label, fail);
  const time = /^(\d+)\/(\d+)$/.exec(String(obj.time ?? ''));
  if (!time) {
    return fail(`${label} 'time' must look like 3/4`);
  }

  const signature: SignatureInput = {
    key: readInteger(obj, 'key', label, fail) ?? 0,
    time: { beats: Number(time[1]), beatUnit: Number(time[2]) },
    tempo: readInteger(obj, 'tempo', label, fail) ?? 120
  };
  const swing = readInteger(obj, 'swing', label, fail);
  if (swing !== undefined) {
    signature.swing = swing;
  }
  return signature;
}

function readChannel(entry: unknown, label: string, fail: FieldFailure): ChannelInput {
  if (typeof entry === 'string') {
    return { notes: entry };
  }
  const obj = readRecordEntry(entry, label, fail);
  const notes = obj.notes;
  if (typeof notes !== 'string') {
    return fail(`${label} 'notes' must be a string`);
  }
  const lyric = readOptionalString(obj, 'lyric', fail);
  return lyric === undefined ? { notes } : { notes, lyric };
}

function readBar(entry: unknown, index: number, fail: FieldFailure): BarInput {
  const label = `bars[${index}]`;
  const obj = readRecordEntry(entry, label, fail);
  const channels = (readOptionalArray(obj, 'channels', fail) ?? []).map((channel, channelIndex) =>
    readChannel(channel, `${label}.channels[${channelIndex}]`, fail)
  );

  const bar: BarInput = { channels };
  const signature = readInteger(obj, 'signature', label, fail);
  if (signature !== undefined) {
    bar.signature = signature;
  }
  const repeats = readOptionalArray(obj, 'repeats', fail);
  if (repeats !== undefined) {
    bar.repeats = repeats.map((marker): RepeatMarker => {
      const parsed = typeof marker === 'string' ? parseRepeatMarker(marker) : undefined;
      return parsed ?? fail(`${label} has unknown repeat marker '${String(marker)}'`);
    });
  }
  return bar;
}

function readExpectedError(entry: unknown, index: number, fail: FieldFailure): ExpectedScoreError {
  const label = `expected_errors[${index}]`;
  const obj = readRecordEntry(entry, label, fail);
  const expected: ExpectedScoreError = { kind: readRequiredString(obj, 'kind', fail) };
  const bar = readInteger(obj, 'bar', label, fail);
  if (bar !== undefined) {
    expected.bar = bar;
  }
  const channel = readInteger(obj, 'channel', label, fail);
  if (channel !== undefined) {
    expected.channel = channel;
  }
  return expected;
}

function formatExpectedError(error: ExpectedScoreError): string {
  return `${error.kind}@${error.bar ?? '-'}:${error.channel ?? '-'}`;
}

/** Assemble (and lay out, when the fixture names a page width) and compare against expectations. */
export function runScoreFixture(record: ScoreFixtureRecord): ScoreFixtureOutcome {
  const { fixture } = record;
  const mismatches: string[] = [];
  const assembled = assembleScore(fixture.signatures, fixture.bars, { sourceName: fixture.id });
  const diagnostics = [...assembled.diagnostics];

  const errors: ExpectedScoreError[] = assembled.ok
    ? []
    : assembled.errors.map((scoreError) => {
        const entry: ExpectedScoreError = { kind: scoreError.error.kind };
        if (scoreError.barIndex !== undefined) {
          entry.bar = scoreError.barIndex;
        }
        if (scoreError.channelIndex !== undefined) {
          entry.channel = scoreError.channelIndex;
        }
        return entry;
      });

  if (fixture.expected === 'pass' && !assembled.ok) {
    mismatches.push(`expected assembly to pass, got ${errors.map(formatExpectedError).join(', ')}`);
  }
  if (fixture.expected === 'fail' && assembled.ok) {
    mismatches.push('expected assembly to fail');
  }
  if (fixture.expectedErrors) {
    const want = fixture.expectedErrors.map(formatExpectedError).join(', ');
    const got = errors.map(formatExpectedError).join(', ');
    if (want !== got) {
      mismatches.push(`expected errors [${want}], got [${got}]`);
    }
  }

  let lineCounts: number[] | undefined;
  if (assembled.ok && fixture.pageWidth !== undefined) {
    const layout = layoutScore(assembled.score, fixture.pageWidth);
    diagnostics.push(...layout.diagnostics);
    if (layout.ok) {
      lineCounts = layout.lines.map((line) => line.bars.length);
    } else {
      diagnostics.push(layoutErrorToDiagnostic(layout.error, fixture.id));
      mismatches.push(`layout failed: ${layout.error.kind}`);
    }
  }
  if (fixture.expectedLines && lineCounts?.join(',') !== fixture.expectedLines.join(',')) {
    mismatches.push(`expected lines [${fixture.expectedLines.join(', ')}], got [${lineCounts?.join(', ') ?? ''}]`);
  }

  return {
    id: fixture.id,
    expected: fixture.expected,
    pass: mismatches.length === 0,
    assembled: assembled.ok,
    errors,
    ...(lineCounts ? { lineCounts } : {}),
    diagnostics,
    mismatches
  };
}
