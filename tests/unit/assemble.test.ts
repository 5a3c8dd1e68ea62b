import { describe, expect, it } from 'vitest';

import { fraction } from '../../src/core/fraction.js';
import type { BarInput, SignatureInput } from '../../src/core/score.js';
import { assembleScore } from '../../src/score/assemble.js';
import { scoreErrorToDiagnostic } from '../../src/score/errors.js';
import { effectiveSignature, resolveChannel } from '../../src/score/resolve.js';

const WALTZ: SignatureInput = { key: 0, time: { beats: 3, beatUnit: 4 }, tempo: 96 };
const COMMON: SignatureInput = { key: 2, time: { beats: 4, beatUnit: 4 }, tempo: 120, swing: 66 };

function bars(...notes: string[]): BarInput[] {
  return notes.map((text) => ({ channels: [{ notes: text }] }));
}

describe('assembleScore', () => {
  it('assembles a valid three-four bar', () => {
    const result = assembleScore([WALTZ], bars('C4D4E4'));

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    const [bar] = result.score.bars;
    expect(result.diagnostics).toEqual([]);
    expect(bar?.signature).toEqual({ key: 0, time: { beats: 3, beatUnit: 4 }, tempo: 96, swing: 50 });
    expect(bar?.channels[0]).toMatchObject({ kind: 'notes', source: 'C4D4E4', duration: fraction(3, 4) });
  });

  it('reports a beat mismatch with expected and actual sums', () => {
    const result = assembleScore([WALTZ], bars('C4D4'));

    expect(result).toMatchObject({
      ok: false,
      errors: [
        {
          barIndex: 0,
          channelIndex: 0,
          error: { kind: 'beat-mismatch', expected: fraction(3, 4), actual: fraction(1, 2) }
        }
      ]
    });
  });

  it('reports coprime durations that overflow the beat sum as an error value', () => {
    const result = assembleScore(
      [{ key: 0, time: { beats: 4, beatUnit: 4 }, tempo: 120 }],
      bars('1/1021C41/1019D41/1013E41/1009F41/997G41/991A4')
    );

    expect(result).toMatchObject({
      ok: false,
      errors: [{ barIndex: 0, channelIndex: 0, error: { kind: 'beat-overflow', expected: fraction(1, 1) } }],
      diagnostics: [{ code: 'SCORE_BEAT_OVERFLOW', severity: 'error', source: { bar: 0, channel: 0 } }]
    });
  });

  it('reports an unrecognized token with its position', () => {
    const result = assembleScore([WALTZ], bars('Q'));

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.errors).toEqual([
      { barIndex: 0, channelIndex: 0, error: { kind: 'unrecognized-token', position: 0 } }
    ]);
    expect(result.diagnostics[0]?.code).toBe('NOTATION_UNRECOGNIZED_TOKEN');
  });

  it('inherits the most recent signature override', () => {
    const result = assembleScore(
      [WALTZ, COMMON],
      [
        { channels: [{ notes: 'C4D4E4' }] },
        { signature: 1, channels: [{ notes: 'C4D4E4F4' }] },
        { channels: [{ notes: '1/1C4' }] }
      ]
    );

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.score.bars.map((bar) => bar.signatureIndex)).toEqual([0, 1, 1]);
    expect(result.score.bars[1]?.signatureOverride).toBe(1);
    expect(result.score.bars[2]?.signatureOverride).toBeUndefined();
    expect(effectiveSignature(result.score, 2)?.swing).toBe(66);
  });

  it('collects every error in bar then channel order', () => {
    const result = assembleScore(
      [WALTZ],
      [
        { channels: [{ notes: 'C4D4E4' }, { notes: '%' }] },
        { channels: [{ notes: 'C4' }] },
        { signature: 4, channels: [{ notes: 'Q' }, { notes: 'C4D4' }] }
      ]
    );

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.errors.map((error) => [error.barIndex, error.channelIndex, error.error.kind])).toEqual([
      [0, 1, 'repeat-without-previous'],
      [1, undefined, 'channel-count-mismatch'],
      [1, 0, 'beat-mismatch'],
      [2, undefined, 'dangling-signature'],
      [2, 0, 'unrecognized-token'],
      [2, 1, 'beat-mismatch']
    ]);
    expect(result.diagnostics).toHaveLength(6);
  });

  it('reports malformed signatures and skips the bars under them', () => {
    const result = assembleScore(
      [{ key: 15, time: { beats: 3, beatUnit: 4 }, tempo: 96 }, { key: 0, time: { beats: 3, beatUnit: 6 }, tempo: 96 }],
      bars('C4D4E4')
    );

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.errors.map((error) => error.error)).toEqual([
      { kind: 'invalid-signature', signatureIndex: 0, reason: 'key must be an integer in [-14, 14], got 15' },
      {
        kind: 'invalid-signature',
        signatureIndex: 1,
        reason: 'beat unit must be a power of two up to 128, got 6'
      }
    ]);
  });

  it('still checks bars under valid signatures when another signature is malformed', () => {
    const result = assembleScore(
      [WALTZ, { key: 0, time: { beats: 3, beatUnit: 6 }, tempo: 96 }],
      [
        { channels: [{ notes: 'C4D4' }] },
        { signature: 1, channels: [{ notes: 'C4D4E4' }] },
        { channels: [{ notes: 'Q' }] }
      ]
    );

    expect(result).toMatchObject({
      ok: false,
      errors: [
        {
          error: {
            kind: 'invalid-signature',
            signatureIndex: 1,
            reason: 'beat unit must be a power of two up to 128, got 6'
          }
        },
        {
          barIndex: 0,
          channelIndex: 0,
          error: { kind: 'beat-mismatch', expected: fraction(3, 4), actual: fraction(1, 2) }
        }
      ]
    });
  });

  it('requires at least one signature', () => {
    expect(assembleScore([], bars('C4D4E4'))).toEqual({
      ok: false,
      errors: [{ error: { kind: 'missing-signature' } }],
      diagnostics: [
        { code: 'SCORE_MISSING_SIGNATURE', severity: 'error', message: 'A score needs at least one signature.' }
      ]
    });
  });

  it('decodes quarter-tone accidentals only under a quarter-tone key', () => {
    const quarterTone: SignatureInput = { key: -3, time: { beats: 1, beatUnit: 4 }, tempo: 60 };
    const plain: SignatureInput = { key: -2, time: { beats: 1, beatUnit: 4 }, tempo: 60 };

    expect(assembleScore([quarterTone], bars('Bd4')).ok).toBe(true);
    expect(assembleScore([plain], bars('Bd4'))).toMatchObject({
      ok: false,
      errors: [{ barIndex: 0, channelIndex: 0, error: { kind: 'invalid-accidental', position: 1 } }]
    });
  });

  it('keeps measure repeats as back references resolved on demand', () => {
    const result = assembleScore([WALTZ], [
      { channels: [{ notes: '1/2C41/4D4', lyric: 'hey' }] },
      { channels: [{ notes: '%' }] },
      { channels: [{ notes: '%', lyric: 'again' }] }
    ]);

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.score.bars[2]?.channels[0]).toEqual({ kind: 'repeats-previous', source: '%', lyric: 'again' });
    expect(resolveChannel(result.score, 2, 0)).toBe(result.score.bars[0]?.channels[0]);
    expect(resolveChannel(result.score, 2, 5)).toBeUndefined();
  });

  it('names the fixture in diagnostics', () => {
    const result = assembleScore([WALTZ], bars('C4D4'), { sourceName: 'etude.score.yaml' });
    expect(result.diagnostics).toEqual([
      {
        code: 'SCORE_BEAT_MISMATCH',
        severity: 'error',
        message: 'Channel lasts 1/2 but the time signature requires 3/4.',
        source: { name: 'etude.score.yaml', bar: 0, channel: 0 }
      }
    ]);
  });

  it('formats score-wide errors without a location', () => {
    expect(scoreErrorToDiagnostic({ error: { kind: 'dangling-signature', signatureIndex: 3 } })).toEqual({
      code: 'SCORE_DANGLING_SIGNATURE',
      severity: 'error',
      message: 'Signature index 3 does not exist.'
    });
  });
});
