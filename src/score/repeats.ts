import type { RepeatMarker } from '../core/score.js';
import type { ScoreError } from './errors.js';

/** Parse `open`, `ending:2` style marker text; `undefined` for unknown markers. */
export function parseRepeatMarker(text: string): RepeatMarker | undefined {
  const ending = /^ending:(-?\d+)$/.exec(text);
  if (ending) {
    return { kind: 'ending', number: Number(ending[1]) };
  }
  switch (text) {
    case 'open':
    case 'close':
    case 'segno':
    case 'dc':
    case 'ds':
    case 'coda':
    case 'to-coda':
    case 'fine':
      return { kind: text };
    default:
      return undefined;
  }
}

export function formatRepeatMarker(marker: RepeatMarker): string {
  return marker.kind === 'ending' ? `ending:${marker.number}` : marker.kind;
}

/**
 * Check repeat structure across all bars: every `open` needs a later `close`,
 * `ds` needs exactly one `segno`, `to-coda` exactly one `coda`, endings are positive.
 */
export function validateRepeats(bars: ReadonlyArray<{ readonly repeats: readonly RepeatMarker[] }>): ScoreError[] {
  const errors: ScoreError[] = [];
  const openBars: number[] = [];
  const segnoBars: number[] = [];
  const codaBars: number[] = [];
  const dsBars: number[] = [];
  const toCodaBars: number[] = [];

  bars.forEach((bar, barIndex) => {
    for (const marker of bar.repeats) {
      switch (marker.kind) {
        case 'open':
          openBars.push(barIndex);
          break;
        case 'close':
          // A close without an open repeats from the start of the piece.
          openBars.pop();
          break;
        case 'segno':
          segnoBars.push(barIndex);
          break;
        case 'coda':
          codaBars.push(barIndex);
          break;
        case 'ds':
          dsBars.push(barIndex);
          break;
        case 'to-coda':
          toCodaBars.push(barIndex);
          break;
        case 'ending':
          if (!Number.isInteger(marker.number) || marker.number <= 0) {
            errors.push({ barIndex, error: { kind: 'invalid-ending', number: marker.number } });
          }
          break;
        case 'dc':
        case 'fine':
          break;
      }
    }
  });

  for (const barIndex of openBars) {
    errors.push({ barIndex, error: { kind: 'unmatched-repeat-open' } });
  }
  checkJumpTarget(errors, dsBars, segnoBars, 'ds', 'segno');
  checkJumpTarget(errors, toCodaBars, codaBars, 'to-coda', 'coda');
  return errors;
}

function checkJumpTarget(
  errors: ScoreError[],
  jumpBars: readonly number[],
  targetBars: readonly number[],
  marker: 'ds' | 'to-coda',
  target: 'segno' | 'coda'
): void {
  if (jumpBars.length === 0) {
    return;
  }
  if (targetBars.length === 0) {
    for (const barIndex of jumpBars) {
      errors.push({ barIndex, error: { kind: 'missing-jump-target', marker, target } });
    }
    return;
  }
  for (const barIndex of targetBars.slice(1)) {
    errors.push({ barIndex, error: { kind: 'duplicate-jump-target', target } });
  }
}
