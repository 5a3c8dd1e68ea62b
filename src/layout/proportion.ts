/** Assigned widths for one line and whether any bar had to be clamped. */
export interface Distribution {
  widths: number[];
  clamped: boolean;
}

/**
 * Share `targetWidth` among bars in proportion to their intrinsic widths, with
 * no bar wider than `maxWidthRatio` times the narrowest.
 *
 * Clamping bars at `maxWidthRatio * min` and rescaling is the fixed point of
 * water-filling: the narrowest bar is never clamped, so one pass settles every bar.
 */
export function distributeWidths(
  intrinsic: readonly number[],
  targetWidth: number,
  maxWidthRatio: number
): Distribution {
  if (intrinsic.length === 0) {
    return { widths: [], clamped: false };
  }

  const narrowest = Math.min(...intrinsic);
  const ceiling = narrowest * maxWidthRatio;
  const capped = intrinsic.map((width) => Math.min(width, ceiling));
  const total = capped.reduce((sum, width) => sum + width, 0);
  const factor = total > 0 ? targetWidth / total : 0;

  return {
    widths: capped.map((width) => width * factor),
    clamped: intrinsic.some((width) => width > ceiling)
  };
}

/** Right-edge barline positions of consecutive widths. */
export function barlinePositions(widths: readonly number[]): number[] {
  const positions: number[] = [];
  let x = 0;
  for (const width of widths) {
    x += width;
    positions.push(x);
  }
  return positions;
}

/**
 * Blend `widths` toward `reference` just enough that no barline differs from
 * the reference line by more than `tolerance`. Returns `undefined` when the
 * lines already align. Both lists must have the same length and total.
 */
export function alignToReference(
  widths: readonly number[],
  reference: readonly number[],
  tolerance: number
): number[] | undefined {
  const own = barlinePositions(widths);
  const target = barlinePositions(reference);
  let maxDiff = 0;
  own.forEach((position, index) => {
    maxDiff = Math.max(maxDiff, Math.abs(position - (target[index] ?? position)));
  });
  if (maxDiff <= tolerance) {
    return undefined;
  }

  const alpha = Math.max(0, 1 - tolerance / maxDiff);
  return widths.map((width, index) => (1 - alpha) * width + alpha * (reference[index] ?? width));
}
