/**
 * A run of code values that must stay in one segment: a single septet or
 * an escape pair, a single UTF-16 code unit or a surrogate pair.
 */
export type AtomicUnit = readonly number[];

/**
 * Greedily pack atomic units into segments of at most `budget` values.
 * A unit that would overflow the current segment starts the next one.
 * Empty input yields a single empty segment.
 *
 * @param onOversized  builds the error thrown for a unit larger than `budget`
 */
export function chunkUnits(
  units: readonly AtomicUnit[],
  budget: number,
  onOversized: (unit: AtomicUnit) => Error,
): number[][] {
  const segments: number[][] = [];
  let current: number[] = [];

  for (const unit of units) {
    if (unit.length > budget) {
      throw onOversized(unit);
    }
    if (current.length + unit.length > budget) {
      segments.push(current);
      current = [];
    }
    current.push(...unit);
  }

  segments.push(current);
  return segments;
}

