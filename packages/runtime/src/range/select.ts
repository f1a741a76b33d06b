// Range selection - the contiguous slice of records between two periods

import { comparePeriods } from '@property-tracker/protocol';
import type { QuarterlyRecord, Region, YearQuarter } from '@property-tracker/protocol';
import { InvalidRangeError, NotFoundError } from '../errors.js';

/**
 * Check if a period lies within [start, end], both bounds inclusive.
 */
export function isWithinRange(
  period: YearQuarter,
  start: YearQuarter,
  end: YearQuarter
): boolean {
  return comparePeriods(period, start) >= 0 && comparePeriods(period, end) <= 0;
}

/**
 * Select every record from start to end, inclusive, in their original order.
 *
 * Bounds must name periods present in the dataset: nothing is interpolated
 * or snapped to the nearest available quarter.
 *
 * @param records - Records sorted ascending by period
 * @throws InvalidRangeError if start is after end (bounds are never swapped)
 * @throws NotFoundError if either bound is absent (start is checked first)
 */
export function selectRange(
  records: readonly QuarterlyRecord[],
  start: YearQuarter,
  end: YearQuarter
): QuarterlyRecord[] {
  if (comparePeriods(start, end) > 0) {
    throw new InvalidRangeError(start, end);
  }

  if (!records.some((r) => comparePeriods(r, start) === 0)) {
    throw new NotFoundError('start', start);
  }
  if (!records.some((r) => comparePeriods(r, end) === 0)) {
    throw new NotFoundError('end', end);
  }

  return records.filter((r) => isWithinRange(r, start, end));
}

/**
 * Pull one region's values out of a record sequence, preserving order.
 */
export function extractRegionValues(
  records: readonly QuarterlyRecord[],
  region: Region
): number[] {
  return records.map((r) => r.values[region]);
}
