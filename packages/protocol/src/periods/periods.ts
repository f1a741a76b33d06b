// Period helpers - ordering and labelling of (year, quarter) pairs

import type { Quarter, YearQuarter } from '../types/records.js';

export const QUARTERS: readonly Quarter[] = [1, 2, 3, 4] as const;

/**
 * Check if a number is a valid quarter.
 */
export function isQuarter(value: number): value is Quarter {
  return (QUARTERS as readonly number[]).includes(value);
}

/**
 * Compare two periods lexicographically on (year, quarter).
 *
 * @returns negative if a is earlier, positive if later, 0 if equal
 */
export function comparePeriods(a: YearQuarter, b: YearQuarter): number {
  if (a.year !== b.year) {
    return a.year - b.year;
  }
  return a.quarter - b.quarter;
}

export function periodsEqual(a: YearQuarter, b: YearQuarter): boolean {
  return comparePeriods(a, b) === 0;
}

/**
 * The period immediately after the given one. Q4 rolls over to Q1 of the next year.
 */
export function nextPeriod(period: YearQuarter): YearQuarter {
  if (period.quarter === 4) {
    return { year: period.year + 1, quarter: 1 };
  }
  const quarter = period.quarter + 1;
  if (!isQuarter(quarter)) {
    throw new Error(`Unreachable quarter: ${quarter}`);
  }
  return { year: period.year, quarter };
}

/**
 * Render a period as "2020-Q1".
 */
export function formatPeriod(period: YearQuarter): string {
  return `${period.year}-Q${period.quarter}`;
}

/**
 * Parse a "2020-Q1" style label (also accepts "2020Q1" and "2020-1").
 *
 * @returns The period, or null if the label is not well-formed
 */
export function parsePeriodLabel(label: string): YearQuarter | null {
  const match = /^(\d{4})-?Q?([1-4])$/i.exec(label.trim());
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const quarter = Number(match[2]);
  if (year <= 0 || !isQuarter(quarter)) {
    return null;
  }
  return { year, quarter };
}
