// Descriptive statistics over one region's values
//
// All functions are pure. Values keep full precision; rounding is left to
// presentation.

import type { Region, StatisticsResult } from '@property-tracker/protocol';
import {
  DivisionByZeroError,
  InsufficientDataError,
  ValidationError,
} from '../errors.js';

/**
 * Minimum number of values for a statistics run.
 */
export const MIN_DATA_POINTS = 2;

export type ComputeStatisticsResult = {
  result: StatisticsResult;

  /**
   * Non-fatal problems, e.g. percent change unavailable
   */
  warnings: string[];
};

export function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Population standard deviation (divides by N, not N-1).
 */
export function populationStdDev(values: readonly number[]): number {
  const m = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Quantile by linear interpolation: position (n-1)*p in the sorted values,
 * interpolating between the two bracketing values when fractional.
 *
 * @param sorted - Values sorted ascending (non-empty)
 * @param p - Probability in [0, 1]
 */
export function quantileSorted(sorted: readonly number[], p: number): number {
  const position = (sorted.length - 1) * p;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const fraction = position - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * fraction;
}

/**
 * Percent change from the first to the last value.
 *
 * @throws DivisionByZeroError if the first value is zero
 */
export function percentChange(values: readonly number[]): number {
  const first = values[0];
  const last = values[values.length - 1];
  if (first === 0) {
    throw new DivisionByZeroError('percent change');
  }
  return ((last - first) / first) * 100;
}

/**
 * Compute the full statistics battery for one region.
 *
 * A zero first value does not abort the run: percentChange is reported as
 * null and a warning is returned instead.
 *
 * @param values - Values in chronological order
 * @throws InsufficientDataError if fewer than two values are given
 * @throws ValidationError if a value is not a finite number
 */
export function computeStatistics(
  values: readonly number[],
  region: Region
): ComputeStatisticsResult {
  if (values.length < MIN_DATA_POINTS) {
    throw new InsufficientDataError(values.length, MIN_DATA_POINTS);
  }

  const badIndex = values.findIndex((v) => !Number.isFinite(v));
  if (badIndex !== -1) {
    throw new ValidationError(`${region} value at position ${badIndex + 1} is not a finite number`, {
      field: region,
      details: { index: badIndex, value: values[badIndex] },
    });
  }

  const sorted = [...values].sort((a, b) => a - b);
  const min = sorted[0];
  const max = sorted[sorted.length - 1];
  const q1 = quantileSorted(sorted, 0.25);
  const median = quantileSorted(sorted, 0.5);
  const q3 = quantileSorted(sorted, 0.75);

  const warnings: string[] = [];
  let change: number | null;
  try {
    change = percentChange(values);
  } catch (error) {
    if (!(error instanceof DivisionByZeroError)) {
      throw error;
    }
    change = null;
    warnings.push(`Percent change for ${region} is N/A: ${error.message}`);
  }

  return {
    result: {
      region,
      count: values.length,
      mean: mean(values),
      stdDev: populationStdDev(values),
      min,
      max,
      range: max - min,
      q1,
      median,
      q3,
      iqr: q3 - q1,
      percentChange: change,
    },
    warnings,
  };
}
