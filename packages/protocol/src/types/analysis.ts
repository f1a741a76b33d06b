// Analysis types - range queries and their derived statistics

import type { Region } from './regions.js';
import type { YearQuarter } from './records.js';

/**
 * Identifies the slice of data to analyze.
 * Invariant: start is at or before end.
 */
export type RangeQuery = {
  start: YearQuarter;
  end: YearQuarter;
  region: Region;
};

/**
 * Descriptive statistics for one region over a range.
 * All values are kept at full precision; rounding is a display concern.
 */
export type StatisticsResult = {
  region: Region;
  count: number;
  mean: number;

  /**
   * Population standard deviation (divisor N)
   */
  stdDev: number;

  min: number;
  max: number;
  range: number;
  q1: number;
  median: number;
  q3: number;
  iqr: number;

  /**
   * Change from first to last value in percent.
   * null when the first value is zero.
   */
  percentChange: number | null;
};

/**
 * Everything produced by one analysis run.
 */
export type AnalysisReport = {
  query: RangeQuery;

  /**
   * The selected values, in chronological order
   */
  values: number[];

  statistics: StatisticsResult;

  /**
   * Non-fatal problems the user should see (e.g. percent change unavailable)
   */
  warnings: string[];
};

/**
 * First and last period held by a dataset.
 */
export type DatasetCoverage = {
  count: number;
  first?: YearQuarter;
  last?: YearQuarter;
};
