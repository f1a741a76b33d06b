// Record types - one row of quarterly observations

import type { Region, SheetColumn } from './regions.js';

/**
 * Quarter of a year (1-4).
 */
export type Quarter = 1 | 2 | 3 | 4;

/**
 * A (year, quarter) pair. Periods are ordered by year, then quarter.
 */
export type YearQuarter = {
  year: number;
  quarter: Quarter;
};

/**
 * Price for every recognized region.
 */
export type RegionValues = Record<Region, number>;

/**
 * One parsed, validated quarterly observation.
 */
export type QuarterlyRecord = YearQuarter & {
  /**
   * Non-negative price per region
   */
  values: RegionValues;
};

/**
 * A single cell as the data source hands it over.
 */
export type RawCell = string | number | boolean | null | undefined;

/**
 * An unparsed row keyed by column header.
 * Rows may carry extra columns; only SheetColumn keys are read.
 */
export type RawRow = Partial<Record<SheetColumn, RawCell>> & Record<string, RawCell>;
