// Protocol types

export type { Region, SheetColumn } from './regions.js';
export { REGIONS, SHEET_COLUMNS, isRegion } from './regions.js';

export type {
  Quarter,
  YearQuarter,
  RegionValues,
  QuarterlyRecord,
  RawCell,
  RawRow,
} from './records.js';

export type {
  RangeQuery,
  StatisticsResult,
  AnalysisReport,
  DatasetCoverage,
} from './analysis.js';
