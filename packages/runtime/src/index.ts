// @property-tracker/runtime
// Parsing, range selection, statistics and the flows built on them

// Error types
export {
  RuntimeError,
  ValidationError,
  InvalidRangeError,
  NotFoundError,
  InsufficientDataError,
  DivisionByZeroError,
  ExportError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createLogger,
  createConsoleLogger,
  createLevelLogger,
  createCapturingLogger,
  formatLogEntry,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
} from './logger.js';

// Record parsing
export {
  parseRecord,
  parseRecords,
  YearCellSchema,
  QuarterCellSchema,
  PriceCellSchema,
} from './records/parse.js';
export { loadRecords, type LoadRecordsOptions } from './records/load.js';

// Range selection
export { selectRange, extractRegionValues, isWithinRange } from './range/select.js';

// Statistics
export {
  computeStatistics,
  mean,
  populationStdDev,
  quantileSorted,
  percentChange,
  MIN_DATA_POINTS,
  type ComputeStatisticsResult,
} from './statistics/compute.js';

// Analysis flow
export {
  analyzeRange,
  describeCoverage,
  type AnalyzeRangeOptions,
} from './analysis/analyze.js';

// Append flow
export {
  latestRecord,
  periodToAppend,
  buildAppendRow,
  appendNextRecord,
  type RawRegionValues,
  type AppendNextRecordOptions,
} from './append/append.js';

// Presentation and export
export {
  formatReport,
  formatReportCsv,
  formatNumber,
  reportMetrics,
  describeQuery,
  csvFileName,
  DISPLAY_DECIMALS,
  NOT_AVAILABLE,
} from './report/format.js';
export {
  exportReport,
  formatTextExportEntry,
  TEXT_EXPORT_FILE,
  type ExportReportOptions,
} from './report/export.js';

// User input
export {
  parseYearInput,
  parseQuarterInput,
  parseRegionInput,
  parsePriceInput,
  parseYesNo,
  parsePeriodInput,
} from './input/parse.js';
