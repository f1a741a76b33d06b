// Analysis flow - range selection feeding the statistics engine

import { formatPeriod } from '@property-tracker/protocol';
import type {
  AnalysisReport,
  DatasetCoverage,
  QuarterlyRecord,
  RangeQuery,
} from '@property-tracker/protocol';
import { selectRange, extractRegionValues } from '../range/select.js';
import { computeStatistics } from '../statistics/compute.js';
import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';

export type AnalyzeRangeOptions = {
  logger?: Logger;
};

/**
 * Run one analysis: select the range, extract the region column, compute statistics.
 *
 * @param records - Records sorted ascending by period
 * @throws InvalidRangeError, NotFoundError, InsufficientDataError, ValidationError
 */
export function analyzeRange(
  records: readonly QuarterlyRecord[],
  query: RangeQuery,
  options: AnalyzeRangeOptions = {}
): AnalysisReport {
  const { logger = silentLogger } = options;

  logger.debug('Analyzing range', {
    start: formatPeriod(query.start),
    end: formatPeriod(query.end),
    region: query.region,
  });

  const selected = selectRange(records, query.start, query.end);
  const values = extractRegionValues(selected, query.region);
  const { result, warnings } = computeStatistics(values, query.region);

  // Warnings are shown in the report; the log only traces them
  for (const warning of warnings) {
    logger.debug(warning);
  }
  logger.debug('Analysis complete', { count: result.count, mean: result.mean });

  return {
    query,
    values,
    statistics: result,
    warnings,
  };
}

/**
 * First and last period of a dataset.
 *
 * @param records - Records sorted ascending by period
 */
export function describeCoverage(records: readonly QuarterlyRecord[]): DatasetCoverage {
  if (records.length === 0) {
    return { count: 0 };
  }
  const first = records[0];
  const last = records[records.length - 1];
  return {
    count: records.length,
    first: { year: first.year, quarter: first.quarter },
    last: { year: last.year, quarter: last.quarter },
  };
}
