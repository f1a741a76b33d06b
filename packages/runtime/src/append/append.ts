// Append flow - adding the next quarter to the data source

import {
  REGIONS,
  comparePeriods,
  formatPeriod,
  nextPeriod,
} from '@property-tracker/protocol';
import type {
  QuarterlyRecord,
  RawCell,
  RawRow,
  Region,
  YearQuarter,
} from '@property-tracker/protocol';
import type { RecordSource } from '@property-tracker/repositories';
import { parseRecord } from '../records/parse.js';
import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { ValidationError } from '../errors.js';

/**
 * Region values as the user typed them.
 */
export type RawRegionValues = Partial<Record<Region, RawCell>>;

export type AppendNextRecordOptions = {
  /**
   * Period to use when the dataset is empty (there is no latest record to follow).
   */
  firstPeriod?: YearQuarter;

  logger?: Logger;
};

/**
 * The record with the latest period, or undefined for an empty dataset.
 * Pure lookup over the already-fetched records.
 */
export function latestRecord(
  records: readonly QuarterlyRecord[]
): QuarterlyRecord | undefined {
  let latest: QuarterlyRecord | undefined;
  for (const record of records) {
    if (!latest || comparePeriods(record, latest) > 0) {
      latest = record;
    }
  }
  return latest;
}

/**
 * The period a new row should carry.
 *
 * @throws ValidationError if the dataset is empty and no first period is given
 */
export function periodToAppend(
  records: readonly QuarterlyRecord[],
  firstPeriod?: YearQuarter
): YearQuarter {
  const latest = latestRecord(records);
  if (latest) {
    return nextPeriod(latest);
  }
  if (!firstPeriod) {
    throw new ValidationError('The dataset is empty; a starting period is required', {
      field: 'period',
    });
  }
  return firstPeriod;
}

/**
 * Validate raw region values for a period and build the row to append.
 * Nothing is written; the returned record is what the row will parse back to.
 *
 * @throws ValidationError if any value fails parsing
 */
export function buildAppendRow(
  period: YearQuarter,
  rawValues: RawRegionValues
): { row: RawRow; record: QuarterlyRecord } {
  const candidate: RawRow = { Year: period.year, Quarter: period.quarter };
  for (const region of REGIONS) {
    candidate[region] = rawValues[region];
  }

  const record = parseRecord(candidate);

  const row: RawRow = { Year: record.year, Quarter: record.quarter, ...record.values };

  return { row, record };
}

/**
 * Append the chronologically next quarter.
 * Every value is validated before the source is touched; a failure writes nothing.
 *
 * @param records - Records already fetched from the same source
 * @returns The appended record
 * @throws ValidationError for bad input; DataSourceError if the append fails
 */
export async function appendNextRecord(
  source: RecordSource,
  records: readonly QuarterlyRecord[],
  rawValues: RawRegionValues,
  options: AppendNextRecordOptions = {}
): Promise<QuarterlyRecord> {
  const { logger = silentLogger } = options;

  const period = periodToAppend(records, options.firstPeriod);
  const { row, record } = buildAppendRow(period, rawValues);

  logger.debug('Appending row', { period: formatPeriod(period) });
  await source.append(row);
  logger.info(`Added ${formatPeriod(period)}`);

  return record;
}
