// Loads and validates the full dataset from a record source

import type { QuarterlyRecord } from '@property-tracker/protocol';
import type { RecordSource } from '@property-tracker/repositories';
import { parseRecords } from './parse.js';
import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';

export type LoadRecordsOptions = {
  logger?: Logger;
};

/**
 * Fetch every row and parse it into records sorted by period.
 *
 * @throws DataSourceError if the fetch fails; ValidationError for a malformed row
 */
export async function loadRecords(
  source: RecordSource,
  options: LoadRecordsOptions = {}
): Promise<QuarterlyRecord[]> {
  const { logger = silentLogger } = options;

  const rows = await source.fetchAll();
  const records = parseRecords(rows);

  logger.debug('Loaded records', { rows: rows.length });
  return records;
}
