import type { RawRow } from '@property-tracker/protocol';

/**
 * Contract for the store holding the canonical sequence of quarterly rows.
 *
 * Implementations hand rows over unparsed; validation is the runtime's job.
 * Failures to reach the store surface as DataSourceError.
 */
export interface RecordSource {
  /**
   * Fetch every data row in sheet order (header excluded).
   */
  fetchAll(): Promise<RawRow[]>;

  /**
   * Append one row after the last data row.
   * The row must already be validated; nothing is checked here.
   */
  append(row: RawRow): Promise<void>;
}
