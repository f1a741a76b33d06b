// In-memory implementations for development and testing
//
// Data does not persist between restarts.

import type { RawRow } from '@property-tracker/protocol';
import type { RecordSource, ExportWriter } from '../interfaces/index.js';
import { DataSourceError } from '../errors.js';

export type InMemoryRecordSourceOptions = {
  /**
   * When set, every call fails with a DataSourceError carrying this message.
   * Simulates an unreachable source.
   */
  failWith?: string;
};

/**
 * Create a RecordSource backed by an array.
 * The returned `rows` array is the live store and can be inspected by tests.
 */
export function createInMemoryRecordSource(
  initialRows: RawRow[] = [],
  options: InMemoryRecordSourceOptions = {}
): RecordSource & { rows: RawRow[] } {
  const rows = initialRows.map((row) => ({ ...row }));

  const check = (operation: string) => {
    if (options.failWith !== undefined) {
      throw new DataSourceError(operation, options.failWith);
    }
  };

  return {
    rows,

    async fetchAll(): Promise<RawRow[]> {
      check('fetch');
      return rows.map((row) => ({ ...row }));
    },

    async append(row: RawRow): Promise<void> {
      check('append');
      rows.push({ ...row });
    },
  };
}

/**
 * Create an in-memory ExportWriter.
 * Returns the writer and a Map of all written files.
 */
export function createInMemoryExportWriter(): {
  writer: ExportWriter;
  files: Map<string, string>;
} {
  const files = new Map<string, string>();

  const writer: ExportWriter = {
    async appendFile(fileName: string, content: string): Promise<string> {
      files.set(fileName, (files.get(fileName) ?? '') + content);
      return fileName;
    },

    async writeFile(fileName: string, content: string): Promise<string> {
      files.set(fileName, content);
      return fileName;
    },
  };

  return { writer, files };
}
