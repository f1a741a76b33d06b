// Google Sheets implementation of RecordSource.
//
// The first worksheet holds the table: row 1 is the header, every following
// non-blank row is one quarter.

import { SHEET_COLUMNS } from '@property-tracker/protocol';
import type { RawCell, RawRow } from '@property-tracker/protocol';
import type { RecordSource } from '../interfaces/index.js';
import { DataSourceError, toDataSourceError } from '../errors.js';
import type { SheetsApi } from './api.js';

/**
 * How to find the spreadsheet: by ID, or by Drive file name.
 */
export type SpreadsheetLocator = { id: string } | { name: string };

type ResolvedSheet = {
  spreadsheetId: string;
  sheetTitle: string;
};

/**
 * Quote a worksheet title for use in A1 notation.
 */
export function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

function toRawCell(value: unknown): RawCell {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return null;
}

function isBlankRow(cells: unknown[]): boolean {
  return cells.every((cell) => cell === null || cell === undefined || String(cell).trim() === '');
}

/**
 * Convert a header + rows grid into keyed rows. Fully blank rows are dropped.
 */
export function gridToRawRows(grid: unknown[][]): RawRow[] {
  if (grid.length === 0) {
    return [];
  }

  const header = grid[0].map((cell) => String(cell ?? '').trim());
  const rows: RawRow[] = [];

  for (const cells of grid.slice(1)) {
    if (isBlankRow(cells)) {
      continue;
    }
    const row: RawRow = {};
    header.forEach((column, index) => {
      if (column !== '') {
        row[column] = toRawCell(cells[index]);
      }
    });
    rows.push(row);
  }

  return rows;
}

/**
 * Create a RecordSource reading from and appending to a Google Sheet.
 * The spreadsheet and worksheet are resolved on first use and cached.
 */
export function createSheetsRecordSource(
  api: SheetsApi,
  locator: SpreadsheetLocator
): RecordSource {
  let resolved: Promise<ResolvedSheet> | undefined;
  let header: string[] | undefined;

  const resolveSheet = async (): Promise<ResolvedSheet> => {
    let spreadsheetId: string;
    if ('id' in locator) {
      spreadsheetId = locator.id;
    } else {
      const found = await api.findSpreadsheetIdByName(locator.name);
      if (found === null) {
        throw new DataSourceError('open', `no spreadsheet named "${locator.name}" is shared with this account`);
      }
      spreadsheetId = found;
    }

    const sheetTitle = await api.getFirstSheetTitle(spreadsheetId);
    if (sheetTitle === null) {
      throw new DataSourceError('open', `spreadsheet ${spreadsheetId} has no worksheets`);
    }

    return { spreadsheetId, sheetTitle };
  };

  const open = (): Promise<ResolvedSheet> => {
    if (!resolved) {
      resolved = resolveSheet().catch((error: unknown) => {
        // Allow a retry on the next call
        resolved = undefined;
        throw toDataSourceError('open', error);
      });
    }
    return resolved;
  };

  return {
    async fetchAll(): Promise<RawRow[]> {
      const sheet = await open();
      try {
        const grid = await api.getValues(sheet.spreadsheetId, quoteSheetTitle(sheet.sheetTitle));
        if (grid.length > 0) {
          header = grid[0].map((cell) => String(cell ?? '').trim());
        }
        return gridToRawRows(grid);
      } catch (error) {
        throw toDataSourceError('fetch', error);
      }
    },

    async append(row: RawRow): Promise<void> {
      const sheet = await open();
      const range = quoteSheetTitle(sheet.sheetTitle);
      try {
        if (!header) {
          const [firstRow] = await api.getValues(sheet.spreadsheetId, `${range}!1:1`);
          header = firstRow ? firstRow.map((cell) => String(cell ?? '').trim()) : [];
        }
        const columns: readonly string[] = header.length > 0 ? header : SHEET_COLUMNS;
        const values = columns.map((column) => row[column] ?? '');
        await api.appendRow(sheet.spreadsheetId, range, values);
      } catch (error) {
        throw toDataSourceError('append', error);
      }
    },
  };
}
