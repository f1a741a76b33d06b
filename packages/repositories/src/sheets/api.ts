// Google Sheets access through the googleapis client.
//
// SheetsApi is the narrow surface the record source needs. The googleapis-backed
// implementation authenticates with a service-account key file; tests substitute
// an in-process fake.

import { google } from 'googleapis';
import type { RawCell } from '@property-tracker/protocol';

/**
 * OAuth scopes: read/write sheet content, and Drive to find a spreadsheet by name.
 */
export const SHEETS_SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
] as const;

const SPREADSHEET_MIME_TYPE = 'application/vnd.google-apps.spreadsheet';

export interface SheetsApi {
  /**
   * Look up a spreadsheet ID by its Drive file name.
   * @returns The ID, or null if no spreadsheet has that name
   */
  findSpreadsheetIdByName(name: string): Promise<string | null>;

  /**
   * Title of the first worksheet, or null if the spreadsheet has none.
   */
  getFirstSheetTitle(spreadsheetId: string): Promise<string | null>;

  /**
   * Read a range as unformatted values (numbers stay numbers).
   */
  getValues(spreadsheetId: string, range: string): Promise<unknown[][]>;

  /**
   * Append one row after the table found in the range.
   */
  appendRow(spreadsheetId: string, range: string, values: RawCell[]): Promise<void>;
}

export type GoogleSheetsApiConfig = {
  /**
   * Path to the service-account JSON key
   */
  credentialsPath: string;
};

function escapeDriveQuery(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * Create a SheetsApi backed by googleapis.
 */
export function createGoogleSheetsApi(config: GoogleSheetsApiConfig): SheetsApi {
  const auth = new google.auth.GoogleAuth({
    keyFile: config.credentialsPath,
    scopes: [...SHEETS_SCOPES],
  });
  const sheets = google.sheets({ version: 'v4', auth });
  const drive = google.drive({ version: 'v3', auth });

  return {
    async findSpreadsheetIdByName(name: string): Promise<string | null> {
      const res = await drive.files.list({
        q: `name = '${escapeDriveQuery(name)}' and mimeType = '${SPREADSHEET_MIME_TYPE}' and trashed = false`,
        fields: 'files(id, name)',
        pageSize: 1,
      });
      return res.data.files?.[0]?.id ?? null;
    },

    async getFirstSheetTitle(spreadsheetId: string): Promise<string | null> {
      const res = await sheets.spreadsheets.get({
        spreadsheetId,
        fields: 'sheets.properties.title',
      });
      return res.data.sheets?.[0]?.properties?.title ?? null;
    },

    async getValues(spreadsheetId: string, range: string): Promise<unknown[][]> {
      const res = await sheets.spreadsheets.values.get({
        spreadsheetId,
        range,
        valueRenderOption: 'UNFORMATTED_VALUE',
      });
      return res.data.values ?? [];
    },

    async appendRow(spreadsheetId: string, range: string, values: RawCell[]): Promise<void> {
      await sheets.spreadsheets.values.append({
        spreadsheetId,
        range,
        valueInputOption: 'USER_ENTERED',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values: [values] },
      });
    },
  };
}
