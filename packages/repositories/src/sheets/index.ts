// Google Sheets data source.

export { createGoogleSheetsApi, SHEETS_SCOPES } from './api.js';
export type { SheetsApi, GoogleSheetsApiConfig } from './api.js';
export {
  createSheetsRecordSource,
  gridToRawRows,
  quoteSheetTitle,
} from './record-source.js';
export type { SpreadsheetLocator } from './record-source.js';
