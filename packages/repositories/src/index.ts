// @property-tracker/repositories
// Data source and export contracts with their implementations.
//
// The runtime codes against RecordSource and ExportWriter only. Google Sheets,
// the local filesystem and the in-memory variants fulfil those contracts.

export * from './interfaces/index.js';
export { DataSourceError, toDataSourceError } from './errors.js';
export * as sheets from './sheets/index.js';
export * from './export/index.js';
export * from './in-memory/index.js';
