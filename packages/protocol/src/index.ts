// @property-tracker/protocol
// Shared data model for quarterly housing-price records.
//
// This package has no runtime dependencies. It defines the record shape, the
// recognized regions and sheet columns, and the ordering of (year, quarter) periods.

export * from './types/index.js';
export * from './periods/index.js';
