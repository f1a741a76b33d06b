// Repository interfaces
// These define the contracts for data access, so the runtime does not depend
// on where the rows live or where exports land.

export type { RecordSource } from './record-source.js';
export type { ExportWriter } from './export-writer.js';
