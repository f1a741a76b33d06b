// Data source error types

/**
 * Failure reaching or talking to the backing data source (network, auth,
 * missing spreadsheet). The tool cannot work without its data, so callers
 * treat this as fatal.
 */
export class DataSourceError extends Error {
  readonly code = 'DATA_SOURCE_ERROR';
  readonly operation: string;

  constructor(operation: string, message: string, cause?: unknown) {
    super(`Data source ${operation} failed: ${message}`, { cause });
    this.name = 'DataSourceError';
    this.operation = operation;
  }
}

/**
 * Wrap an unknown thrown value in a DataSourceError, keeping existing ones as-is.
 */
export function toDataSourceError(operation: string, error: unknown): DataSourceError {
  if (error instanceof DataSourceError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new DataSourceError(operation, message, error);
}
