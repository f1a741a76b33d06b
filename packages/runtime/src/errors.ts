// Runtime error types

import { formatPeriod } from '@property-tracker/protocol';
import type { YearQuarter } from '@property-tracker/protocol';

/**
 * Base class for all runtime errors.
 * Every subclass is recoverable: the interactive flow reports it and carries on.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for a malformed row or user-entered value.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when the start of a range falls after its end.
 */
export class InvalidRangeError extends RuntimeError {
  readonly start: YearQuarter;
  readonly end: YearQuarter;

  constructor(start: YearQuarter, end: YearQuarter) {
    super(
      'INVALID_RANGE',
      `Start ${formatPeriod(start)} is after end ${formatPeriod(end)}`
    );
    this.name = 'InvalidRangeError';
    this.start = start;
    this.end = end;
  }
}

/**
 * Error when a requested period is not in the dataset.
 */
export class NotFoundError extends RuntimeError {
  readonly bound: 'start' | 'end';
  readonly period: YearQuarter;

  constructor(bound: 'start' | 'end', period: YearQuarter) {
    super('NOT_FOUND', `No data for ${bound} period ${formatPeriod(period)}`);
    this.name = 'NotFoundError';
    this.bound = bound;
    this.period = period;
  }
}

/**
 * Error when too few data points were selected for statistics.
 */
export class InsufficientDataError extends RuntimeError {
  readonly count: number;
  readonly required: number;

  constructor(count: number, required: number) {
    super(
      'INSUFFICIENT_DATA',
      `At least ${required} data points are needed, got ${count}`
    );
    this.name = 'InsufficientDataError';
    this.count = count;
    this.required = required;
  }
}

/**
 * Error when a ratio has a zero base (percent change from zero).
 */
export class DivisionByZeroError extends RuntimeError {
  constructor(what: string) {
    super('DIVISION_BY_ZERO', `Cannot compute ${what}: base value is zero`);
    this.name = 'DivisionByZeroError';
  }
}

/**
 * Error when a report could not be written. The analysis itself stands.
 */
export class ExportError extends RuntimeError {
  readonly fileName: string;
  /** Paths written before the failure */
  readonly written: string[];

  constructor(fileName: string, cause: unknown, written: string[] = []) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('EXPORT_FAILED', `Could not export ${fileName}: ${reason}`);
    this.name = 'ExportError';
    this.fileName = fileName;
    this.written = written;
    this.cause = cause;
  }
}
