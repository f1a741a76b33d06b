// Row parsing - turns raw sheet rows into validated quarterly records

import { z } from 'zod';
import { comparePeriods, formatPeriod, isQuarter } from '@property-tracker/protocol';
import type { QuarterlyRecord, RawRow } from '@property-tracker/protocol';
import { ValidationError } from '../errors.js';

/**
 * Normalize a cell before numeric validation.
 * Strings are trimmed and may use "," as a thousands separator; blanks count as missing.
 */
function normalizeNumericCell(value: unknown): unknown {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    const cleaned = value.trim().replace(/,/g, '');
    return cleaned === '' ? undefined : Number(cleaned);
  }
  return value;
}

const numericCell = () =>
  z.number({
    required_error: 'is required',
    invalid_type_error: 'must be a number',
  });

export const YearCellSchema = z.preprocess(
  normalizeNumericCell,
  numericCell().int('must be a positive integer').positive('must be a positive integer')
);

export const QuarterCellSchema = z.preprocess(
  normalizeNumericCell,
  numericCell().refine(isQuarter, { message: 'must be 1, 2, 3 or 4' })
);

export const PriceCellSchema = z.preprocess(
  normalizeNumericCell,
  numericCell().finite('must be a finite number').nonnegative('must not be negative')
);

const RowSchema = z.object({
  Year: YearCellSchema,
  Quarter: QuarterCellSchema,
  Nationally: PriceCellSchema,
  Dublin: PriceCellSchema,
  Cork: PriceCellSchema,
  Galway: PriceCellSchema,
  Limerick: PriceCellSchema,
  Waterford: PriceCellSchema,
  Other_counties: PriceCellSchema,
});

/**
 * Convert the first zod issue into a ValidationError naming the column.
 */
export function toValidationError(error: z.ZodError, input: Record<string, unknown>): ValidationError {
  const issue = error.issues[0];
  const field = issue.path.length > 0 ? String(issue.path[0]) : undefined;
  const message = field ? `${field} ${issue.message}` : issue.message;
  return new ValidationError(message, {
    field,
    details: field ? { value: input[field] } : undefined,
  });
}

/**
 * Parse one raw row into a QuarterlyRecord.
 *
 * @throws ValidationError if a column is missing, Year is not a positive integer,
 *   Quarter is not 1-4, or a region value is not a non-negative number
 */
export function parseRecord(row: RawRow): QuarterlyRecord {
  const result = RowSchema.safeParse(row);
  if (!result.success) {
    throw toValidationError(result.error, row);
  }

  const { Year: year, Quarter: quarter, ...values } = result.data;
  return { year, quarter, values };
}

/**
 * Parse every row of a dataset and order the records by period.
 *
 * Row numbers in error messages are sheet rows (the header is row 1).
 *
 * @throws ValidationError for the first malformed row, or for two rows sharing a period
 */
export function parseRecords(rows: RawRow[]): QuarterlyRecord[] {
  const parsed = rows.map((row, index) => {
    const sheetRow = index + 2;
    try {
      return { record: parseRecord(row), sheetRow };
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ValidationError(`Row ${sheetRow}: ${error.message}`, {
          field: error.field,
          details: { ...error.details, row: sheetRow },
        });
      }
      throw error;
    }
  });

  parsed.sort((a, b) => comparePeriods(a.record, b.record));

  for (let i = 1; i < parsed.length; i++) {
    const previous = parsed[i - 1];
    const current = parsed[i];
    if (comparePeriods(previous.record, current.record) === 0) {
      throw new ValidationError(
        `Duplicate period ${formatPeriod(current.record)} in rows ${previous.sheetRow} and ${current.sheetRow}`,
        { details: { rows: [previous.sheetRow, current.sheetRow] } }
      );
    }
  }

  return parsed.map((entry) => entry.record);
}
