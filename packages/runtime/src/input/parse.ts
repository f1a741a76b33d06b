// User input parsing - validates answers typed at the prompt or passed as flags

import type { z } from 'zod';
import { REGIONS, parsePeriodLabel } from '@property-tracker/protocol';
import type { Quarter, Region, YearQuarter } from '@property-tracker/protocol';
import { YearCellSchema, QuarterCellSchema, PriceCellSchema } from '../records/parse.js';
import { ValidationError } from '../errors.js';

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string, field: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`${field} ${result.error.issues[0].message}`, {
      field,
      details: { value: raw },
    });
  }
  return result.data;
}

export function parseYearInput(raw: string): number {
  return parseWith(YearCellSchema, raw, 'Year');
}

/**
 * Accepts "3" as well as "Q3".
 */
export function parseQuarterInput(raw: string): Quarter {
  return parseWith(QuarterCellSchema, raw.trim().replace(/^q/i, ''), 'Quarter');
}

/**
 * Accepts a region name (case-insensitive) or its 1-based menu number.
 */
export function parseRegionInput(raw: string): Region {
  const text = raw.trim();

  if (/^\d+$/.test(text)) {
    const index = Number(text) - 1;
    if (index >= 0 && index < REGIONS.length) {
      return REGIONS[index];
    }
  }

  const match = REGIONS.find((region) => region.toLowerCase() === text.toLowerCase());
  if (match) {
    return match;
  }

  throw new ValidationError(`Region must be one of: ${REGIONS.join(', ')}`, {
    field: 'region',
    details: { value: raw },
  });
}

export function parsePriceInput(raw: string, region: Region): number {
  return parseWith(PriceCellSchema, raw, region);
}

export function parseYesNo(raw: string): boolean {
  const text = raw.trim().toLowerCase();
  if (text === 'y' || text === 'yes') {
    return true;
  }
  if (text === 'n' || text === 'no') {
    return false;
  }
  throw new ValidationError('Please answer y or n', { field: 'confirmation', details: { value: raw } });
}

/**
 * Parse a "2020-Q1" style period label.
 */
export function parsePeriodInput(raw: string, field: string): YearQuarter {
  const period = parsePeriodLabel(raw);
  if (!period) {
    throw new ValidationError(`${field} must look like 2020-Q1`, { field, details: { value: raw } });
  }
  return period;
}
