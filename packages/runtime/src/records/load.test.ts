// Tests for dataset loading

import { describe, it, expect } from 'vitest';
import { createInMemoryRecordSource, DataSourceError } from '@property-tracker/repositories';
import { loadRecords } from './load.js';
import { ValidationError } from '../errors.js';

const row = (year: number, quarter: number) => ({
  Year: year,
  Quarter: quarter,
  Nationally: 1,
  Dublin: 2,
  Cork: 3,
  Galway: 4,
  Limerick: 5,
  Waterford: 6,
  Other_counties: 7,
});

describe('loadRecords', () => {
  it('returns parsed records in period order', async () => {
    const source = createInMemoryRecordSource([row(2020, 2), row(2020, 1)]);

    const records = await loadRecords(source);

    expect(records.map((r) => r.quarter)).toEqual([1, 2]);
    expect(records[0].values.Other_counties).toBe(7);
  });

  it('reports malformed rows as validation errors', async () => {
    const source = createInMemoryRecordSource([row(2020, 1), { ...row(2020, 2), Dublin: 'x' }]);

    await expect(loadRecords(source)).rejects.toThrow(ValidationError);
    await expect(loadRecords(source)).rejects.toThrow('Row 3: Dublin must be a number');
  });

  it('passes data source failures through', async () => {
    const source = createInMemoryRecordSource([], { failWith: 'timeout' });

    await expect(loadRecords(source)).rejects.toBeInstanceOf(DataSourceError);
  });
});
