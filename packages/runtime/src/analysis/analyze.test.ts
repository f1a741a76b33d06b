// Tests for the analysis flow

import { describe, it, expect } from 'vitest';
import type { QuarterlyRecord, YearQuarter } from '@property-tracker/protocol';
import { analyzeRange, describeCoverage } from './analyze.js';
import { createCapturingLogger } from '../logger.js';
import { InsufficientDataError, InvalidRangeError, NotFoundError } from '../errors.js';

function createRecord(year: number, quarter: YearQuarter['quarter'], dublin: number): QuarterlyRecord {
  return {
    year,
    quarter,
    values: {
      Nationally: 300,
      Dublin: dublin,
      Cork: 0,
      Galway: 200,
      Limerick: 180,
      Waterford: 170,
      Other_counties: 160,
    },
  };
}

const records: QuarterlyRecord[] = [
  createRecord(2020, 1, 100),
  createRecord(2020, 2, 150),
  createRecord(2020, 3, 200),
  createRecord(2020, 4, 250),
  createRecord(2021, 1, 260),
];

describe('analyzeRange', () => {
  it('selects the range and computes statistics for the region', () => {
    const report = analyzeRange(records, {
      start: { year: 2020, quarter: 1 },
      end: { year: 2020, quarter: 4 },
      region: 'Dublin',
    });

    expect(report.values).toEqual([100, 150, 200, 250]);
    expect(report.statistics.mean).toBe(175);
    expect(report.statistics.percentChange).toBe(150);
    expect(report.warnings).toEqual([]);
  });

  it('carries the percent change warning and traces it at debug level', () => {
    const logger = createCapturingLogger();
    const report = analyzeRange(
      records,
      { start: { year: 2020, quarter: 1 }, end: { year: 2020, quarter: 2 }, region: 'Cork' },
      { logger }
    );

    expect(report.statistics.percentChange).toBeNull();
    expect(report.warnings).toHaveLength(1);
    expect(logger.entries.filter((e) => e.level === 'warn')).toEqual([]);
    expect(logger.entries.filter((e) => e.level === 'debug').map((e) => e.message)).toContain(report.warnings[0]);
  });

  it('propagates range and data errors', () => {
    expect(() =>
      analyzeRange(records, { start: { year: 2021, quarter: 1 }, end: { year: 2020, quarter: 1 }, region: 'Dublin' })
    ).toThrow(InvalidRangeError);
    expect(() =>
      analyzeRange(records, { start: { year: 2019, quarter: 1 }, end: { year: 2020, quarter: 1 }, region: 'Dublin' })
    ).toThrow(NotFoundError);
    expect(() =>
      analyzeRange(records, { start: { year: 2020, quarter: 2 }, end: { year: 2020, quarter: 2 }, region: 'Dublin' })
    ).toThrow(InsufficientDataError);
  });
});

describe('describeCoverage', () => {
  it('reports first and last periods', () => {
    expect(describeCoverage(records)).toEqual({
      count: 5,
      first: { year: 2020, quarter: 1 },
      last: { year: 2021, quarter: 1 },
    });
  });

  it('has no bounds for an empty dataset', () => {
    expect(describeCoverage([])).toEqual({ count: 0 });
  });
});
