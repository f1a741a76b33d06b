// Tests for report formatting and export

import { describe, it, expect } from 'vitest';
import type { AnalysisReport } from '@property-tracker/protocol';
import type { ExportWriter } from '@property-tracker/repositories';
import { createInMemoryExportWriter } from '@property-tracker/repositories';
import { csvFileName, formatReport, formatReportCsv, formatNumber } from './format.js';
import { exportReport, formatTextExportEntry, TEXT_EXPORT_FILE } from './export.js';
import { analyzeRange } from '../analysis/analyze.js';
import { ExportError } from '../errors.js';
import { parseRecords } from '../records/parse.js';

const rows = [100, 150, 200, 250].map((dublin, index) => ({
  Year: 2020,
  Quarter: index + 1,
  Nationally: 0,
  Dublin: dublin,
  Cork: 1,
  Galway: 1,
  Limerick: 1,
  Waterford: 1,
  Other_counties: 1,
}));

const records = parseRecords(rows);

function reportFor(region: 'Dublin' | 'Nationally'): AnalysisReport {
  return analyzeRange(records, {
    start: { year: 2020, quarter: 1 },
    end: { year: 2020, quarter: 4 },
    region,
  });
}

describe('formatNumber', () => {
  it('rounds to two decimals', () => {
    expect(formatNumber(55.90169943749474)).toBe('55.90');
    expect(formatNumber(150)).toBe('150.00');
    expect(formatNumber(0.125)).toBe('0.13');
  });
});

describe('formatReport', () => {
  it('renders every statistic with two decimals', () => {
    expect(formatReport(reportFor('Dublin')).split('\n')).toEqual([
      'Analysis for Dublin, 2020-Q1 to 2020-Q4',
      '  Count:                4',
      '  Mean:                 175.00',
      '  Standard Deviation:   55.90',
      '  Minimum:              100.00',
      '  Maximum:              250.00',
      '  Range:                150.00',
      '  Q1:                   137.50',
      '  Median:               175.00',
      '  Q3:                   212.50',
      '  IQR:                  75.00',
      '  Percent Change (%):   150.00',
    ]);
  });

  it('shows N/A and the warning when percent change is undefined', () => {
    const lines = formatReport(reportFor('Nationally')).split('\n');
    expect(lines).toContain('  Percent Change (%):   N/A');
    expect(lines.slice(-2)).toEqual([
      'Warnings:',
      '  - Percent change for Nationally is N/A: Cannot compute percent change: base value is zero',
    ]);
  });
});

describe('formatReportCsv', () => {
  it('renders a Metric,Value table', () => {
    expect(formatReportCsv(reportFor('Dublin'))).toBe(
      [
        'Metric,Value',
        'Region,Dublin',
        'Start,2020-Q1',
        'End,2020-Q4',
        'Count,4',
        'Mean,175.00',
        'Standard Deviation,55.90',
        'Minimum,100.00',
        'Maximum,250.00',
        'Range,150.00',
        'Q1,137.50',
        'Median,175.00',
        'Q3,212.50',
        'IQR,75.00',
        'Percent Change (%),150.00',
        '',
      ].join('\n')
    );
  });
});

describe('csvFileName', () => {
  it('encodes the range and region', () => {
    expect(csvFileName(reportFor('Dublin').query)).toBe('analysis_2020-Q1_2020-Q4_Dublin.csv');
  });
});

describe('exportReport', () => {
  const generatedAt = new Date('2024-03-01T09:30:00.000Z');

  it('appends text and writes csv', async () => {
    const { writer, files } = createInMemoryExportWriter();
    const report = reportFor('Dublin');

    const written = await exportReport(report, writer, { generatedAt });
    await exportReport(report, writer, { generatedAt, csv: false });

    expect(written).toEqual([TEXT_EXPORT_FILE, 'analysis_2020-Q1_2020-Q4_Dublin.csv']);
    const entry = formatTextExportEntry(report, generatedAt);
    expect(entry.startsWith('[2024-03-01T09:30:00.000Z]\nAnalysis for Dublin')).toBe(true);
    expect(files.get(TEXT_EXPORT_FILE)).toBe(entry + entry);
    expect(files.get('analysis_2020-Q1_2020-Q4_Dublin.csv')).toBe(formatReportCsv(report));
  });

  it('can skip both outputs', async () => {
    const { writer, files } = createInMemoryExportWriter();
    expect(await exportReport(reportFor('Dublin'), writer, { text: false, csv: false })).toEqual([]);
    expect(files.size).toBe(0);
  });

  it('names the file that failed and the files already written', async () => {
    const writer: ExportWriter = {
      appendFile: async (name) => name,
      writeFile: async () => {
        throw new Error('EACCES: permission denied');
      },
    };

    const error = await exportReport(reportFor('Dublin'), writer, { generatedAt }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExportError);
    expect(error).toMatchObject({
      code: 'EXPORT_FAILED',
      fileName: 'analysis_2020-Q1_2020-Q4_Dublin.csv',
      written: [TEXT_EXPORT_FILE],
      message: 'Could not export analysis_2020-Q1_2020-Q4_Dublin.csv: EACCES: permission denied',
    });
  });
});
