// Tests for argument parsing

import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './args.js';

describe('parseCliArgs', () => {
  it('has no overrides by default', () => {
    expect(parseCliArgs([])).toEqual({
      help: false,
      overrides: {
        credentialsPath: undefined,
        spreadsheetId: undefined,
        spreadsheetName: undefined,
        exportDir: undefined,
        logLevel: undefined,
      },
      analysis: undefined,
    });
  });

  it('maps flags to configuration overrides', () => {
    const args = parseCliArgs([
      '--creds',
      '/keys/sa.json',
      '--spreadsheet-name',
      'prices',
      '--export-dir',
      'out',
      '--debug',
    ]);

    expect(args.overrides).toEqual({
      credentialsPath: '/keys/sa.json',
      spreadsheetId: undefined,
      spreadsheetName: 'prices',
      exportDir: 'out',
      logLevel: 'debug',
    });
  });

  it('collects a one-shot analysis request', () => {
    const args = parseCliArgs(['--start', '2020-Q1', '--end=2021-Q4', '--region', 'Cork', '--export']);
    expect(args.analysis).toEqual({ start: '2020-Q1', end: '2021-Q4', region: 'Cork', export: true });
  });

  it('keeps partial analysis flags for later validation', () => {
    expect(parseCliArgs(['--region', 'Cork']).analysis).toEqual({
      start: undefined,
      end: undefined,
      region: 'Cork',
      export: false,
    });
  });

  it('recognizes -h', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
  });
});
