// Command-line arguments

import minimist from 'minimist';
import type { LogLevel } from '@property-tracker/runtime';
import type { ConfigOverrides } from './config.js';
import type { AnalysisRequest } from './commands/index.js';

export const USAGE = `Usage: property-tracker [options]

Interactive mode (default): add a new quarter or analyse a range.

Options:
  --creds <path>              Service-account JSON key (env PT_CREDS_PATH)
  --spreadsheet-id <id>       Spreadsheet ID (env PT_SPREADSHEET_ID)
  --spreadsheet-name <name>   Spreadsheet name when no ID is set (env PT_SPREADSHEET_NAME)
  --export-dir <dir>          Where exports are written (env PT_EXPORT_DIR)
  --debug                     Verbose logging (env PT_LOG_LEVEL=debug)
  -h, --help                  Show this help

One-shot analysis:
  --start 2020-Q1 --end 2021-Q4 --region Dublin [--export]`;

export type CliArgs = {
  help: boolean;
  overrides: ConfigOverrides;
  /** Present when any of --start, --end or --region was given */
  analysis?: AnalysisRequest;
};

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  return value.trim();
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args = minimist(argv, {
    string: ['creds', 'spreadsheet-id', 'spreadsheet-name', 'export-dir', 'start', 'end', 'region'],
    boolean: ['debug', 'help', 'export'],
    alias: { h: 'help' },
  });

  const debug = args.debug === true;
  const logLevel: LogLevel | undefined = debug ? 'debug' : undefined;

  const start = optionalString(args.start);
  const end = optionalString(args.end);
  const region = optionalString(args.region);
  const wantsAnalysis = start !== undefined || end !== undefined || region !== undefined;

  return {
    help: args.help === true,
    overrides: {
      credentialsPath: optionalString(args.creds),
      spreadsheetId: optionalString(args['spreadsheet-id']),
      spreadsheetName: optionalString(args['spreadsheet-name']),
      exportDir: optionalString(args['export-dir']),
      logLevel,
    },
    analysis: wantsAnalysis ? { start, end, region, export: args.export === true } : undefined,
  };
}
