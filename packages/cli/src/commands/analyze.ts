// Analyse command - statistics for a region over a range of quarters

import { REGIONS, formatPeriod } from '@property-tracker/protocol';
import type {
  AnalysisReport,
  QuarterlyRecord,
  RangeQuery,
  YearQuarter,
} from '@property-tracker/protocol';
import {
  analyzeRange,
  describeCoverage,
  ExportError,
  exportReport,
  formatReport,
  loadRecords,
  parsePeriodInput,
  parseQuarterInput,
  parseRegionInput,
  parseYearInput,
  parseYesNo,
  ValidationError,
} from '@property-tracker/runtime';
import { askUntilValid } from '../prompts.js';
import type { CliContext } from '../context.js';

async function askPeriod(ctx: CliContext, label: string): Promise<YearQuarter> {
  const year = await askUntilValid(ctx.prompter, `${label} year: `, parseYearInput, ctx.print);
  const quarter = await askUntilValid(ctx.prompter, `${label} quarter (1-4): `, parseQuarterInput, ctx.print);
  return { year, quarter };
}

export function printCoverage(ctx: CliContext, records: readonly QuarterlyRecord[]): boolean {
  const coverage = describeCoverage(records);
  if (!coverage.first || !coverage.last) {
    ctx.print('No data available yet.');
    return false;
  }
  ctx.print(
    `Data available from ${formatPeriod(coverage.first)} to ${formatPeriod(coverage.last)} (${coverage.count} quarters).`
  );
  return true;
}

/**
 * Write the text and CSV exports and tell the operator where they went.
 * A failed write still lists the files saved before it, then propagates.
 */
export async function saveReport(
  ctx: Pick<CliContext, 'writer' | 'logger' | 'print'>,
  report: AnalysisReport
): Promise<void> {
  let written: string[];
  try {
    written = await exportReport(report, ctx.writer, { logger: ctx.logger });
  } catch (error) {
    if (error instanceof ExportError) {
      printSaved(ctx, error.written);
    }
    throw error;
  }
  printSaved(ctx, written);
}

function printSaved(ctx: Pick<CliContext, 'print'>, paths: readonly string[]): void {
  for (const filePath of paths) {
    ctx.print(`Saved ${filePath}`);
  }
}

/**
 * Interactive analysis. Range and data errors propagate to the session,
 * which reports them and returns to the menu.
 */
export async function runAnalyzeCommand(ctx: CliContext): Promise<void> {
  const records = await loadRecords(ctx.source, { logger: ctx.logger });
  if (!printCoverage(ctx, records)) {
    return;
  }

  const start = await askPeriod(ctx, 'Start');
  const end = await askPeriod(ctx, 'End');

  ctx.print('Regions:');
  REGIONS.forEach((region, index) => ctx.print(`  ${index + 1}. ${region}`));
  const region = await askUntilValid(ctx.prompter, 'Region (name or number): ', parseRegionInput, ctx.print);

  const query: RangeQuery = { start, end, region };
  const report = analyzeRange(records, query, { logger: ctx.logger });

  ctx.print(formatReport(report));

  const exportResults = await askUntilValid(
    ctx.prompter,
    'Export results to file? (y/n): ',
    parseYesNo,
    ctx.print
  );
  if (exportResults) {
    await saveReport(ctx, report);
  }
}

/**
 * Requested one-shot analysis, as given on the command line.
 */
export type AnalysisRequest = {
  start?: string;
  end?: string;
  region?: string;
  export: boolean;
};

/**
 * Non-interactive analysis driven by flags.
 *
 * @throws RuntimeError for bad flags, ranges or data
 */
export async function runAnalysisOnce(
  ctx: Omit<CliContext, 'prompter'>,
  request: AnalysisRequest
): Promise<void> {
  if (!request.start || !request.end || !request.region) {
    throw new ValidationError('--start, --end and --region must be given together');
  }

  const query: RangeQuery = {
    start: parsePeriodInput(request.start, 'start'),
    end: parsePeriodInput(request.end, 'end'),
    region: parseRegionInput(request.region),
  };

  const records = await loadRecords(ctx.source, { logger: ctx.logger });
  const report = analyzeRange(records, query, { logger: ctx.logger });

  ctx.print(formatReport(report));
  if (request.export) {
    await saveReport(ctx, report);
  }
}
