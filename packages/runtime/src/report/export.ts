// Report export - hands formatted reports to an ExportWriter

import type { AnalysisReport } from '@property-tracker/protocol';
import type { ExportWriter } from '@property-tracker/repositories';
import { csvFileName, formatReport, formatReportCsv } from './format.js';
import { ExportError } from '../errors.js';
import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';

/**
 * Append-only text log of every exported analysis.
 */
export const TEXT_EXPORT_FILE = 'analysis_results.txt';

export type ExportReportOptions = {
  /** Append the report to the text log (default true) */
  text?: boolean;
  /** Write the report to its own CSV file (default true) */
  csv?: boolean;
  /** Timestamp stamped on the text entry (defaults to now) */
  generatedAt?: Date;
  logger?: Logger;
};

/**
 * Text log entry: timestamp header, the report, then a blank line.
 */
export function formatTextExportEntry(report: AnalysisReport, generatedAt: Date): string {
  return `[${generatedAt.toISOString()}]\n${formatReport(report)}\n\n`;
}

/**
 * Export a report as text and/or CSV.
 *
 * @returns Paths written, text first
 * @throws ExportError naming the file that could not be written
 */
export async function exportReport(
  report: AnalysisReport,
  writer: ExportWriter,
  options: ExportReportOptions = {}
): Promise<string[]> {
  const {
    text = true,
    csv = true,
    generatedAt = new Date(),
    logger = silentLogger,
  } = options;

  const pending: Array<{ fileName: string; write: () => Promise<string> }> = [];
  if (text) {
    const entry = formatTextExportEntry(report, generatedAt);
    pending.push({ fileName: TEXT_EXPORT_FILE, write: () => writer.appendFile(TEXT_EXPORT_FILE, entry) });
  }
  if (csv) {
    const fileName = csvFileName(report.query);
    const content = formatReportCsv(report);
    pending.push({ fileName, write: () => writer.writeFile(fileName, content) });
  }

  const written: string[] = [];
  for (const { fileName, write } of pending) {
    try {
      written.push(await write());
    } catch (error) {
      logger.debug(`Export of ${fileName} failed`, { written });
      throw new ExportError(fileName, error, written);
    }
  }

  for (const path of written) {
    logger.info(`Exported ${path}`);
  }

  return written;
}
