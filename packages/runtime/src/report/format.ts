// Report formatting for the terminal and for exported files.
// Numbers are rounded to two decimals here and nowhere else.

import { formatPeriod } from '@property-tracker/protocol';
import type { AnalysisReport, RangeQuery } from '@property-tracker/protocol';

export const DISPLAY_DECIMALS = 2;
export const NOT_AVAILABLE = 'N/A';

export function formatNumber(value: number): string {
  return value.toFixed(DISPLAY_DECIMALS);
}

/**
 * Label/value pairs for every statistic, in display order.
 */
export function reportMetrics(report: AnalysisReport): Array<[string, string]> {
  const s = report.statistics;
  return [
    ['Count', String(s.count)],
    ['Mean', formatNumber(s.mean)],
    ['Standard Deviation', formatNumber(s.stdDev)],
    ['Minimum', formatNumber(s.min)],
    ['Maximum', formatNumber(s.max)],
    ['Range', formatNumber(s.range)],
    ['Q1', formatNumber(s.q1)],
    ['Median', formatNumber(s.median)],
    ['Q3', formatNumber(s.q3)],
    ['IQR', formatNumber(s.iqr)],
    ['Percent Change (%)', s.percentChange === null ? NOT_AVAILABLE : formatNumber(s.percentChange)],
  ];
}

export function describeQuery(query: RangeQuery): string {
  return `${query.region}, ${formatPeriod(query.start)} to ${formatPeriod(query.end)}`;
}

/**
 * Render a report as a text block for terminal display.
 */
export function formatReport(report: AnalysisReport): string {
  const lines = [`Analysis for ${describeQuery(report.query)}`];
  for (const [label, value] of reportMetrics(report)) {
    lines.push(`  ${`${label}:`.padEnd(22)}${value}`);
  }
  if (report.warnings.length > 0) {
    lines.push('Warnings:');
    for (const warning of report.warnings) {
      lines.push(`  - ${warning}`);
    }
  }
  return lines.join('\n');
}

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render a report as a two-column Metric,Value CSV document.
 */
export function formatReportCsv(report: AnalysisReport): string {
  const rows: Array<[string, string]> = [
    ['Metric', 'Value'],
    ['Region', report.query.region],
    ['Start', formatPeriod(report.query.start)],
    ['End', formatPeriod(report.query.end)],
    ...reportMetrics(report),
  ];
  return rows.map((row) => row.map(escapeCsvField).join(',')).join('\n') + '\n';
}

/**
 * File name for a report's CSV export: analysis_<start>_<end>_<region>.csv
 */
export function csvFileName(query: RangeQuery): string {
  return `analysis_${formatPeriod(query.start)}_${formatPeriod(query.end)}_${query.region}.csv`;
}
