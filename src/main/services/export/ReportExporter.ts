/**
 * ReportExporter: renders an ExecutionReport for people and spreadsheets.
 *
 * Tabular output (CSV, XLSX) follows the blank-repeat convention: a device's ip
 * and dns are written on its first row only. toRows() keeps full identity on
 * every row for callers that post-process the data.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import type { ExecutionReport, ResultStatus, SessionResult } from '@shared/types';
import { createLogger } from '../../utils/logger';
import type { OutputFormat } from '../../config/schemas';

const log = createLogger('ReportExporter');

export const EXPORT_COLUMNS = ['ip', 'dns', 'command', 'result'] as const;

export interface ReportRow {
  ip: string;
  dns: string;
  command: string;
  status: ResultStatus;
  result: string;
}

export type ExportRow = Record<(typeof EXPORT_COLUMNS)[number], string>;

/** Formats rendered as text; XLSX is binary. */
export type TextFormat = Exclude<OutputFormat, 'xlsx'>;

export const XLSX_SHEET_NAME = 'Output';

export interface WriteReportOptions {
  dir: string;
  baseName: string;
  formats: readonly OutputFormat[];
  /** Used for the timestamp in file names. */
  date?: Date;
}

/** Text of the result column: the output on success, the status and detail otherwise. */
export function resultText(result: SessionResult): string {
  return result.status === 'success' ? result.output : `${result.status.toUpperCase()}: ${result.output}`;
}

/** One row per command in report order, identity on every row. */
export function toRows(report: ExecutionReport): ReportRow[] {
  const rows: ReportRow[] = [];
  for (const entry of report.entries) {
    for (const result of entry.results) {
      rows.push({
        ip: entry.device.address,
        dns: entry.device.dns,
        command: result.command,
        status: result.status,
        result: resultText(result),
      });
    }
  }
  return rows;
}

/** Rows for export: ip and dns blank on a device's continuation rows. */
export function toExportRows(report: ExecutionReport): ExportRow[] {
  const rows: ExportRow[] = [];
  for (const entry of report.entries) {
    entry.results.forEach((result, i) => {
      rows.push({
        ip: i === 0 ? entry.device.address : '',
        dns: i === 0 ? entry.device.dns : '',
        command: result.command,
        result: resultText(result),
      });
    });
  }
  return rows;
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** RFC 4180: CRLF line endings, header row, quoted fields where needed. */
export function toCsv(report: ExecutionReport): string {
  const lines = [EXPORT_COLUMNS.join(',')];
  for (const row of toExportRows(report)) {
    lines.push(EXPORT_COLUMNS.map((column) => csvField(row[column])).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

export function toText(report: ExecutionReport): string {
  const { counters } = report;
  const lines: string[] = [
    `Run ${report.runId}`,
    `Started: ${report.startedAt}`,
    `Completed: ${report.completedAt ?? '-'}${report.cancelled ? ' (cancelled)' : ''}`,
    `Succeeded: ${counters.succeeded}  Failed: ${counters.failed}  Skipped: ${counters.skipped}  Cancelled: ${counters.cancelled}`,
    '',
  ];

  for (const entry of report.entries) {
    const name = entry.device.dns ? `${entry.device.address} (${entry.device.dns})` : entry.device.address;
    lines.push(`=== ${name} [${entry.state}, attempts: ${entry.attempts}] ===`);
    for (const result of entry.results) {
      lines.push(`--- ${result.command} [${result.status}]`);
      if (result.output) lines.push(result.output);
    }
    lines.push('');
  }
  return lines.join('\n');
}

export function toJson(report: ExecutionReport): string {
  return JSON.stringify(report, null, 2) + '\n';
}

function buildWorkbook(report: ExecutionReport): Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(XLSX_SHEET_NAME);
  sheet.columns = EXPORT_COLUMNS.map((column) => ({
    header: column,
    key: column,
    width: column === 'result' ? 100 : 20,
  }));
  // Blank repeats are left as empty cells.
  for (const row of toExportRows(report)) {
    sheet.addRow(EXPORT_COLUMNS.map((column) => row[column] || null));
  }
  sheet.getColumn('result').alignment = { vertical: 'top', wrapText: true };
  return workbook;
}

/** XLSX workbook with one sheet of export rows. */
export async function toXlsx(report: ExecutionReport): Promise<ArrayBuffer> {
  return buildWorkbook(report).xlsx.writeBuffer();
}

export function render(report: ExecutionReport, format: TextFormat): string {
  switch (format) {
    case 'csv':
      return toCsv(report);
    case 'txt':
      return toText(report);
    case 'json':
      return toJson(report);
  }
}

/** Replace characters that are not allowed in file names and cap the length. */
export function sanitizeFileName(name: string, maxLength = 255): string {
  return name.replace(/[\\/:*?"<>|]/g, '_').substring(0, maxLength);
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as YYYY-MM-DD_HH-mm-ss. */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

export function buildOutputFileName(baseName: string, format: OutputFormat, date: Date): string {
  return `${sanitizeFileName(baseName)}_output_${fileTimestamp(date)}.${format}`;
}

/** Write the report once per format; returns the paths written. */
export async function writeReport(report: ExecutionReport, options: WriteReportOptions): Promise<string[]> {
  const date = options.date ?? new Date();
  await mkdir(options.dir, { recursive: true });

  const written: string[] = [];
  for (const format of options.formats) {
    const filePath = path.join(options.dir, buildOutputFileName(options.baseName, format, date));
    if (format === 'xlsx') {
      await buildWorkbook(report).xlsx.writeFile(filePath);
    } else {
      await writeFile(filePath, render(report, format), 'utf8');
    }
    written.push(filePath);
    log.info(`Wrote ${format.toUpperCase()} report to ${filePath}`);
  }
  return written;
}
