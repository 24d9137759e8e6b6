/**
 * Report Exporter
 *
 * Writes a report payload to disk as JSON, CSV or an Excel workbook.
 * File names follow copilot_<reportType>_<YYYYMMDD_HHMMSS>.<ext>.
 */
import * as fs from 'fs';
import * as path from 'path';
import { isOutputFormat } from './config.js';
import { isReportRecord } from './report-data.js';
import type { ExportArtifact, OutputFormat, ReportPayload } from './types.js';

export type CellValue = string | number | boolean | null;

export interface ReportRows {
  header: string[] | null;
  rows: CellValue[][];
}

export interface SpreadsheetWriter {
  writeRows(filePath: string, rows: CellValue[][]): Promise<void>;
}

export type SpreadsheetLoader = () => Promise<SpreadsheetWriter | null>;

export interface SaveReportOptions {
  format: string;
  outputDir: string;
  now?: Date;
  loadSpreadsheet?: SpreadsheetLoader;
}

const EXTENSIONS: Record<OutputFormat, string> = {
  json: 'json',
  csv: 'csv',
  excel: 'xlsx',
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local-time timestamp with second resolution: YYYYMMDD_HHMMSS */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function generateReportFilename(
  reportType: string,
  format: OutputFormat,
  now: Date = new Date()
): string {
  return `copilot_${reportType}_${formatTimestamp(now)}.${EXTENSIONS[format]}`;
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') return value.toString();
  return JSON.stringify(value, jsonReplacer);
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Turns a payload into table rows. Rows come from `data` when present,
 * otherwise the payload is one row. The first record's keys are the header;
 * every record is written in its own key order, so records with different
 * keys do not line up with the header.
 */
export function shapeReportRows(payload: ReportPayload): ReportRows {
  const source: unknown[] = !('data' in payload)
    ? [payload]
    : Array.isArray(payload.data)
      ? payload.data
      : [payload.data];

  if (source.length === 0) {
    return { header: null, rows: [] };
  }

  const first = source[0];
  if (isReportRecord(first)) {
    const header = Object.keys(first);
    const rows = source.map((row) =>
      isReportRecord(row) ? Object.values(row).map(toCell) : [toCell(row)]
    );
    return { header, rows };
  }

  const rows = source.map((row) => (Array.isArray(row) ? row.map(toCell) : [toCell(row)]));
  return { header: null, rows };
}

function escapeCSV(value: CellValue): string {
  if (value === null) return '';
  const text = String(value);
  if (text.includes(',') || text.includes('"') || text.includes('\n') || text.includes('\r')) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function generateCSVReport(payload: ReportPayload): string {
  const { header, rows } = shapeReportRows(payload);
  const lines: string[] = [];

  if (header) {
    lines.push(header.map(escapeCSV).join(','));
  }
  for (const row of rows) {
    lines.push(row.map(escapeCSV).join(','));
  }

  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}

export function generateJSONReport(payload: ReportPayload): string {
  return JSON.stringify(payload, jsonReplacer, 2);
}

/** Loads exceljs on demand; resolves to null when it is not installed. */
export async function loadExcelWriter(): Promise<SpreadsheetWriter | null> {
  try {
    const { default: ExcelJS } = await import('exceljs');
    return {
      async writeRows(filePath, rows) {
        const workbook = new ExcelJS.Workbook();
        const sheet = workbook.addWorksheet('Report');
        sheet.addRows(rows);
        await workbook.xlsx.writeFile(filePath);
      },
    };
  } catch {
    return null;
  }
}

function ensureOutputDirectory(outputDir: string): string {
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }
  return outputDir;
}

function writeJSON(payload: ReportPayload, basePath: string): string {
  const filePath = `${basePath}.json`;
  fs.writeFileSync(filePath, generateJSONReport(payload), 'utf8');
  return filePath;
}

export async function saveReport(
  payload: ReportPayload,
  reportType: string,
  options: SaveReportOptions
): Promise<ExportArtifact> {
  const outputDir = ensureOutputDirectory(options.outputDir);
  const now = options.now ?? new Date();
  const format = options.format.toLowerCase();
  const basePath = path.join(outputDir, `copilot_${reportType}_${formatTimestamp(now)}`);

  let artifact: ExportArtifact;

  if (!isOutputFormat(format)) {
    console.warn(`⚠️  Unsupported format: ${options.format}. Using JSON.`);
    artifact = { path: writeJSON(payload, basePath), format: 'json', reportType };
  } else if (format === 'json') {
    artifact = { path: writeJSON(payload, basePath), format, reportType };
  } else if (format === 'csv') {
    const csv = generateCSVReport(payload);
    if (!csv) {
      console.warn('⚠️  No data to write to CSV');
    }
    const filePath = path.join(outputDir, generateReportFilename(reportType, format, now));
    fs.writeFileSync(filePath, csv, 'utf8');
    artifact = { path: filePath, format, reportType };
  } else {
    const writer = await (options.loadSpreadsheet ?? loadExcelWriter)();
    if (writer) {
      const { header, rows } = shapeReportRows(payload);
      if (rows.length === 0) {
        console.warn('⚠️  No data to write to Excel');
      }
      const filePath = path.join(outputDir, generateReportFilename(reportType, format, now));
      await writer.writeRows(filePath, header ? [header, ...rows] : rows);
      artifact = { path: filePath, format, reportType };
    } else {
      console.warn('⚠️  Excel export needs the exceljs package (npm install exceljs). Using JSON.');
      artifact = { path: writeJSON(payload, basePath), format: 'json', reportType };
    }
  }

  console.log(`✅ Report saved to: ${artifact.path}`);
  return artifact;
}
