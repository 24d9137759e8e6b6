/**
 * Bulk report files and per-user aggregation.
 *
 * Metrics endpoints answer with download links instead of data; each link
 * points at a JSON document or a JSON Lines (NDJSON) file.
 */
import axios from 'axios';
import type { ParsedReport, ReportRecord, SkippedLine, UserStats } from './types.js';

export function isReportRecord(value: unknown): value is ReportRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

type JsonAttempt = { ok: true; value: unknown } | { ok: false; message: string };

function tryParseJson(text: string): JsonAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, message: errorMessage(error) };
  }
}

/**
 * Parses a report file: first as one JSON value (an array of records or a
 * single record), then line by line. Lines that do not hold a JSON object
 * are reported in `skipped`, even when no line parses.
 */
export function parseReportContent(content: string): ParsedReport {
  const whole = tryParseJson(content);
  if (whole.ok) {
    if (Array.isArray(whole.value)) {
      const records = whole.value.filter(isReportRecord);
      return { kind: 'document', records, ignored: whole.value.length - records.length };
    }
    if (isReportRecord(whole.value)) {
      return { kind: 'document', records: [whole.value], ignored: 0 };
    }
    return { kind: 'unparseable', reason: 'JSON document is not an object or array' };
  }

  const records: ReportRecord[] = [];
  const skipped: SkippedLine[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (!line.trim()) return;
    const parsed = tryParseJson(line);
    if (!parsed.ok) {
      skipped.push({ line: index + 1, message: parsed.message });
    } else if (isReportRecord(parsed.value)) {
      records.push(parsed.value);
    } else {
      skipped.push({ line: index + 1, message: 'not a JSON object' });
    }
  });

  if (records.length === 0 && skipped.length === 0) {
    return { kind: 'unparseable', reason: whole.message };
  }
  return { kind: 'lines', records, skipped };
}

/**
 * Downloads every report file in order and concatenates their records.
 * A failed download or unparseable file is logged and left out.
 */
export async function downloadReportFiles(links: string[]): Promise<ReportRecord[]> {
  const allRecords: ReportRecord[] = [];

  for (const link of links) {
    let content: string;
    try {
      const response = await axios.get<string>(link, {
        responseType: 'text',
        validateStatus: () => true,
      });
      if (response.status < 200 || response.status >= 300) {
        console.warn(`⚠️  Error downloading report file: HTTP ${response.status}`);
        continue;
      }
      content = response.data;
    } catch (error) {
      console.warn(`⚠️  Error downloading report file: ${errorMessage(error)}`);
      continue;
    }

    const parsed = parseReportContent(content);
    switch (parsed.kind) {
      case 'document':
        if (parsed.ignored > 0) {
          console.warn(`⚠️  Ignored ${parsed.ignored} non-object value(s) in report file`);
        }
        allRecords.push(...parsed.records);
        break;
      case 'lines':
        for (const skipped of parsed.skipped) {
          console.warn(`⚠️  Error parsing line ${skipped.line}: ${skipped.message}`);
        }
        allRecords.push(...parsed.records);
        break;
      case 'unparseable':
        console.warn(`⚠️  Could not parse report file: ${parsed.reason}`);
        break;
    }
  }

  return allRecords;
}

function countField(record: ReportRecord, field: string): number {
  const value = record[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function aggregateUserStats(records: ReportRecord[]): Map<string, UserStats> {
  const stats = new Map<string, UserStats>();

  for (const record of records) {
    const login = typeof record.user_login === 'string' ? record.user_login : '';
    const current = stats.get(login) ?? { interactions: 0, codeGen: 0, codeAccept: 0 };

    current.interactions += countField(record, 'user_initiated_interaction_count');
    current.codeGen += countField(record, 'code_generation_activity_count');
    current.codeAccept += countField(record, 'code_acceptance_activity_count');

    stats.set(login, current);
  }

  return stats;
}
