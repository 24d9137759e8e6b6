import type { AppConfig, OutputFormat } from './types.js';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const GITHUB_API_BASE = 'https://api.github.com';
export const DEFAULT_OUTPUT_DIR = './reports';
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'csv', 'excel'];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export function parseDate(dateStr: string): Date {
  if (!DATE_PATTERN.test(dateStr)) {
    throw new Error(`Invalid date format: ${dateStr}. Expected YYYY-MM-DD`);
  }

  const date = new Date(dateStr + 'T00:00:00Z');

  if (isNaN(date.getTime())) {
    throw new Error(`Invalid date: ${dateStr}`);
  }

  // Date rolls 2024-02-30 over to March; reject anything that moved
  const isoDate = date.toISOString().split('T')[0];
  if (isoDate !== dateStr) {
    throw new Error(`Invalid date: ${dateStr}`);
  }

  return date;
}

export interface ConfigOverrides {
  token?: string;
  org?: string;
  format?: string;
  outputDir?: string;
  enterprise?: boolean;
}

/**
 * Resolves the run configuration. Command-line values win over the
 * environment (GITHUB_TOKEN, GITHUB_ORG, GITHUB_ENTERPRISE, GITHUB_API_URL,
 * OUTPUT_FORMAT, OUTPUT_DIR).
 */
export function loadConfig(overrides: ConfigOverrides = {}): AppConfig {
  const token = overrides.token || process.env.GITHUB_TOKEN;
  if (!token) {
    throw new Error('Missing required configuration: GITHUB_TOKEN (or --token)');
  }

  const org = overrides.org || process.env.GITHUB_ORG;
  if (!org) {
    throw new Error('Missing required configuration: GITHUB_ORG (or --org)');
  }

  // --format is checked while parsing arguments; an unknown OUTPUT_FORMAT
  // is left for saveReport, which writes JSON instead
  const format = (overrides.format || process.env.OUTPUT_FORMAT || 'json').toLowerCase();
  const enterprise = overrides.enterprise ? process.env.GITHUB_ENTERPRISE || undefined : undefined;

  return {
    token,
    org,
    enterprise,
    baseUrl: (process.env.GITHUB_API_URL || GITHUB_API_BASE).replace(/\/+$/, ''),
    format,
    outputDir: overrides.outputDir || process.env.OUTPUT_DIR || DEFAULT_OUTPUT_DIR,
  };
}
