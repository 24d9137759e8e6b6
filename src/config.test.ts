import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isOutputFormat, loadConfig, parseDate } from './config.js';

describe('parseDate', () => {
  it('parses valid YYYY-MM-DD', () => {
    const d = parseDate('2026-01-15');
    expect(d.toISOString().startsWith('2026-01-15')).toBe(true);
  });

  it('throws on invalid format', () => {
    expect(() => parseDate('01-15-2026')).toThrow('Invalid date format');
    expect(() => parseDate('2026/01/15')).toThrow('Invalid date format');
  });

  it('throws on invalid date', () => {
    expect(() => parseDate('2026-02-30')).toThrow('Invalid date');
  });
});

describe('isOutputFormat', () => {
  it('accepts json, csv and excel only', () => {
    expect(['json', 'csv', 'excel', 'xlsx', 'JSON'].map(isOutputFormat)).toEqual([
      true,
      true,
      true,
      false,
      false,
    ]);
  });
});

describe('loadConfig', () => {
  const vars = [
    'GITHUB_TOKEN',
    'GITHUB_ORG',
    'GITHUB_ENTERPRISE',
    'GITHUB_API_URL',
    'OUTPUT_FORMAT',
    'OUTPUT_DIR',
  ];

  let savedEnv: Record<string, string | undefined>;

  beforeEach(() => {
    savedEnv = { ...process.env };
    for (const v of vars) delete process.env[v];
  });

  afterEach(() => {
    process.env = savedEnv;
  });

  it('reads token and organization from the environment with defaults', () => {
    process.env.GITHUB_TOKEN = 'test-token';
    process.env.GITHUB_ORG = 'acme';

    expect(loadConfig()).toEqual({
      token: 'test-token',
      org: 'acme',
      enterprise: undefined,
      baseUrl: 'https://api.github.com',
      format: 'json',
      outputDir: './reports',
    });
  });

  it('lets command-line values win over the environment', () => {
    Object.assign(process.env, {
      GITHUB_TOKEN: 'env-token',
      GITHUB_ORG: 'env-org',
      OUTPUT_FORMAT: 'csv',
      OUTPUT_DIR: '/tmp/env-reports',
    });

    expect(
      loadConfig({ token: 'flag-token', org: 'flag-org', format: 'EXCEL', outputDir: 'out' })
    ).toMatchObject({ token: 'flag-token', org: 'flag-org', format: 'excel', outputDir: 'out' });
  });

  it('reads the output settings from the environment', () => {
    Object.assign(process.env, {
      GITHUB_TOKEN: 'test-token',
      GITHUB_ORG: 'acme',
      OUTPUT_FORMAT: 'csv',
      OUTPUT_DIR: '/tmp/env-reports',
      GITHUB_API_URL: 'https://github.example.test/api/v3/',
    });

    expect(loadConfig()).toMatchObject({
      format: 'csv',
      outputDir: '/tmp/env-reports',
      baseUrl: 'https://github.example.test/api/v3',
    });
  });

  it('uses GITHUB_ENTERPRISE only when enterprise metrics are requested', () => {
    Object.assign(process.env, { GITHUB_TOKEN: 'test-token', GITHUB_ORG: 'acme', GITHUB_ENTERPRISE: 'acme-corp' });

    expect(loadConfig().enterprise).toBeUndefined();
    expect(loadConfig({ enterprise: true }).enterprise).toBe('acme-corp');
  });

  it('throws on a missing token or organization', () => {
    expect(() => loadConfig()).toThrow('Missing required configuration: GITHUB_TOKEN (or --token)');
    process.env.GITHUB_TOKEN = 'test-token';
    expect(() => loadConfig()).toThrow('Missing required configuration: GITHUB_ORG (or --org)');
  });

  it('passes an unknown OUTPUT_FORMAT through to the exporter', () => {
    Object.assign(process.env, { GITHUB_TOKEN: 'test-token', GITHUB_ORG: 'acme', OUTPUT_FORMAT: 'YAML' });

    expect(loadConfig().format).toBe('yaml');
  });
});
