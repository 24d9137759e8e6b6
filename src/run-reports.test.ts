import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as client from './metrics-client.js';
import { planReports, runReports, type ReportRequest } from './run-reports.js';
import type { AppConfig, ReportEnvelope } from './types.js';

vi.mock('./metrics-client.js', () => ({
  fetchOrgMetrics28Day: vi.fn(),
  fetchOrgMetricsByDay: vi.fn(),
  fetchUsersMetrics28Day: vi.fn(),
  fetchUsersMetricsByDay: vi.fn(),
  fetchEnterpriseMetrics28Day: vi.fn(),
  fetchCopilotSeats: vi.fn(),
  fetchBillingSummary: vi.fn(),
}));

const NOW = new Date(2026, 0, 15, 9, 5, 3);
const STAMP = '20260115_090503';

const noExtras: ReportRequest = {
  users: false,
  enterprise: false,
  billing: false,
  seats: false,
  breakdown: false,
};

const orgMetrics: ReportEnvelope = {
  report_start_day: '2026-01-01',
  report_end_day: '2026-01-28',
  download_links: ['https://files.test/org'],
  data: [{ day: '2026-01-01', daily_active_users: 4 }],
};

const usersMetrics: ReportEnvelope = {
  report_start_day: '2026-01-01',
  report_end_day: '2026-01-28',
  data: [{ user_login: 'mona', user_initiated_interaction_count: 12 }],
};

let tmp: string;
let config: AppConfig;

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'copilot-run-'));
  config = { token: 'test-token', org: 'acme', baseUrl: 'https://api.github.test', format: 'json', outputDir: tmp };
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.mocked(client.fetchOrgMetrics28Day).mockResolvedValue(orgMetrics);
  vi.mocked(client.fetchOrgMetricsByDay).mockResolvedValue({ report_day: '2026-01-15', data: [] });
  vi.mocked(client.fetchUsersMetrics28Day).mockResolvedValue(usersMetrics);
  vi.mocked(client.fetchUsersMetricsByDay).mockResolvedValue({ report_day: '2026-01-15', data: [] });
  vi.mocked(client.fetchEnterpriseMetrics28Day).mockResolvedValue(null);
  vi.mocked(client.fetchCopilotSeats).mockResolvedValue({
    total_seats: 1,
    seats: [{ assignee: { login: 'mona' }, last_activity_at: '2026-01-20T08:30:00Z' }],
  });
  vi.mocked(client.fetchBillingSummary).mockResolvedValue({ plan_type: 'business' });
});

afterEach(() => {
  vi.clearAllMocks();
  vi.restoreAllMocks();
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe('planReports', () => {
  it('plans the 28-day organization report by default', () => {
    expect(planReports(noExtras).map((p) => p.reportType)).toEqual(['org_28_day']);
  });

  it('plans day-specific reports when a day is given', () => {
    const plan = planReports({ ...noExtras, day: '2026-01-15', users: true, enterprise: true });
    expect(plan.map((p) => p.reportType)).toEqual([
      'org_day_2026-01-15',
      'users_day_2026-01-15',
      'enterprise_28_day',
    ]);
  });

  it('plans billing after the metrics reports', async () => {
    const plan = planReports({ ...noExtras, users: true, billing: true });
    expect(plan.map((p) => p.reportType)).toEqual(['org_28_day', 'users_28_day', 'billing']);

    const billing = await plan[2].fetch(config);
    expect(billing?.payload).toEqual({ plan_type: 'business' });
    expect(client.fetchBillingSummary).toHaveBeenCalledWith(config);
  });

  it('resolves billing to null when the summary is unavailable', async () => {
    vi.mocked(client.fetchBillingSummary).mockResolvedValue(null);
    const [, billing] = planReports({ ...noExtras, billing: true });
    expect(await billing.fetch(config)).toBeNull();
  });

  it('binds the day to the fetch', async () => {
    const [org] = planReports({ ...noExtras, day: '2026-01-15' });
    await org.fetch(config);
    expect(client.fetchOrgMetricsByDay).toHaveBeenCalledWith(config, '2026-01-15');
  });
});

describe('runReports', () => {
  it('saves the organization report', async () => {
    const artifacts = await runReports(config, noExtras, { now: NOW });

    expect(artifacts).toEqual([
      { path: path.join(tmp, `copilot_org_28_day_${STAMP}.json`), format: 'json', reportType: 'org_28_day' },
    ]);
    expect(JSON.parse(fs.readFileSync(artifacts[0].path, 'utf8'))).toEqual(orgMetrics);
  });

  it('saves users, billing and seats reports in order', async () => {
    const artifacts = await runReports(
      config,
      { ...noExtras, users: true, billing: true, seats: true },
      { now: NOW }
    );

    expect(artifacts.map((a) => a.reportType)).toEqual(['org_28_day', 'users_28_day', 'billing', 'seats']);
    expect(client.fetchUsersMetrics28Day).toHaveBeenCalledTimes(1);
  });

  it('skips reports that come back empty or missing', async () => {
    vi.mocked(client.fetchOrgMetrics28Day).mockResolvedValue({});

    const artifacts = await runReports(config, { ...noExtras, enterprise: true }, { now: NOW });

    expect(artifacts).toEqual([]);
    expect(client.fetchEnterpriseMetrics28Day).toHaveBeenCalledTimes(1);
  });

  it('fetches user metrics for the breakdown and saves them', async () => {
    const artifacts = await runReports(config, { ...noExtras, breakdown: true }, { now: NOW });

    expect(artifacts.map((a) => a.reportType)).toEqual(['org_28_day', 'users_breakdown', 'seats']);
    expect(client.fetchUsersMetrics28Day).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('USAGE BREAKDOWN'));
  });

  it('uses the day window for the breakdown', async () => {
    await runReports(config, { ...noExtras, day: '2026-01-15', breakdown: true }, { now: NOW });

    expect(client.fetchUsersMetricsByDay).toHaveBeenCalledWith(config, '2026-01-15');
    expect(client.fetchUsersMetrics28Day).not.toHaveBeenCalled();
  });

  it('prints the seat detail when only seats are requested', async () => {
    await runReports(config, { ...noExtras, seats: true }, { now: NOW });

    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('COPILOT SEAT DETAIL'));
    expect(client.fetchUsersMetrics28Day).not.toHaveBeenCalled();
  });

  it('saves nothing for seats when the listing fails', async () => {
    vi.mocked(client.fetchCopilotSeats).mockResolvedValue(null);

    const artifacts = await runReports(config, { ...noExtras, seats: true }, { now: NOW });

    expect(artifacts.map((a) => a.reportType)).toEqual(['org_28_day']);
  });

  it('writes in the configured format', async () => {
    const artifacts = await runReports({ ...config, format: 'csv' }, noExtras, { now: NOW });

    expect(artifacts[0].path).toBe(path.join(tmp, `copilot_org_28_day_${STAMP}.csv`));
  });

  it('writes JSON with a warning for an unrecognised OUTPUT_FORMAT', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const artifacts = await runReports({ ...config, format: 'yaml' }, noExtras, { now: NOW });

    expect(artifacts).toEqual([
      { path: path.join(tmp, `copilot_org_28_day_${STAMP}.json`), format: 'json', reportType: 'org_28_day' },
    ]);
    expect(warn).toHaveBeenCalledWith('⚠️  Unsupported format: yaml. Using JSON.');
  });

  it('propagates errors from single-shot reports', async () => {
    vi.mocked(client.fetchOrgMetrics28Day).mockRejectedValue(new Error('HTTP 404: resource not found'));

    await expect(runReports(config, noExtras, { now: NOW })).rejects.toThrow('HTTP 404');
  });
});
