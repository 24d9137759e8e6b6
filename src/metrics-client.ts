/**
 * GitHub Copilot metrics, seats and billing endpoints.
 */
import axios from 'axios';
import { downloadReportFiles } from './report-data.js';
import type {
  BillingSummary,
  MetricsClientConfig,
  ReportEnvelope,
  SeatsPage,
  SeatsReport,
} from './types.js';

const GITHUB_API_VERSION = '2022-11-28';
export const SEATS_PER_PAGE = 50;

export class MetricsApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string,
    readonly hints: string[] = []
  ) {
    super(message);
    this.name = 'MetricsApiError';
  }
}

function bodyText(body: unknown): string {
  return typeof body === 'string' ? body : JSON.stringify(body);
}

function errorFor(config: MetricsClientConfig, status: number, body: unknown): MetricsApiError {
  const text = bodyText(body);
  if (status === 403) {
    return new MetricsApiError('HTTP 403: no permission to access this resource', status, text, [
      'Check that your token has the required scopes:',
      "  - Organization reports: 'read:org'",
      "  - Enterprise reports: 'manage_billing:copilot' or 'read:enterprise'",
    ]);
  }
  if (status === 404) {
    return new MetricsApiError('HTTP 404: resource not found', status, text, [
      `Check that the organization '${config.org}' exists and has Copilot enabled.`,
    ]);
  }
  return new MetricsApiError(`HTTP ${status}: ${text}`, status, text);
}

export function githubHeaders(token: string): Record<string, string> {
  return {
    'Accept': 'application/vnd.github+json',
    'Authorization': `Bearer ${token}`,
    'X-GitHub-Api-Version': GITHUB_API_VERSION,
  };
}

/** GET a GitHub API path. Any non-2xx status throws a MetricsApiError. */
export async function requestMetrics<T>(
  config: MetricsClientConfig,
  apiPath: string,
  params?: Record<string, unknown>
): Promise<T> {
  const response = await axios.get<T>(`${config.baseUrl}${apiPath}`, {
    params,
    headers: githubHeaders(config.token),
    validateStatus: () => true,
  });

  if (response.status < 200 || response.status >= 300) {
    throw errorFor(config, response.status, response.data);
  }
  return response.data;
}

async function fetchReportEnvelope(
  config: MetricsClientConfig,
  apiPath: string,
  params?: Record<string, unknown>
): Promise<ReportEnvelope> {
  const envelope = await requestMetrics<ReportEnvelope>(config, apiPath, params);

  if (Array.isArray(envelope.download_links)) {
    console.log(`📥 Downloading ${envelope.download_links.length} report file(s)...`);
    envelope.data = await downloadReportFiles(envelope.download_links);
  }
  return envelope;
}

export async function fetchOrgMetrics28Day(config: MetricsClientConfig): Promise<ReportEnvelope> {
  console.log(`📊 Fetching 28-day metrics for organization '${config.org}'...`);
  return fetchReportEnvelope(
    config,
    `/orgs/${config.org}/copilot/metrics/reports/organization-28-day/latest`
  );
}

export async function fetchOrgMetricsByDay(
  config: MetricsClientConfig,
  day: string
): Promise<ReportEnvelope> {
  console.log(`📊 Fetching metrics for ${day}...`);
  return fetchReportEnvelope(
    config,
    `/orgs/${config.org}/copilot/metrics/reports/organization-1-day`,
    { day }
  );
}

export async function fetchUsersMetrics28Day(config: MetricsClientConfig): Promise<ReportEnvelope> {
  console.log(`👥 Fetching 28-day user metrics for organization '${config.org}'...`);
  return fetchReportEnvelope(
    config,
    `/orgs/${config.org}/copilot/metrics/reports/users-28-day/latest`
  );
}

export async function fetchUsersMetricsByDay(
  config: MetricsClientConfig,
  day: string
): Promise<ReportEnvelope> {
  console.log(`👥 Fetching user metrics for ${day}...`);
  return fetchReportEnvelope(
    config,
    `/orgs/${config.org}/copilot/metrics/reports/users-1-day`,
    { day }
  );
}

/** Returns null when no enterprise is configured. */
export async function fetchEnterpriseMetrics28Day(
  config: MetricsClientConfig
): Promise<ReportEnvelope | null> {
  if (!config.enterprise) {
    console.warn('⚠️  No enterprise configured. Set the GITHUB_ENTERPRISE variable.');
    return null;
  }
  console.log(`🏢 Fetching metrics for enterprise '${config.enterprise}'...`);
  return fetchReportEnvelope(
    config,
    `/enterprises/${config.enterprise}/copilot/metrics/reports/enterprise-28-day/latest`
  );
}

/**
 * Lists every assigned seat. Pages are requested until one comes back short;
 * total_seats is taken from the first page. Errors are logged and yield null.
 */
export async function fetchCopilotSeats(config: MetricsClientConfig): Promise<SeatsReport | null> {
  console.log(`👥 Fetching Copilot seats for '${config.org}'...`);

  const seats: SeatsReport['seats'] = [];
  let totalSeats = 0;
  let page = 1;

  try {
    for (;;) {
      const data = await requestMetrics<SeatsPage>(config, `/orgs/${config.org}/copilot/billing/seats`, {
        page,
        per_page: SEATS_PER_PAGE,
      });
      if (page === 1) {
        totalSeats = data.total_seats ?? 0;
      }

      const pageSeats = data.seats ?? [];
      seats.push(...pageSeats);

      if (pageSeats.length < SEATS_PER_PAGE) break;
      page++;
    }
  } catch (error) {
    if (error instanceof MetricsApiError && error.status === 403) {
      console.error("❌ HTTP 403: no permission. Check the token has the 'manage_billing:copilot' scope.");
    } else if (error instanceof MetricsApiError && error.status === 404) {
      console.error(`❌ HTTP 404: Copilot is not enabled for '${config.org}'.`);
    } else {
      console.error(`❌ Error fetching seats: ${error instanceof Error ? error.message : String(error)}`);
    }
    return null;
  }

  return { total_seats: totalSeats, seats };
}

export async function fetchBillingSummary(config: MetricsClientConfig): Promise<BillingSummary | null> {
  console.log(`💰 Fetching billing summary for '${config.org}'...`);
  try {
    return await requestMetrics<BillingSummary>(config, `/orgs/${config.org}/copilot/billing`);
  } catch (error) {
    const reason =
      error instanceof MetricsApiError
        ? `HTTP ${error.status}`
        : error instanceof Error
          ? error.message
          : String(error);
    console.warn(`⚠️  Could not fetch billing summary: ${reason}`);
    return null;
  }
}
