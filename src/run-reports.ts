/**
 * Report orchestration: decides which reports a run needs, fetches them one
 * after another and saves each one that came back with content.
 */
import {
  fetchBillingSummary,
  fetchCopilotSeats,
  fetchEnterpriseMetrics28Day,
  fetchOrgMetrics28Day,
  fetchOrgMetricsByDay,
  fetchUsersMetrics28Day,
  fetchUsersMetricsByDay,
} from './metrics-client.js';
import { saveReport, type SaveReportOptions } from './report-exporter.js';
import {
  printBillingSummary,
  printReportSummary,
  printSeatsDetail,
  printUsageBreakdown,
} from './summary.js';
import type {
  AppConfig,
  ExportArtifact,
  MetricsClientConfig,
  ReportEnvelope,
  ReportPayload,
} from './types.js';

export interface ReportRequest {
  day?: string;        // YYYY-MM-DD; absent means the latest 28-day window
  users: boolean;
  enterprise: boolean;
  billing: boolean;
  seats: boolean;
  breakdown: boolean;
}

export interface FetchedReport {
  payload: ReportPayload;
  summarize: () => void;
}

export interface PlannedReport {
  reportType: string;
  fetch: (config: MetricsClientConfig) => Promise<FetchedReport | null>;
}

export type ExportOverrides = Pick<SaveReportOptions, 'now' | 'loadSpreadsheet'>;

type EnvelopeFetcher = (config: MetricsClientConfig) => Promise<ReportEnvelope | null>;

function envelopeReport(reportType: string, fetchEnvelope: EnvelopeFetcher): PlannedReport {
  return {
    reportType,
    fetch: async (config) => {
      const envelope = await fetchEnvelope(config);
      return envelope ? { payload: envelope, summarize: () => printReportSummary(envelope, reportType) } : null;
    },
  };
}

function usersFetcher(day: string | undefined): EnvelopeFetcher {
  return day ? (config) => fetchUsersMetricsByDay(config, day) : fetchUsersMetrics28Day;
}

const billingReport: PlannedReport = {
  reportType: 'billing',
  fetch: async (config) => {
    const billing = await fetchBillingSummary(config);
    return billing ? { payload: billing, summarize: () => printBillingSummary(billing) } : null;
  },
};

export function planReports(request: ReportRequest): PlannedReport[] {
  const { day } = request;
  const plan: PlannedReport[] = [
    day
      ? envelopeReport(`org_day_${day}`, (config) => fetchOrgMetricsByDay(config, day))
      : envelopeReport('org_28_day', fetchOrgMetrics28Day),
  ];

  if (request.users) {
    plan.push(envelopeReport(day ? `users_day_${day}` : 'users_28_day', usersFetcher(day)));
  }
  if (request.enterprise) {
    plan.push(envelopeReport('enterprise_28_day', fetchEnterpriseMetrics28Day));
  }
  if (request.billing) {
    plan.push(billingReport);
  }
  return plan;
}

function hasContent(payload: object): boolean {
  return Object.keys(payload).length > 0;
}

export async function runReports(
  config: AppConfig,
  request: ReportRequest,
  overrides: ExportOverrides = {}
): Promise<ExportArtifact[]> {
  const artifacts: ExportArtifact[] = [];
  const exportOptions: SaveReportOptions = {
    format: config.format,
    outputDir: config.outputDir,
    ...overrides,
  };

  for (const planned of planReports(request)) {
    const fetched = await planned.fetch(config);
    if (fetched && hasContent(fetched.payload)) {
      fetched.summarize();
      artifacts.push(await saveReport(fetched.payload, planned.reportType, exportOptions));
    }
  }

  if (request.seats || request.breakdown) {
    const seats = await fetchCopilotSeats(config);

    if (seats) {
      if (request.breakdown) {
        console.log('📊 Fetching per-user metrics for the breakdown...');
        const usersMetrics = await usersFetcher(request.day)(config);
        printUsageBreakdown(seats, usersMetrics);

        if (usersMetrics && hasContent(usersMetrics)) {
          artifacts.push(await saveReport(usersMetrics, 'users_breakdown', exportOptions));
        }
      } else {
        printSeatsDetail(seats);
      }

      artifacts.push(await saveReport(seats, 'seats', exportOptions));
    }
  }

  return artifacts;
}
