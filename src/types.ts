/**
 * GitHub Copilot Usage Metrics API Types
 * https://docs.github.com/en/enterprise-cloud@latest/rest/copilot/copilot-usage-metrics
 *
 * Copilot User Management (seats) API Types
 * https://docs.github.com/en/rest/copilot/copilot-user-management
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** One metrics record from a downloaded report file. Shape is owned by the API. */
export type ReportRecord = { [key: string]: JsonValue };

export type ReportPayload = Record<string, unknown>;

export interface ReportEnvelope {
  report_start_day?: string;
  report_end_day?: string;
  report_day?: string;
  download_links?: string[];
  data?: ReportRecord[];  // Filled in after the download links are fetched
  [key: string]: unknown;
}

export interface SeatAssignee {
  login?: string;
  [key: string]: unknown;
}

export interface CopilotSeat {
  assignee?: SeatAssignee | null;
  created_at?: string;
  updated_at?: string;
  last_activity_at?: string | null;
  last_activity_editor?: string | null;  // e.g. "vscode/1.85.1/copilot/1.143.0"
  pending_cancellation_date?: string | null;
  [key: string]: unknown;
}

export interface SeatsPage {
  total_seats?: number;
  seats?: CopilotSeat[];
}

export type SeatsReport = {
  total_seats: number;
  seats: CopilotSeat[];
};

export interface BillingSummary {
  seat_breakdown?: {
    total?: number;
    added_this_cycle?: number;
    pending_invitation?: number;
    pending_cancellation?: number;
    active_this_cycle?: number;
    inactive_this_cycle?: number;
  };
  seat_management_setting?: string;
  plan_type?: string;
  [key: string]: unknown;
}

export interface UserStats {
  interactions: number;
  codeGen: number;
  codeAccept: number;
}

export type ParsedReport =
  | { kind: 'document'; records: ReportRecord[]; ignored: number }  // ignored: non-object array elements
  | { kind: 'lines'; records: ReportRecord[]; skipped: SkippedLine[] }
  | { kind: 'unparseable'; reason: string };

export interface SkippedLine {
  line: number;  // 1-based
  message: string;
}

export type OutputFormat = 'json' | 'csv' | 'excel';

export interface ExportArtifact {
  path: string;
  format: OutputFormat;
  reportType: string;
}

export interface MetricsClientConfig {
  token: string;
  org: string;
  enterprise?: string;
  baseUrl: string;
}

export interface AppConfig extends MetricsClientConfig {
  format: string;  // unknown values reach the exporter, which falls back to JSON
  outputDir: string;
}
