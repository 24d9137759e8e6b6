/**
 * Library Entry Point
 *
 * Exports all public API functions and types for programmatic use.
 * This is the main entry point when using this package as a library.
 */

// Re-export all types
export type {
  AppConfig,
  BillingSummary,
  CopilotSeat,
  ExportArtifact,
  JsonValue,
  MetricsClientConfig,
  OutputFormat,
  ParsedReport,
  ReportEnvelope,
  ReportPayload,
  ReportRecord,
  SeatAssignee,
  SeatsPage,
  SeatsReport,
  SkippedLine,
  UserStats,
} from './types.js';
export type { ConfigOverrides } from './config.js';
export type {
  CellValue,
  ReportRows,
  SaveReportOptions,
  SpreadsheetLoader,
  SpreadsheetWriter,
} from './report-exporter.js';
export type { ExportOverrides, FetchedReport, PlannedReport, ReportRequest } from './run-reports.js';
export type { UsageBar } from './summary.js';

// Re-export public utility functions
export { loadConfig, parseDate, isOutputFormat } from './config.js';
export {
  MetricsApiError,
  requestMetrics,
  fetchOrgMetrics28Day,
  fetchOrgMetricsByDay,
  fetchUsersMetrics28Day,
  fetchUsersMetricsByDay,
  fetchEnterpriseMetrics28Day,
  fetchCopilotSeats,
  fetchBillingSummary,
} from './metrics-client.js';
export { parseReportContent, downloadReportFiles, aggregateUserStats } from './report-data.js';
export {
  generateReportFilename,
  generateCSVReport,
  generateJSONReport,
  shapeReportRows,
  loadExcelWriter,
  saveReport,
} from './report-exporter.js';
export {
  formatSeatsDetail,
  formatUsageBar,
  formatUsageBreakdown,
  formatReportSummary,
  formatBillingSummary,
  formatRunSummary,
  printSeatsDetail,
  printUsageBreakdown,
  printReportSummary,
  printBillingSummary,
} from './summary.js';
export { planReports, runReports } from './run-reports.js';
