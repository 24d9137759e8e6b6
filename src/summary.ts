/**
 * Console views: seat detail, usage breakdown and report summaries.
 * Each format* function returns the text; print* writes it to stdout.
 */
import { aggregateUserStats } from './report-data.js';
import type {
  BillingSummary,
  CopilotSeat,
  ExportArtifact,
  ReportEnvelope,
  SeatsReport,
  UserStats,
} from './types.js';

export const INCLUDED_REQUEST_QUOTA = 1000;
export const PREMIUM_REQUEST_PRICE = 0.04;
const BAR_SEGMENTS = 20;

const numberFormat = new Intl.NumberFormat('en-US');

function dateOnly(value: string | null | undefined): string | null {
  return value ? value.slice(0, 10) : null;
}

function seatLogin(seat: CopilotSeat): string {
  return seat.assignee?.login ?? 'N/A';
}

export function seatStatus(seat: CopilotSeat): string {
  const pending = dateOnly(seat.pending_cancellation_date);
  if (pending) return `⚠️  Cancels: ${pending}`;
  return seat.last_activity_at ? '🟢 Active' : '⚪ Inactive';
}

export function formatSeatsDetail(report: SeatsReport): string {
  const lines: string[] = [];
  const rule = '='.repeat(90);

  lines.push('', rule, '👥 COPILOT SEAT DETAIL', rule);
  lines.push('', `${'User'.padEnd(25)} ${'Assigned'.padEnd(15)} ${'Last activity'.padEnd(20)} Status`);
  lines.push('-'.repeat(90));

  for (const seat of report.seats) {
    const created = dateOnly(seat.created_at) ?? 'N/A';
    const lastActivity = dateOnly(seat.last_activity_at) ?? 'No activity';
    lines.push(
      `${seatLogin(seat).padEnd(25)} ${created.padEnd(15)} ${lastActivity.padEnd(20)} ${seatStatus(seat)}`
    );
  }

  lines.push('-'.repeat(90));
  lines.push(`Total: ${report.seats.length} users`);
  lines.push(rule, '');
  return lines.join('\n');
}

export interface UsageBar {
  filled: number;
  percent: number;  // capped at 100
  bar: string;
  label: string;    // raw usage, uncapped: "1,500/1,000"
}

export function formatUsageBar(used: number, quota: number = INCLUDED_REQUEST_QUOTA): UsageBar {
  const percent = Math.min(100, (used / quota) * 100);
  const filled = Math.round(percent / 5);
  return {
    filled,
    percent,
    bar: '█'.repeat(filled) + '░'.repeat(BAR_SEGMENTS - filled),
    label: `${numberFormat.format(used)}/${numberFormat.format(quota)}`,
  };
}

/** "vscode/1.85.1/copilot/1.143.0" -> "vscode" */
function editorName(editor: string | null | undefined): string {
  if (!editor) return 'N/A';
  return editor.split('/')[0].slice(0, 20);
}

export function formatUsageBreakdown(
  report: SeatsReport,
  usersMetrics: ReportEnvelope | null
): string {
  const userStats: Map<string, UserStats> = aggregateUserStats(usersMetrics?.data ?? []);
  const periodStart = usersMetrics?.report_start_day ?? 'N/A';
  const periodEnd = usersMetrics?.report_end_day ?? 'N/A';
  const rule = '='.repeat(110);
  const lines: string[] = [];

  lines.push('', rule, '📊 USAGE BREAKDOWN');
  lines.push(
    `   Period: ${periodStart} to ${periodEnd} | Price per premium request: $${PREMIUM_REQUEST_PRICE}`
  );
  lines.push(rule, '');
  lines.push(
    `${'User'.padEnd(22)} ${'Interactions'.padEnd(15)} ${'Code Gen'.padEnd(12)} ${'Included req'.padEnd(18)} ${'Editor'.padEnd(25)}`
  );
  lines.push('-'.repeat(110));

  let totalInteractions = 0;
  let totalCodeGen = 0;

  for (const seat of report.seats) {
    const login = seatLogin(seat);
    const stats = userStats.get(login);
    const interactions = stats?.interactions ?? 0;
    const codeGen = stats?.codeGen ?? 0;

    totalInteractions += interactions;
    totalCodeGen += codeGen;

    const used = interactions + codeGen;
    const usage = formatUsageBar(used);
    const marker = seat.last_activity_at ? '🟢' : '⚪';

    lines.push(
      `${marker} ${login.padEnd(20)} ${String(interactions).padEnd(15)} ${String(codeGen).padEnd(12)} ${usage.label.padEnd(18)} ${editorName(seat.last_activity_editor).padEnd(25)}`
    );
    if (used > 0) {
      lines.push(`   ${usage.bar} ${usage.percent.toFixed(1)}%`);
    }

    const pending = dateOnly(seat.pending_cancellation_date);
    if (pending) {
      lines.push(`   ⚠️  Pending cancellation: ${pending}`);
    }
  }

  lines.push('-'.repeat(110));

  const activeUsers = report.seats.filter((seat) => seat.last_activity_at).length;
  lines.push('', '📊 SUMMARY');
  lines.push(`   👥 Total Copilot users: ${report.total_seats}`);
  lines.push(`   🟢 Active users: ${activeUsers}`);
  lines.push(`   ⚪ Users without recent activity: ${report.total_seats - activeUsers}`);
  lines.push('', `   💬 Total interactions: ${numberFormat.format(totalInteractions)}`);
  lines.push(`   💻 Total code generation: ${numberFormat.format(totalCodeGen)}`);
  lines.push(rule, '');
  return lines.join('\n');
}

export function formatReportSummary(envelope: ReportEnvelope, reportType: string): string {
  const rule = '='.repeat(60);
  const lines: string[] = ['', rule, `📈 REPORT SUMMARY: ${reportType.toUpperCase()}`, rule];

  if (envelope.report_start_day && envelope.report_end_day) {
    lines.push(`📅 Period: ${envelope.report_start_day} to ${envelope.report_end_day}`);
  } else if (envelope.report_day) {
    lines.push(`📅 Day: ${envelope.report_day}`);
  }

  if (Array.isArray(envelope.download_links)) {
    lines.push(`📁 Report files: ${envelope.download_links.length}`);
  }

  if (Array.isArray(envelope.data)) {
    lines.push(`📊 Records fetched: ${envelope.data.length}`);

    const sample = envelope.data[0];
    if (sample) {
      const fields = Object.keys(sample);
      lines.push('', '📋 Fields available in the report:');
      for (const field of fields.slice(0, 10)) {
        lines.push(`   - ${field}`);
      }
      if (fields.length > 10) {
        lines.push(`   ... and ${fields.length - 10} more fields`);
      }
    }
  }

  lines.push(rule, '');
  return lines.join('\n');
}

export function formatRunSummary(artifacts: ExportArtifact[]): string {
  const rule = '='.repeat(60);
  const lines = ['', rule, '✅ DONE', rule, `📊 Reports generated: ${artifacts.length}`];
  for (const artifact of artifacts) {
    lines.push(`   📄 ${artifact.path}`);
  }
  lines.push(rule, '');
  return lines.join('\n');
}

export function printSeatsDetail(report: SeatsReport): void {
  console.log(formatSeatsDetail(report));
}

export function printUsageBreakdown(report: SeatsReport, usersMetrics: ReportEnvelope | null): void {
  console.log(formatUsageBreakdown(report, usersMetrics));
}

export function printReportSummary(envelope: ReportEnvelope, reportType: string): void {
  console.log(formatReportSummary(envelope, reportType));
}

export function formatBillingSummary(billing: BillingSummary): string {
  const breakdown = billing.seat_breakdown ?? {};
  const rule = '='.repeat(60);
  return [
    '',
    rule,
    '💰 BILLING SUMMARY',
    rule,
    `   Plan: ${billing.plan_type ?? 'N/A'}`,
    `   Seat management: ${billing.seat_management_setting ?? 'N/A'}`,
    `   Total seats: ${breakdown.total ?? 0}`,
    `   Active this cycle: ${breakdown.active_this_cycle ?? 0}`,
    `   Inactive this cycle: ${breakdown.inactive_this_cycle ?? 0}`,
    `   Pending cancellation: ${breakdown.pending_cancellation ?? 0}`,
    rule,
    '',
  ].join('\n');
}

export function printBillingSummary(billing: BillingSummary): void {
  console.log(formatBillingSummary(billing));
}
