import { UptimeReport } from './UptimeReporter';

const RULE = '=============================================';
const LABEL_WIDTH = 20;

function row(label: string, value: string): string {
  return `  ${label.padEnd(LABEL_WIDTH)} ${value}`;
}

/**
 * Render a report as the plain-text summary printed by the uptime CLI.
 */
export function formatReport(name: string, report: UptimeReport): string {
  if (report.kind === 'no-data') {
    return [
      '',
      `No check data found for monitor '${name}'.`,
      'The logs may be empty or contain only startup/shutdown entries.',
      '',
    ].join('\n');
  }

  return [
    '',
    RULE,
    `   Uptime Report: ${name}`,
    RULE,
    '',
    row('Total Checks:', String(report.total)),
    row('Successful Checks:', String(report.success)),
    row('Failed Checks:', String(report.fail)),
    '  -------------------------------------------',
    row('Uptime Percentage:', `${report.uptimePercent.toFixed(4)}%`),
    '',
    RULE,
    '',
    `Status: ${report.rating} - ${report.ratingDescription}`,
    '',
  ].join('\n');
}
