/**
 * Line format shared by the log store (writer) and the uptime reporter
 * (reader):
 *
 *   [STATUS] YYYY-MM-DD HH:MM:SS - message
 *
 * All calendar fields are UTC.
 */

export type LogStatus = 'OK' | 'FAIL' | 'INFO';

export const LOG_STATUSES: readonly LogStatus[] = ['OK', 'FAIL', 'INFO'];

export interface LogEntry {
  status: LogStatus;
  timestamp: Date;
  message: string;
}

export interface DateParts {
  year: string;
  month: string;
  day: string;
}

const LINE_PATTERN = /^\[(OK|FAIL|INFO)\] (\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}) - (.*)$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function dateParts(date: Date): DateParts {
  return {
    year: pad(date.getUTCFullYear(), 4),
    month: pad(date.getUTCMonth() + 1),
    day: pad(date.getUTCDate()),
  };
}

/** `YYYY-MM-DD` */
export function formatDate(date: Date): string {
  const { year, month, day } = dateParts(date);
  return `${year}-${month}-${day}`;
}

/** `YYYY-MM-DD HH:MM:SS` */
export function formatTimestamp(date: Date): string {
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${formatDate(date)} ${time}`;
}

export function formatLogLine(entry: LogEntry): string {
  // one entry per line, whatever the message contains
  const message = entry.message.replace(/\r?\n|\r/g, ' ');
  return `[${entry.status}] ${formatTimestamp(entry.timestamp)} - ${message}\n`;
}

/**
 * Parse one line (with or without its line terminator).
 * Returns null for anything that is not a well-formed entry.
 */
export function parseLogLine(line: string): LogEntry | null {
  const match = LINE_PATTERN.exec(line.replace(/\r?\n$/, ''));
  if (!match) return null;

  const [, status, date, time, message] = match;
  if (!isLogStatus(status)) return null;

  const timestamp = new Date(`${date}T${time}Z`);
  if (Number.isNaN(timestamp.getTime()) || formatTimestamp(timestamp) !== `${date} ${time}`) {
    return null;
  }

  return { status, timestamp, message };
}

export function isLogStatus(value: string): value is LogStatus {
  return LOG_STATUSES.some(s => s === value);
}
