import fs from 'node:fs/promises';
import path from 'node:path';
import { LogWriteError } from '../../utils/errors';
import { validateMonitorName } from '../../utils/validation';
import { LogStatus, dateParts, formatDate, formatLogLine } from './logFormat';

/** `<logRoot>/<name>` */
export function resolveMonitorRoot(logRoot: string, monitorName: string): string {
  return path.join(logRoot, monitorName);
}

/** `<logRoot>/<name>/<YYYY>/<MM>` */
export function resolveLogDirectory(logRoot: string, monitorName: string, date: Date): string {
  const { year, month } = dateParts(date);
  return path.join(resolveMonitorRoot(logRoot, monitorName), year, month);
}

/** `<logRoot>/<name>/<YYYY>/<MM>/<YYYY-MM-DD>.log` */
export function resolveLogFilePath(logRoot: string, monitorName: string, date: Date): string {
  return path.join(resolveLogDirectory(logRoot, monitorName, date), `${formatDate(date)}.log`);
}

/**
 * Create a directory and its parents. An existing directory is not an error,
 * so concurrent callers are safe.
 */
export async function ensureDirectory(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Append-only, per-day log files for one monitor.
 *
 * The file path is derived from the entry timestamp on every write and each
 * write opens, appends, syncs and closes the file. No handle is held between
 * writes, so date rollover and external rotation need no special handling.
 */
export class LogStore {
  readonly logRoot: string;
  readonly monitorName: string;

  constructor(logRoot: string, monitorName: string) {
    this.logRoot = logRoot;
    this.monitorName = validateMonitorName(monitorName);
  }

  /**
   * @returns the path of the file written to
   * @throws LogWriteError when the directory or file cannot be written
   */
  async append(status: LogStatus, message: string, timestamp: Date = new Date()): Promise<string> {
    const filePath = resolveLogFilePath(this.logRoot, this.monitorName, timestamp);
    const line = formatLogLine({ status, timestamp, message });

    try {
      await ensureDirectory(path.dirname(filePath));
      const handle = await fs.open(filePath, 'a');
      try {
        await handle.appendFile(line, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (err) {
      throw new LogWriteError(filePath, err);
    }

    return filePath;
  }
}
