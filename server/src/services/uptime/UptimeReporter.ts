import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { parseLogLine } from '../logstore/logFormat';
import { resolveMonitorRoot } from '../logstore/LogStore';
import { NotFoundError } from '../../utils/errors';
import { validateMonitorName } from '../../utils/validation';
import defaultLogger from '../../utils/logger';
import { AvailabilityRating, rateAvailability } from './rating';

export interface UptimeStats {
  kind: 'stats';
  total: number;
  success: number;
  fail: number;
  /** 0-100, rounded to 4 decimals */
  uptimePercent: number;
  rating: AvailabilityRating;
  ratingDescription: string;
}

export interface NoUptimeData {
  kind: 'no-data';
  total: 0;
}

export type UptimeReport = UptimeStats | NoUptimeData;

interface Counts {
  success: number;
  fail: number;
}

const PERCENT_DECIMALS = 4;

export function roundPercent(value: number): number {
  const factor = 10 ** PERCENT_DECIMALS;
  return Math.round(value * factor) / factor;
}

/**
 * Offline availability report computed from a monitor's log trail.
 *
 * Reads are plain reads with no locking; a line being appended while the
 * report runs is either counted whole or skipped as malformed.
 */
export class UptimeReporter {
  private readonly logRoot: string;
  private readonly logger: Pick<Logger, 'warn'>;

  constructor(logRoot: string, logger: Pick<Logger, 'warn'> = defaultLogger) {
    this.logRoot = logRoot;
    this.logger = logger;
  }

  /**
   * @throws ValidationError for a name outside the safe character set
   * @throws NotFoundError when the monitor has no log directory
   */
  async report(name: string): Promise<UptimeReport> {
    const monitorName = validateMonitorName(name);
    const monitorDir = resolveMonitorRoot(this.logRoot, monitorName);

    if (!(await isDirectory(monitorDir))) {
      throw new NotFoundError(`Logs for monitor '${monitorName}'`, `directory ${monitorDir}`);
    }

    const counts: Counts = { success: 0, fail: 0 };
    for (const file of await this.findLogFiles(monitorDir)) {
      await this.countFile(file, counts);
    }

    const total = counts.success + counts.fail;
    if (total === 0) {
      return { kind: 'no-data', total: 0 };
    }

    const uptimePercent = roundPercent((counts.success / total) * 100);
    const band = rateAvailability(uptimePercent);
    return {
      kind: 'stats',
      total,
      success: counts.success,
      fail: counts.fail,
      uptimePercent,
      rating: band.rating,
      ratingDescription: band.description,
    };
  }

  /**
   * Names of the monitors with a log directory, sorted. Empty when the log
   * root does not exist yet.
   */
  async listMonitors(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.logRoot, { withFileTypes: true });
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    return entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort();
  }

  private async findLogFiles(dir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      this.logger.warn({ err, dir }, 'skipping unreadable log directory');
      return [];
    }

    const files: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...await this.findLogFiles(fullPath));
      } else if (entry.isFile() && entry.name.endsWith('.log')) {
        files.push(fullPath);
      }
    }
    return files.sort();
  }

  private async countFile(file: string, counts: Counts): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(file, 'utf8');
    } catch (err) {
      this.logger.warn({ err, file }, 'skipping unreadable log file');
      return;
    }

    for (const line of content.split('\n')) {
      const entry = parseLogLine(line);
      if (entry?.status === 'OK') counts.success++;
      else if (entry?.status === 'FAIL') counts.fail++;
    }
  }
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}
