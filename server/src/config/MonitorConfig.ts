import os from 'node:os';
import path from 'node:path';
import { ConfigError, ValidationError } from '../utils/errors';
import {
  validateTargetUrl,
  validateMonitorName,
  parseSecondsToMs,
  parseIntegerAtLeast,
  parseList,
} from '../utils/validation';

export type NotifyChannel = 'console' | 'webhook' | 'slack' | 'mail';

export const NOTIFY_CHANNELS: readonly NotifyChannel[] = ['console', 'webhook', 'slack', 'mail'];

export const DEFAULT_CHECK_INTERVAL_SECONDS = 3;
export const DEFAULT_FAILURE_THRESHOLD = 4;
export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 10;

export interface MonitorConfig {
  readonly name: string;
  readonly url: string;
  readonly recipients: readonly string[];
  readonly checkIntervalMs: number;
  readonly failureThreshold: number;
  readonly requestTimeoutMs: number;
  readonly logRoot: string;
  readonly channels: readonly NotifyChannel[];
  readonly webhookUrl?: string;
  readonly slackWebhookUrl?: string;
  readonly mailCommand: string;
}

/**
 * Resolve the log root shared by the monitor and the uptime reporter.
 * Defaults to ~/logs.
 */
export function resolveLogRoot(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
): string {
  const configured = env.LOG_ROOT?.trim();
  if (!configured) {
    return path.join(homeDir, 'logs');
  }
  if (configured === '~' || configured.startsWith('~/')) {
    return path.join(homeDir, configured.slice(1));
  }
  return path.resolve(configured);
}

function isNotifyChannel(value: string): value is NotifyChannel {
  return NOTIFY_CHANNELS.some(channel => channel === value);
}

function parseChannels(value: string | undefined): NotifyChannel[] {
  const names = parseList(value?.toLowerCase());
  if (names.length === 0) return ['console'];

  const channels: NotifyChannel[] = [];
  for (const name of names) {
    if (!isNotifyChannel(name)) {
      throw new ConfigError(
        `NOTIFY_CHANNELS contains unknown channel "${name}" (expected one of ${NOTIFY_CHANNELS.join(', ')})`,
        'NOTIFY_CHANNELS',
      );
    }
    if (!channels.includes(name)) channels.push(name);
  }
  return channels;
}

/**
 * Re-throw field validation failures as ConfigError so the entry point can
 * tell startup misconfiguration apart from other validation problems.
 */
function field<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof ValidationError && !(error instanceof ConfigError)) {
      throw new ConfigError(error.message, error.field);
    }
    throw error;
  }
}

/**
 * Build and validate the monitor configuration from environment variables.
 * @throws ConfigError naming the offending variable
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
): MonitorConfig {
  const name = field(() => validateMonitorName(env.MONITOR_NAME ?? '', 'MONITOR_NAME'));
  const url = field(() => validateTargetUrl(env.MONITOR_URL ?? '', 'MONITOR_URL'));

  const checkIntervalMs = field(() =>
    parseSecondsToMs(env.CHECK_INTERVAL ?? String(DEFAULT_CHECK_INTERVAL_SECONDS), 'CHECK_INTERVAL'),
  );
  const failureThreshold = field(() =>
    parseIntegerAtLeast(env.FAILURE_THRESHOLD ?? String(DEFAULT_FAILURE_THRESHOLD), 1, 'FAILURE_THRESHOLD'),
  );
  const requestTimeoutMs = field(() =>
    parseSecondsToMs(env.REQUEST_TIMEOUT ?? String(DEFAULT_REQUEST_TIMEOUT_SECONDS), 'REQUEST_TIMEOUT'),
  );

  const channels = parseChannels(env.NOTIFY_CHANNELS);

  const webhookUrl = env.WEBHOOK_URL?.trim()
    ? field(() => validateTargetUrl(env.WEBHOOK_URL ?? '', 'WEBHOOK_URL'))
    : undefined;
  const slackWebhookUrl = env.SLACK_WEBHOOK_URL?.trim()
    ? field(() => validateTargetUrl(env.SLACK_WEBHOOK_URL ?? '', 'SLACK_WEBHOOK_URL'))
    : undefined;

  if (channels.includes('webhook') && !webhookUrl) {
    throw new ConfigError('WEBHOOK_URL is required when the webhook channel is enabled', 'WEBHOOK_URL');
  }
  if (channels.includes('slack') && !slackWebhookUrl) {
    throw new ConfigError('SLACK_WEBHOOK_URL is required when the slack channel is enabled', 'SLACK_WEBHOOK_URL');
  }

  const recipients = parseList(env.ALERT_RECIPIENTS);
  if (channels.includes('mail') && recipients.length === 0) {
    throw new ConfigError('ALERT_RECIPIENTS is required when the mail channel is enabled', 'ALERT_RECIPIENTS');
  }

  return Object.freeze({
    name,
    url,
    recipients: Object.freeze(recipients),
    checkIntervalMs,
    failureThreshold,
    requestTimeoutMs,
    logRoot: resolveLogRoot(env, homeDir),
    channels: Object.freeze(channels),
    webhookUrl,
    slackWebhookUrl,
    mailCommand: env.MAIL_COMMAND?.trim() || 'mail',
  });
}

/**
 * Non-fatal configuration smells worth a startup warning.
 */
export function configWarnings(config: MonitorConfig): string[] {
  const warnings: string[] = [];
  if (config.requestTimeoutMs > config.checkIntervalMs) {
    warnings.push(
      `REQUEST_TIMEOUT (${config.requestTimeoutMs / 1000}s) exceeds CHECK_INTERVAL (${config.checkIntervalMs / 1000}s); a slow target will stretch the check cycle`,
    );
  }
  return warnings;
}
