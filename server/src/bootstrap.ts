import type { Logger } from 'pino';
import { MonitorConfig, NotifyChannel } from './config/MonitorConfig';
import { HttpProbe } from './services/probe/HttpProbe';
import { LogStore } from './services/logstore/LogStore';
import { MonitorLoop, MonitorLoopDeps } from './services/monitor/MonitorLoop';
import {
  ConsoleSender,
  INotifier,
  MailCommandSender,
  NotificationDispatcher,
  SlackSender,
  WebhookSender,
} from './services/alerts';
import { ConfigError } from './utils/errors';
import defaultLogger from './utils/logger';

type AppLogger = Pick<Logger, 'info' | 'warn' | 'error'>;

function createSender(channel: NotifyChannel, config: MonitorConfig, logger: AppLogger): INotifier {
  switch (channel) {
    case 'console':
      return new ConsoleSender(logger);
    case 'webhook':
      if (!config.webhookUrl) {
        throw new ConfigError('WEBHOOK_URL is required when the webhook channel is enabled', 'WEBHOOK_URL');
      }
      return new WebhookSender(config.webhookUrl, config.requestTimeoutMs);
    case 'slack':
      if (!config.slackWebhookUrl) {
        throw new ConfigError('SLACK_WEBHOOK_URL is required when the slack channel is enabled', 'SLACK_WEBHOOK_URL');
      }
      return new SlackSender(config.slackWebhookUrl);
    case 'mail':
      return new MailCommandSender(config.mailCommand);
  }
}

/**
 * Build a dispatcher with one sender per configured channel.
 */
export function createDispatcher(config: MonitorConfig, logger: AppLogger = defaultLogger): NotificationDispatcher {
  const dispatcher = new NotificationDispatcher(config.recipients, logger);
  for (const channel of config.channels) {
    dispatcher.registerSender(createSender(channel, config, logger));
  }
  return dispatcher;
}

export type CreateMonitorOptions = Partial<MonitorLoopDeps>;

/**
 * Wire a MonitorLoop from config. Any dependency can be overridden.
 */
export function createMonitor(config: MonitorConfig, options: CreateMonitorOptions = {}): MonitorLoop {
  const logger = options.logger ?? defaultLogger;
  return new MonitorLoop(config, {
    probe: options.probe ?? new HttpProbe(),
    store: options.store ?? new LogStore(config.logRoot, config.name),
    dispatcher: options.dispatcher ?? createDispatcher(config, logger),
    logger,
    sleep: options.sleep,
    now: options.now,
  });
}
