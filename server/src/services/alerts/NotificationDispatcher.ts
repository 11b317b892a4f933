import type { Logger } from 'pino';
import { ChannelResult, INotifier, Notification } from './types';
import defaultLogger from '../../utils/logger';

/**
 * Fans a notification out to every registered channel.
 *
 * Delivery is fire-and-forget from the monitor's point of view: dispatch()
 * never rejects, it reports a result per channel and logs failures.
 */
export class NotificationDispatcher {
  private senders: Map<string, INotifier> = new Map();
  private readonly recipients: readonly string[];
  private readonly logger: Pick<Logger, 'info' | 'warn' | 'error'>;

  constructor(recipients: readonly string[], logger: Pick<Logger, 'info' | 'warn' | 'error'> = defaultLogger) {
    this.recipients = recipients;
    this.logger = logger;
  }

  /**
   * Register a sender. A later sender for the same channel replaces the earlier one.
   */
  registerSender(sender: INotifier): void {
    this.senders.set(sender.channel, sender);
  }

  get channels(): string[] {
    return [...this.senders.keys()];
  }

  async dispatch(notification: Notification, signal?: AbortSignal): Promise<ChannelResult[]> {
    if (this.senders.size === 0) {
      this.logger.warn({ kind: notification.kind }, 'no notification channels registered');
      return [];
    }

    const tasks = [...this.senders.values()].map(async (sender): Promise<ChannelResult> => {
      try {
        const result = await sender.send(notification, this.recipients, signal);
        if (!result.success) {
          this.logger.warn({ channel: sender.channel, kind: notification.kind, error: result.error }, 'notification delivery failed');
        }
        return { channel: sender.channel, ...result };
      } catch (err) {
        this.logger.error({ err, channel: sender.channel, kind: notification.kind }, 'notification sender threw');
        const message = err instanceof Error ? err.message : String(err);
        return { channel: sender.channel, success: false, error: message };
      }
    });

    const results = await Promise.all(tasks);
    const sent = results.filter(r => r.success).map(r => r.channel);
    if (sent.length > 0) {
      this.logger.info({ kind: notification.kind, channels: sent }, 'notification sent');
    }
    return results;
  }
}
