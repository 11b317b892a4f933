import type { Logger } from 'pino';
import { INotifier, Notification, SendResult } from '../types';
import { buildMessage } from '../message';
import defaultLogger from '../../../utils/logger';

/**
 * Writes notifications to the process log only. Default channel when no
 * external delivery is configured.
 */
export class ConsoleSender implements INotifier {
  readonly channel = 'console';
  private readonly logger: Pick<Logger, 'warn' | 'info'>;

  constructor(logger: Pick<Logger, 'warn' | 'info'> = defaultLogger) {
    this.logger = logger;
  }

  async send(notification: Notification, recipients: readonly string[]): Promise<SendResult> {
    const { subject, body } = buildMessage(notification);
    const fields = { monitor: notification.monitorName, recipients, body };

    if (notification.kind === 'DOWN') {
      this.logger.warn(fields, subject);
    } else {
      this.logger.info(fields, subject);
    }
    return { success: true };
  }
}
