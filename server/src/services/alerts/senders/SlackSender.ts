import { INotifier, Notification, SendResult } from '../types';
import { displayTime } from '../message';
import logger from '../../../utils/logger';

const SLACK_TIMEOUT_MS = 10_000;

/**
 * Sends notifications to Slack via incoming webhook.
 * Uses Block Kit for rich, scannable message formatting.
 */
export class SlackSender implements INotifier {
  readonly channel = 'slack';
  private readonly webhookUrl: string;

  constructor(webhookUrl: string) {
    this.webhookUrl = webhookUrl;
  }

  async send(notification: Notification, recipients: readonly string[], signal?: AbortSignal): Promise<SendResult> {
    if (!this.webhookUrl) {
      return { success: false, error: 'Missing Slack webhook url' };
    }
    if (signal?.aborted) {
      return { success: false, error: 'Slack webhook request cancelled' };
    }

    const payload = this.buildPayload(notification, recipients);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), SLACK_TIMEOUT_MS);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (response.ok) {
        return { success: true };
      }

      if (response.status === 429) {
        const retryAfter = response.headers.get('Retry-After');
        logger.warn({ retryAfter }, 'slack webhook rate limited');
        return { success: false, error: `Rate limited by Slack (retry after ${retryAfter || 'unknown'}s)` };
      }

      const body = await response.text().catch(() => '');
      return { success: false, error: `Slack webhook returned ${response.status}: ${body}` };
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'AbortError') {
        if (signal?.aborted) {
          return { success: false, error: 'Slack webhook request cancelled' };
        }
        return { success: false, error: 'Slack webhook request timed out (10s)' };
      }
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, error: `Slack webhook request failed: ${message}` };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Build a Slack Block Kit payload. `text` is the fallback used in
   * notifications and by clients without Block Kit support.
   */
  buildPayload(notification: Notification, recipients: readonly string[]): object {
    const isDown = notification.kind === 'DOWN';
    const emoji = isDown ? ':red_circle:' : ':large_green_circle:';
    const title = isDown
      ? `${notification.url} is DOWN`
      : `${notification.url} is back online`;
    const countLabel = isDown ? 'Consecutive failures' : 'Total failed checks';

    const blocks: object[] = [
      {
        type: 'header',
        text: { type: 'plain_text', text: `${emoji} ${notification.monitorName} - ${isDown ? 'Down' : 'Recovered'}`, emoji: true },
      },
      {
        type: 'section',
        fields: [
          { type: 'mrkdwn', text: `*URL:*\n${notification.url}` },
          { type: 'mrkdwn', text: `*${countLabel}:*\n${notification.count}` },
        ],
      },
      {
        type: 'context',
        elements: [
          { type: 'mrkdwn', text: `*Time:* ${displayTime(notification.timestamp)}` },
        ],
      },
    ];

    if (recipients.length > 0) {
      blocks.push({
        type: 'context',
        elements: [{ type: 'mrkdwn', text: `*Notify:* ${recipients.join(', ')}` }],
      });
    }

    return { text: `${emoji} ${title}`, blocks };
  }
}
