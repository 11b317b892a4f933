import { INotifier, Notification, SendResult } from '../types';

const WEBHOOK_TIMEOUT_MS = 10_000;


interface WebhookPayload {
  event: 'monitor_down' | 'monitor_recovered';
  monitor: string;
  url: string;
  count: number;
  timestamp: string;
  recipients: string[];
}

/**
 * Sends notifications to a generic HTTP webhook endpoint.
 * Delivers a simple JSON payload for integration with arbitrary systems.
 */
export class WebhookSender implements INotifier {
  readonly channel = 'webhook';
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(url: string, timeoutMs = WEBHOOK_TIMEOUT_MS) {
    this.url = url;
    this.timeoutMs = timeoutMs;
  }

  async send(notification: Notification, recipients: readonly string[], signal?: AbortSignal): Promise<SendResult> {
    if (!this.url) {
      return { success: false, error: 'Missing webhook url' };
    }
    if (signal?.aborted) {
      return { success: false, error: 'Webhook request cancelled' };
    }

    const payload = this.buildPayload(notification, recipients);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (response.ok) {
        return { success: true };
      }

      const body = await response.text().catch(() => '');
      return { success: false, error: `Webhook returned ${response.status}: ${body}` };
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'AbortError') {
        if (signal?.aborted) {
          return { success: false, error: 'Webhook request cancelled' };
        }
        return { success: false, error: `Webhook request timed out (${this.timeoutMs}ms)` };
      }
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, error: `Webhook request failed: ${message}` };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private buildPayload(notification: Notification, recipients: readonly string[]): WebhookPayload {
    return {
      event: notification.kind === 'DOWN' ? 'monitor_down' : 'monitor_recovered',
      monitor: notification.monitorName,
      url: notification.url,
      count: notification.count,
      timestamp: notification.timestamp,
      recipients: [...recipients],
    };
  }
}
