export type NotificationKind = 'DOWN' | 'RECOVERED';

/**
 * Structured alert produced by the alert policy.
 * For DOWN, `count` is the consecutive failure count at the threshold
 * crossing. For RECOVERED, it is the number of failed checks in the episode.
 */
export interface Notification {
  kind: NotificationKind;
  monitorName: string;
  url: string;
  timestamp: string;
  count: number;
}

/**
 * Result of sending a notification through one channel.
 */
export interface SendResult {
  success: boolean;
  error?: string;
}

/**
 * A delivery channel (console, webhook, Slack, mail, ...).
 * Implementations resolve with a failed SendResult rather than rejecting,
 * and give up promptly once `signal` aborts.
 */
export interface INotifier {
  readonly channel: string;
  send(notification: Notification, recipients: readonly string[], signal?: AbortSignal): Promise<SendResult>;
}

export interface ChannelResult extends SendResult {
  channel: string;
}
