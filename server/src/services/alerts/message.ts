import { Notification } from './types';
import { formatTimestamp } from '../logstore/logFormat';

export interface NotificationMessage {
  subject: string;
  body: string;
}

/** `2026-01-15 10:30:00 UTC` */
export function displayTime(iso: string): string {
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? iso : `${formatTimestamp(date)} UTC`;
}

/**
 * Plain-text subject and body for text channels (mail, console).
 */
export function buildMessage(notification: Notification): NotificationMessage {
  const when = displayTime(notification.timestamp);

  if (notification.kind === 'DOWN') {
    return {
      subject: `[DOWN] ${notification.url} IS DOWN!`,
      body: [
        `Alert! ${notification.url} is not responding.`,
        '',
        `Monitor: ${notification.monitorName}`,
        `Detected at: ${when}`,
        `Consecutive failures: ${notification.count}`,
      ].join('\n'),
    };
  }

  return {
    subject: `[RECOVERED] ${notification.url} is back online`,
    body: [
      `Good news! ${notification.url} is back up and running.`,
      '',
      `Monitor: ${notification.monitorName}`,
      `Recovered at: ${when}`,
      `Total failed checks: ${notification.count}`,
    ].join('\n'),
  };
}
