import { ProbeOutcome } from '../probe/types';
import { Notification, SendResult } from '../alerts/types';

/**
 * Failure/alert bookkeeping for one monitored target.
 * Owned by the MonitorLoop; replaced, never mutated, by the alert policy.
 */
export interface MonitorState {
  readonly consecutiveFailures: number;
  readonly alertSent: boolean;
}

export type MonitorPhase = 'healthy' | 'degrading' | 'down-notified';

export interface TransitionResult {
  state: MonitorState;
  notification: Notification | null;
}

export interface PolicyContext {
  monitorName: string;
  url: string;
  failureThreshold: number;
}

export enum MonitorEventType {
  STARTED = 'monitor:started',
  CHECK_COMPLETE = 'check:complete',
  ALERT_DOWN = 'alert:down',
  ALERT_RECOVERED = 'alert:recovered',
  NOTIFY_FAILED = 'notify:failed',
  STOPPED = 'monitor:stopped',
}

export interface CheckCompleteEvent {
  outcome: ProbeOutcome;
  state: MonitorState;
  phase: MonitorPhase;
}

export interface NotifyFailedEvent {
  notification: Notification;
  channel: string;
  result: SendResult;
}
