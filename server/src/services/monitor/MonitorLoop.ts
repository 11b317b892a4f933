import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { MonitorConfig } from '../../config/MonitorConfig';
import { IProbe, ProbeOutcome } from '../probe/types';
import { ChannelResult, Notification } from '../alerts/types';
import { LogStatus } from '../logstore/logFormat';
import { createInitialState, phaseOf, transition } from './AlertPolicy';
import { sleep as defaultSleep } from './sleep';
import {
  CheckCompleteEvent,
  MonitorEventType,
  MonitorPhase,
  MonitorState,
  NotifyFailedEvent,
} from './types';
import defaultLogger from '../../utils/logger';

export interface LogSink {
  append(status: LogStatus, message: string, timestamp?: Date): Promise<string>;
}

export interface NotificationSink {
  dispatch(notification: Notification, signal?: AbortSignal): Promise<ChannelResult[]>;
}

export interface MonitorLoopDeps {
  probe: IProbe;
  store: LogSink;
  dispatcher: NotificationSink;
  logger?: Pick<Logger, 'info' | 'warn' | 'error'>;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  now?: () => Date;
}

type MonitorConfigSubset = Pick<MonitorConfig, 'name' | 'url' | 'checkIntervalMs' | 'failureThreshold' | 'requestTimeoutMs'>;

export const STARTED_MESSAGE_PREFIX = 'Monitoring started for';
export const STOPPED_MESSAGE = 'Monitoring stopped';

/**
 * Drives probe → alert policy → notify → log → sleep for one target until
 * the abort signal fires.
 *
 * The loop is strictly sequential and owns the MonitorState. Log write
 * failures reject run(); notification failures are logged and the loop
 * carries on.
 */
export class MonitorLoop extends EventEmitter {
  private readonly config: MonitorConfigSubset;
  private readonly probe: IProbe;
  private readonly store: LogSink;
  private readonly dispatcher: NotificationSink;
  private readonly logger: Pick<Logger, 'info' | 'warn' | 'error'>;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly now: () => Date;
  private state: MonitorState = createInitialState();
  private running = false;
  private checks = 0;

  constructor(config: MonitorConfigSubset, deps: MonitorLoopDeps) {
    super();
    this.config = config;
    this.probe = deps.probe;
    this.store = deps.store;
    this.dispatcher = deps.dispatcher;
    this.logger = deps.logger ?? defaultLogger;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  getState(): MonitorState {
    return { ...this.state };
  }

  getPhase(): MonitorPhase {
    return phaseOf(this.state, this.config.failureThreshold);
  }

  get checkCount(): number {
    return this.checks;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async run(signal: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error('Monitor loop is already running');
    }
    this.running = true;

    try {
      const { url, name } = this.config;
      await this.store.append('INFO', `${STARTED_MESSAGE_PREFIX} ${url}`, this.now());
      this.logger.info({
        monitor: name,
        url,
        intervalMs: this.config.checkIntervalMs,
        failureThreshold: this.config.failureThreshold,
        timeoutMs: this.config.requestTimeoutMs,
      }, '[STARTUP] monitoring started');
      this.emit(MonitorEventType.STARTED, { monitor: name, url });

      while (!signal.aborted) {
        await this.runCycle(signal);
        if (signal.aborted) break;
        await this.sleep(this.config.checkIntervalMs, signal);
      }

      await this.store.append('INFO', STOPPED_MESSAGE, this.now());
      this.logger.info({ monitor: name, url, checks: this.checks }, '[SHUTDOWN] monitoring stopped');
      this.emit(MonitorEventType.STOPPED, { monitor: name, url, checks: this.checks });
    } finally {
      this.running = false;
    }
  }

  /**
   * One probe/policy/notify/log step. Exposed for tests and one-shot use.
   * Returns null when the probe was cancelled by shutdown.
   */
  async runCycle(signal?: AbortSignal): Promise<CheckCompleteEvent | null> {
    const { url } = this.config;
    const outcome = await this.probe.check(url, this.config.requestTimeoutMs, signal);

    // A probe cut short by shutdown says nothing about the target.
    if (signal?.aborted) {
      return null;
    }

    const { state, notification } = transition(this.state, outcome, {
      monitorName: this.config.name,
      url,
      failureThreshold: this.config.failureThreshold,
    });
    this.state = state;
    this.checks++;

    if (notification) {
      await this.notify(notification, signal);
    }

    await this.recordOutcome(outcome);

    const event: CheckCompleteEvent = { outcome, state: this.getState(), phase: this.getPhase() };
    this.emit(MonitorEventType.CHECK_COMPLETE, event);
    return event;
  }

  private async recordOutcome(outcome: ProbeOutcome): Promise<void> {
    const { url } = this.config;
    if (outcome.kind === 'success') {
      await this.store.append('OK', `${url} is up and running`, outcome.timestamp);
      this.logger.info({ url, statusCode: outcome.statusCode, latencyMs: outcome.latencyMs }, `[OK] ${url} is up and running`);
      return;
    }

    const failures = this.state.consecutiveFailures;
    const detail = outcome.error ? `, ${outcome.error}` : '';
    await this.store.append('FAIL', `${url} IS DOWN! (Failure #${failures}${detail})`, outcome.timestamp);
    this.logger.warn(
      { url, failures, statusCode: outcome.statusCode, error: outcome.error, latencyMs: outcome.latencyMs },
      `[FAIL] ${url} IS DOWN! (Failure #${failures})`,
    );
  }

  /** Shutdown cuts delivery short; whatever did not go out is recorded as failed. */
  private async notify(notification: Notification, signal?: AbortSignal): Promise<void> {
    const isDown = notification.kind === 'DOWN';
    this.emit(isDown ? MonitorEventType.ALERT_DOWN : MonitorEventType.ALERT_RECOVERED, notification);
    this.logger.warn(
      { url: notification.url, count: notification.count },
      isDown
        ? `[ALERT] sending down notification after ${notification.count} consecutive failures`
        : `[RECOVERY] sending recovery notification (was down for ${notification.count} checks)`,
    );

    const results = await this.dispatcher.dispatch(notification, signal);
    const delivered = results.filter(r => r.success).map(r => r.channel);

    if (delivered.length > 0) {
      const summary = isDown
        ? `DOWN notification sent after ${notification.count} consecutive failures`
        : `RECOVERED notification sent after ${notification.count} failed checks`;
      await this.store.append('INFO', `${summary} (${delivered.join(', ')})`, this.now());
    }

    for (const result of results) {
      if (result.success) continue;
      const failed: NotifyFailedEvent = {
        notification,
        channel: result.channel,
        result: { success: false, error: result.error },
      };
      this.emit(MonitorEventType.NOTIFY_FAILED, failed);
      await this.store.append(
        'INFO',
        `${notification.kind} notification via ${result.channel} failed: ${result.error ?? 'unknown error'}`,
        this.now(),
      );
    }
  }
}
