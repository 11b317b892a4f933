import { ProbeOutcome } from '../probe/types';
import { Notification } from '../alerts/types';
import { MonitorPhase, MonitorState, PolicyContext, TransitionResult } from './types';

export function createInitialState(): MonitorState {
  return { consecutiveFailures: 0, alertSent: false };
}

export function phaseOf(state: MonitorState, failureThreshold: number): MonitorPhase {
  if (state.alertSent && state.consecutiveFailures >= failureThreshold) return 'down-notified';
  if (state.consecutiveFailures > 0) return 'degrading';
  return 'healthy';
}

/**
 * Apply one probe outcome to the monitor state.
 *
 *   healthy       --failure (count < threshold)--> degrading
 *   degrading     --failure (count == threshold)--> down-notified   emits DOWN
 *   down-notified --failure--> down-notified                        no repeat
 *   any           --success--> healthy                emits RECOVERED if alerted
 *
 * DOWN fires only on the exact boundary crossing, so an episode produces at
 * most one DOWN and at most one RECOVERED.
 */
export function transition(
  state: MonitorState,
  outcome: ProbeOutcome,
  context: PolicyContext,
): TransitionResult {
  const timestamp = outcome.timestamp.toISOString();

  if (outcome.kind === 'success') {
    const notification: Notification | null = state.alertSent
      ? {
        kind: 'RECOVERED',
        monitorName: context.monitorName,
        url: context.url,
        timestamp,
        count: state.consecutiveFailures,
      }
      : null;

    return { state: createInitialState(), notification };
  }

  const consecutiveFailures = state.consecutiveFailures + 1;

  if (consecutiveFailures === context.failureThreshold && !state.alertSent) {
    return {
      state: { consecutiveFailures, alertSent: true },
      notification: {
        kind: 'DOWN',
        monitorName: context.monitorName,
        url: context.url,
        timestamp,
        count: consecutiveFailures,
      },
    };
  }

  return {
    state: { consecutiveFailures, alertSent: state.alertSent },
    notification: null,
  };
}
