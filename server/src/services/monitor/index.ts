export { MonitorLoop, STARTED_MESSAGE_PREFIX, STOPPED_MESSAGE } from './MonitorLoop';
export type { LogSink, NotificationSink, MonitorLoopDeps } from './MonitorLoop';
export { createInitialState, phaseOf, transition } from './AlertPolicy';
export { sleep } from './sleep';
export { MonitorEventType } from './types';
export type {
  MonitorState,
  MonitorPhase,
  TransitionResult,
  PolicyContext,
  CheckCompleteEvent,
  NotifyFailedEvent,
} from './types';
