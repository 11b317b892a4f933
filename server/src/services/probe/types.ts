export type ProbeOutcomeKind = 'success' | 'failure';

/**
 * Result of one availability check. Produced fresh on every probe and
 * consumed immediately by the monitor loop.
 */
export interface ProbeOutcome {
  kind: ProbeOutcomeKind;
  timestamp: Date;
  latencyMs: number;
  statusCode?: number;
  error?: string;
}

export interface IProbe {
  /**
   * Never rejects: transport errors, timeouts and non-2xx responses are
   * all reported as a `failure` outcome.
   */
  check(url: string, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome>;
}
