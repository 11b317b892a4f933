import { IProbe, ProbeOutcome } from './types';
import { describeProbeError } from '../../utils/errors';

const DEFAULT_USER_AGENT = 'downornot-monitor/1.0';

export interface HttpProbeOptions {
  userAgent?: string;
  now?: () => Date;
}

/**
 * Single GET request against the target, following redirects.
 * The request is aborted at the deadline rather than left running.
 */
export class HttpProbe implements IProbe {
  private readonly userAgent: string;
  private readonly now: () => Date;

  constructor(options: HttpProbeOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.now = options.now ?? (() => new Date());
  }

  async check(url: string, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome> {
    const startTime = Date.now();
    const controller = new AbortController();
    let timedOut = false;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const onCancel = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onCancel, { once: true });
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        redirect: 'follow',
        headers: { 'User-Agent': this.userAgent },
        signal: controller.signal,
      });

      // Body is not needed; release the connection.
      await response.body?.cancel().catch(() => undefined);

      const success = response.status >= 200 && response.status < 300;
      return {
        kind: success ? 'success' : 'failure',
        timestamp: this.now(),
        latencyMs: Date.now() - startTime,
        statusCode: response.status,
        ...(success ? {} : { error: `HTTP ${response.status}` }),
      };
    } catch (err: unknown) {
      let error: string;
      if (timedOut) {
        error = `Timed out after ${timeoutMs}ms`;
      } else if (signal?.aborted) {
        error = 'Check cancelled';
      } else {
        error = describeProbeError(err);
      }

      return {
        kind: 'failure',
        timestamp: this.now(),
        latencyMs: Date.now() - startTime,
        error,
      };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCancel);
    }
  }
}
