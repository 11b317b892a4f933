/**
 * Base application error class.
 * `exitCode` is what a CLI entry point should exit with when the error
 * reaches the top level.
 */
export class AppError extends Error {
  public readonly exitCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, exitCode = 1, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid input (monitor name, CLI argument, ...)
 */
export class ValidationError extends AppError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 1);
    this.field = field;
  }
}

/**
 * Invalid configuration detected at startup
 */
export class ConfigError extends ValidationError {}

/**
 * Resource not found (e.g. a monitor with no log directory)
 */
export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string, detail?: string) {
    super(detail ? `${resource} not found: ${detail}` : `${resource} not found`, 1);
    this.resource = resource;
  }
}

/**
 * A log line could not be persisted. Fatal for the monitor loop.
 */
export class LogWriteError extends AppError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write log file ${path}: ${errorMessage(cause)}`, 2, false);
    this.path = path;
    this.cause = cause;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Get the process exit code for an error
 */
export function getExitCode(error: unknown): number {
  if (error instanceof AppError) {
    return error.exitCode;
  }
  return 1;
}

/**
 * Known fetch/network error patterns mapped to short descriptions.
 */
const PROBE_ERROR_MAP: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /ECONNREFUSED/i, replacement: 'Connection refused' },
  { pattern: /ECONNRESET/i, replacement: 'Connection reset' },
  { pattern: /ETIMEDOUT/i, replacement: 'Connection timed out' },
  { pattern: /ENOTFOUND|EAI_AGAIN/i, replacement: 'DNS lookup failed' },
  { pattern: /EHOSTUNREACH/i, replacement: 'Host unreachable' },
  { pattern: /ENETUNREACH/i, replacement: 'Network unreachable' },
  { pattern: /ECONNABORTED/i, replacement: 'Connection aborted' },
  { pattern: /EPIPE/i, replacement: 'Connection broken' },
  { pattern: /certificate|self[- ]signed|CERT_/i, replacement: 'TLS certificate error' },
];

/**
 * Describe a failed probe request in one short line.
 * Node's fetch wraps socket errors as `TypeError: fetch failed` with the
 * system error in `cause`, so the cause chain is searched as well.
 */
export function describeProbeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  for (let depth = 0; current !== undefined && current !== null && depth < 4; depth++) {
    if (current instanceof Error) {
      const code = 'code' in current && typeof current.code === 'string' ? current.code : undefined;
      parts.push(code ? `${code} ${current.message}` : current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }
  const combined = parts.join(' | ');

  for (const { pattern, replacement } of PROBE_ERROR_MAP) {
    if (pattern.test(combined)) {
      return replacement;
    }
  }

  const first = parts[0] ?? 'Unknown error';
  return first.length > 200 ? first.substring(0, 200) + '...' : first;
}
