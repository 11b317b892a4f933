import { ValidationError } from './errors';

// ============================================================================
// URL Validation
// ============================================================================

/**
 * Check if a string is a valid absolute HTTP or HTTPS URL
 */
export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * @throws ValidationError if the value is not an absolute http(s) URL
 */
export function validateTargetUrl(urlString: string, field: string): string {
  const trimmed = urlString.trim();
  if (!trimmed) {
    throw new ValidationError(`${field} is required`, field);
  }
  if (!isValidUrl(trimmed)) {
    throw new ValidationError(`${field} must be a valid HTTP or HTTPS URL`, field);
  }
  return trimmed;
}

// ============================================================================
// Monitor Names
// ============================================================================

/** Monitor names become directory names under the log root. */
export const MONITOR_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export const MAX_MONITOR_NAME_LENGTH = 100;

export function isValidMonitorName(name: string): boolean {
  return name.length <= MAX_MONITOR_NAME_LENGTH && MONITOR_NAME_PATTERN.test(name);
}

/**
 * @throws ValidationError if the name is empty or has characters outside [A-Za-z0-9_-]
 */
export function validateMonitorName(name: string, field = 'name'): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError('Monitor name cannot be empty', field);
  }
  if (!isValidMonitorName(trimmed)) {
    throw new ValidationError(
      'Invalid monitor name. Use only letters, numbers, underscores, and hyphens',
      field,
    );
  }
  return trimmed;
}

// ============================================================================
// Numbers
// ============================================================================

/** Largest delay setTimeout honours; longer ones fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Parse a positive number of seconds (fractions allowed) into milliseconds.
 * The result must be usable as a timer delay: 1ms to MAX_TIMER_MS.
 */
export function parseSecondsToMs(value: string, field: string): number {
  const seconds = Number(value.trim());
  if (!value.trim() || !Number.isFinite(seconds) || seconds <= 0) {
    throw new ValidationError(`${field} must be a positive number of seconds`, field);
  }
  const ms = Math.round(seconds * 1000);
  if (ms < 1 || ms > MAX_TIMER_MS) {
    throw new ValidationError(`${field} must be between 0.001 and ${MAX_TIMER_MS / 1000} seconds`, field);
  }
  return ms;
}

/**
 * Parse an integer that must be at least `min`.
 */
export function parseIntegerAtLeast(value: string, min: number, field: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(`${field} must be an integer >= ${min}`, field);
  }
  const parsed = parseInt(trimmed, 10);
  if (parsed < min) {
    throw new ValidationError(`${field} must be an integer >= ${min}`, field);
  }
  return parsed;
}

/**
 * Split a comma-separated list, dropping blanks.
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}
