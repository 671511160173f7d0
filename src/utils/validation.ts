// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if a value is a non-empty string
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

/**
 * Check if a value is a string (can be empty)
 */
export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Check if a value is a finite number
 */
export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isInteger(value: unknown): value is number {
  return isNumber(value) && Number.isInteger(value);
}

/**
 * Check if a value is a boolean
 */
export function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

/**
 * Check if a value is a plain (non-array) object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Receiver Address Validation
// ============================================================================

const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const DIGITS_REGEX = /^\d+$/;

/**
 * Check if a string is an absolute HTTP or HTTPS URL
 */
export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function isEmailAddress(value: string): boolean {
  return EMAIL_REGEX.test(value);
}

export function isDigits(value: string): boolean {
  return DIGITS_REGEX.test(value);
}

// ============================================================================
// Durations
// ============================================================================

const ISO_DURATION_REGEX = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/;

const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Parse the day/time subset of ISO-8601 durations (`PT5M`, `PT1H30M`, `P1D`).
 * Returns milliseconds, or null for anything else (including zero-length
 * forms such as `P` or `PT`).
 */
export function parseIsoDuration(value: string): number | null {
  const match = ISO_DURATION_REGEX.exec(value.trim().toUpperCase());
  if (!match) return null;

  const [, days, hours, minutes, seconds] = match;
  if (days === undefined && hours === undefined && minutes === undefined && seconds === undefined) {
    return null;
  }

  const ms =
    Number(days ?? 0) * DAY_MS +
    Number(hours ?? 0) * HOUR_MS +
    Number(minutes ?? 0) * MINUTE_MS +
    Number(seconds ?? 0) * SECOND_MS;

  return ms > 0 ? ms : null;
}

export const MIN_EVALUATION_FREQUENCY_MS = MINUTE_MS;
export const MAX_EVALUATION_FREQUENCY_MS = HOUR_MS;
