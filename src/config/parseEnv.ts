/**
 * Environment variable parsing helpers.
 * Raw env values are strings; "false" must not read as truthy.
 */

/**
 * Parse a boolean flag ("true"/"false", "1"/"0", "yes"/"no", any case).
 * Unset, empty or unrecognised values fall back to `defaultValue`.
 */
export function parseBoolEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return defaultValue;
  }
}

/**
 * Parse an integer, clamped to [min, max] when bounds are given.
 * Non-numeric input yields `defaultValue`.
 */
export function parseIntEnv(
  value: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    return defaultValue;
  }

  let result = parsed;
  if (min !== undefined) result = Math.max(min, result);
  if (max !== undefined) result = Math.min(max, result);
  return result;
}

/**
 * Trimmed string value, or `defaultValue` when unset or blank.
 */
export function getEnvString(value: string | undefined, defaultValue: string): string;
export function getEnvString(value: string | undefined, defaultValue?: string): string | undefined;
export function getEnvString(value: string | undefined, defaultValue?: string): string | undefined {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value.trim();
}

/**
 * Case-insensitive match against a fixed set of values.
 */
export function parseEnumEnv<T extends string>(
  value: string | undefined,
  allowedValues: readonly T[],
  defaultValue: T
): T {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  return allowedValues.find(allowed => allowed === normalized) ?? defaultValue;
}
