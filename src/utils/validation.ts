/**
 * Validation utilities for configuration and inputs
 */

/**
 * Validates Jira project key format (e.g. "TEST", "PY2")
 */
export function isValidProjectKey(key: string): boolean {
  return /^[A-Z][A-Z0-9_]+$/.test(key.trim());
}

/**
 * Validates Jira URL format
 */
export function isValidJiraUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (
      (parsed.protocol === "http:" || parsed.protocol === "https:") &&
      parsed.hostname.length > 0
    );
  } catch {
    return false;
  }
}

/**
 * Validates that a string is not empty after trimming
 */
export function isNonEmptyString(value: string): boolean {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Validates required environment variable
 */
export function validateRequired(
  name: string,
  value: string | undefined
): string {
  if (!value || !isNonEmptyString(value)) {
    throw new Error(
      `Missing required environment variable: ${name}\n` +
        `Please add this to your .env file. See .env.example for reference.`
    );
  }
  return value;
}

/**
 * Gets optional environment variable with default value
 */
export function getOptional(
  value: string | undefined,
  defaultValue: string
): string {
  return value && isNonEmptyString(value) ? value : defaultValue;
}

/**
 * Trims an optional input, treating a blank value as absent
 */
export function normalizeOptional(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Parses a positive integer setting, naming the setting in the error
 */
export function parsePositiveInt(
  name: string,
  value: string,
  defaultValue: number
): number {
  const parsed = Number(value);

  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(
      `Invalid ${name}: ${value}\n` +
        `Expected a positive integer (default: ${defaultValue})`
    );
  }

  return parsed;
}

/**
 * Parses a boolean setting ("true"/"false", "1"/"0", "yes"/"no")
 */
export function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();

  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }

  throw new Error(
    `Invalid ${name}: ${value}\n` + `Expected "true" or "false"`
  );
}
