import type { Instant, ReportOperation } from "../types";

/**
 * Base class for errors raised while building status reports
 */
export class StatusTimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StatusTimeError";
  }
}

/**
 * Network or HTTP failure while talking to Jira
 */
export class TransportError extends StatusTimeError {
  constructor(
    message: string,
    public readonly operation: ReportOperation,
    public readonly status?: number,
    public readonly issueKey?: string
  ) {
    super(message);
    this.name = "TransportError";
  }
}

/**
 * Time moved backwards between two points of an issue's history
 */
export class InvalidIntervalError extends StatusTimeError {
  constructor(
    public readonly status: string,
    public readonly start: Instant,
    public readonly end: Instant
  ) {
    super(
      `Invalid interval for status "${status}": ${end.raw} is before ${start.raw}`
    );
    this.name = "InvalidIntervalError";
  }
}

/**
 * A status change that cannot be applied
 */
export class MalformedChangelogEntryError extends StatusTimeError {
  constructor(message: string, public readonly timestamp?: Instant) {
    super(message);
    this.name = "MalformedChangelogEntryError";
  }
}

/**
 * A timestamp that is not a zoned ISO 8601 date-time
 */
export class InvalidTimestampError extends StatusTimeError {
  constructor(public readonly value: string) {
    super(
      `Invalid timestamp: "${value}"\n` +
        `Expected format: YYYY-MM-DDTHH:MM:SS.ffffff+HHMM`
    );
    this.name = "InvalidTimestampError";
  }
}

/**
 * Extracts a printable message from an unknown thrown value
 */
export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
