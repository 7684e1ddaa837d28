import type {
  ChangelogEntry,
  Instant,
  StatusDurationOptions,
  StatusDurations,
  StatusInterval,
} from "../types";
import { STATUS_FIELD } from "../utils/changelog-parser";
import {
  InvalidIntervalError,
  MalformedChangelogEntryError,
} from "../utils/errors";
import { compareInstants, hoursBetween } from "../utils/timestamp";

/**
 * Status an issue holds before its first recorded transition
 */
export const DEFAULT_INITIAL_STATUS = "To Do";

/**
 * Orders changelog entries by timestamp when sorting is on
 *
 * The sort is stable and never mutates the input.
 */
export function orderChangelog(
  changelog: readonly ChangelogEntry[],
  sortChangelog = true
): readonly ChangelogEntry[] {
  return sortChangelog
    ? [...changelog].sort((a, b) => compareInstants(a.timestamp, b.timestamp))
    : changelog;
}

/**
 * Builds a closed interval, rejecting spans where time runs backwards
 */
function closeInterval(
  status: string,
  startTime: Instant,
  endTime: Instant
): StatusInterval {
  const hours = hoursBetween(startTime, endTime);
  if (hours < 0) {
    throw new InvalidIntervalError(status, startTime, endTime);
  }
  return { status, startTime, endTime, hours };
}

/**
 * Reconstructs the status timeline of an issue from its changelog
 *
 * The walk starts in `initialStatus` at `createdAt`; every status change
 * closes the running interval and opens one in the change's target status.
 * The last interval stays open until `now`. The recorded "from" status of
 * a change is not consulted: the running status is authoritative.
 *
 * @param changelog - Changelog entries of a single issue
 * @param createdAt - Issue creation instant
 * @param now - Evaluation instant that closes the final interval
 * @returns Contiguous intervals covering createdAt..now
 * @throws {InvalidIntervalError} When an interval would have negative length
 * @throws {MalformedChangelogEntryError} When a status change has no target status
 */
export function buildStatusIntervals(
  changelog: readonly ChangelogEntry[],
  createdAt: Instant,
  now: Instant,
  options: StatusDurationOptions = {}
): StatusInterval[] {
  const { initialStatus = DEFAULT_INITIAL_STATUS, sortChangelog = true } =
    options;

  const entries = orderChangelog(changelog, sortChangelog);

  const intervals: StatusInterval[] = [];
  let currentStatus = initialStatus;
  let currentStart = createdAt;

  for (const entry of entries) {
    for (const change of entry.fieldChanges) {
      if (change.field !== STATUS_FIELD) {
        continue;
      }

      intervals.push(closeInterval(currentStatus, currentStart, entry.timestamp));

      const nextStatus = change.toValue?.trim();
      if (!nextStatus) {
        throw new MalformedChangelogEntryError(
          `Status change at ${entry.timestamp.raw} has no target status`,
          entry.timestamp
        );
      }

      currentStatus = nextStatus;
      currentStart = entry.timestamp;
    }
  }

  intervals.push(closeInterval(currentStatus, currentStart, now));

  return intervals;
}

/**
 * Sums interval lengths per status, in order of first visit
 */
export function aggregateIntervals(
  intervals: readonly StatusInterval[]
): StatusDurations {
  const durations: StatusDurations = new Map();

  for (const { status, hours } of intervals) {
    durations.set(status, (durations.get(status) ?? 0) + hours);
  }

  return durations;
}

/**
 * Computes the hours an issue spent in each status between creation and `now`
 *
 * @example
 * ```
 * computeStatusDurations(
 *   [{ timestamp: parseTimestamp("2024-01-01T10:00:00.000+0000"),
 *      fieldChanges: [{ field: "status", fromValue: "To Do", toValue: "In Progress" }] }],
 *   parseTimestamp("2024-01-01T00:00:00.000+0000"),
 *   parseTimestamp("2024-01-02T00:00:00.000+0000")
 * );
 * // Map { "To Do" => 10, "In Progress" => 14 }
 * ```
 */
export function computeStatusDurations(
  changelog: readonly ChangelogEntry[],
  createdAt: Instant,
  now: Instant,
  options: StatusDurationOptions = {}
): StatusDurations {
  return aggregateIntervals(
    buildStatusIntervals(changelog, createdAt, now, options)
  );
}

/**
 * Total hours across all statuses
 */
export function sumDurationHours(durations: StatusDurations): number {
  let total = 0;
  for (const hours of durations.values()) {
    total += hours;
  }
  return total;
}

/**
 * Service wrapper that applies configured calculation options
 */
export class StatusDurationService {
  constructor(private readonly options: StatusDurationOptions = {}) {}

  get initialStatus(): string {
    return this.options.initialStatus ?? DEFAULT_INITIAL_STATUS;
  }

  /**
   * Orders entries the same way the calculation walks them
   */
  orderChangelog(changelog: readonly ChangelogEntry[]): readonly ChangelogEntry[] {
    return orderChangelog(changelog, this.options.sortChangelog ?? true);
  }

  /**
   * Builds the status timeline for one issue
   */
  buildIntervals(
    changelog: readonly ChangelogEntry[],
    createdAt: Instant,
    now: Instant
  ): StatusInterval[] {
    return buildStatusIntervals(changelog, createdAt, now, this.options);
  }

  /**
   * Computes per-status hours for one issue
   */
  computeStatusDurations(
    changelog: readonly ChangelogEntry[],
    createdAt: Instant,
    now: Instant
  ): StatusDurations {
    return computeStatusDurations(changelog, createdAt, now, this.options);
  }
}
