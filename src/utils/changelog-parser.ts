import type {
  ChangelogEntry,
  IssueSummary,
  JiraChangelogHistory,
  JiraChangelogItem,
  JiraIssue,
  StatusTransition,
} from "../types";
import { parseTimestamp } from "./timestamp";

/**
 * Changelog field name Jira uses for workflow status changes
 */
export const STATUS_FIELD = "status";

/**
 * Reads a string-valued item property that the payload actually carries
 *
 * `toString` would otherwise resolve to Object.prototype.toString when
 * Jira omits it.
 */
function ownString(
  item: JiraChangelogItem,
  key: "fromString" | "toString"
): string | null {
  if (!Object.prototype.hasOwnProperty.call(item, key)) {
    return null;
  }
  const value = item[key];
  return typeof value === "string" ? value : null;
}

/**
 * Converts a raw changelog history entry into a domain changelog entry
 * @throws {InvalidTimestampError} When the entry timestamp cannot be parsed
 */
export function toChangelogEntry(history: JiraChangelogHistory): ChangelogEntry {
  return {
    id: history.id,
    author: history.author?.displayName,
    timestamp: parseTimestamp(history.created),
    fieldChanges: (history.items ?? []).map((item) => ({
      field: item.field,
      fromValue: ownString(item, "fromString"),
      toValue: ownString(item, "toString"),
    })),
  };
}

/**
 * Converts a raw search result issue into an issue summary
 * @throws {InvalidTimestampError} When the creation timestamp cannot be parsed
 */
export function toIssueSummary(issue: JiraIssue): IssueSummary {
  const { key, fields } = issue;

  return {
    key,
    summary: fields.summary,
    currentStatusName: fields.status.name,
    createdAt: parseTimestamp(fields.created),
  };
}

/**
 * Lists status changes in the order given, skipping edits to other fields
 */
export function extractStatusTransitions(
  changelog: readonly ChangelogEntry[]
): StatusTransition[] {
  return changelog.flatMap((entry) =>
    entry.fieldChanges
      .filter((change) => change.field === STATUS_FIELD)
      .map((change) => ({
        entryId: entry.id ?? null,
        timestamp: entry.timestamp,
        fromStatus: change.fromValue,
        toStatus: change.toValue,
        author: entry.author ?? null,
      }))
  );
}
