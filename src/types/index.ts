/**
 * Type definitions for the Jira Status Time tracker
 */

// ============================================
// Jira API Types
// ============================================

/**
 * Raw Jira issue from the search endpoint
 */
export interface JiraIssue {
  key: string;
  fields: {
    summary: string;
    status: { name: string };
    created: string;
  };
}

/**
 * Search endpoint response body
 */
export interface JiraSearchResponse {
  issues: JiraIssue[];
}

/**
 * Single item of a changelog history entry
 */
export interface JiraChangelogItem {
  field: string;
  fromString?: string | null;
  toString?: string | null;
}

/**
 * Raw changelog history entry
 */
export interface JiraChangelogHistory {
  id?: string;
  author?: { displayName: string } | null;
  created: string;
  items: JiraChangelogItem[];
}

/**
 * Changelog endpoint response body
 */
export interface JiraChangelogResponse {
  values: JiraChangelogHistory[];
}

// ============================================
// Domain Types
// ============================================

/**
 * A point in time together with the UTC offset it was recorded in
 */
export interface Instant {
  /** Milliseconds since the Unix epoch; may carry a fractional part */
  epochMs: number;
  /** UTC offset of the source timestamp, in minutes */
  offsetMinutes: number;
  /** Timestamp text as received */
  raw: string;
}

/**
 * One edited field within a changelog entry
 */
export interface FieldChange {
  field: string;
  fromValue: string | null;
  toValue: string | null;
}

/**
 * One changelog event, possibly bundling several field edits
 */
export interface ChangelogEntry {
  id?: string;
  author?: string;
  timestamp: Instant;
  fieldChanges: FieldChange[];
}

/**
 * Issue fields needed for status reporting
 */
export interface IssueSummary {
  key: string;
  summary: string;
  currentStatusName: string;
  createdAt: Instant;
}

/**
 * A contiguous span during which an issue held one status
 */
export interface StatusInterval {
  status: string;
  startTime: Instant;
  endTime: Instant;
  hours: number;
}

/**
 * Hours spent per status, in order of first visit
 */
export type StatusDurations = Map<string, number>;

/**
 * A status change as shown in the issue history
 */
export interface StatusTransition {
  /** Id of the changelog entry the change belongs to */
  entryId: string | null;
  timestamp: Instant;
  fromStatus: string | null;
  toStatus: string | null;
  author: string | null;
}

/**
 * Options for the status duration calculation
 */
export interface StatusDurationOptions {
  /** Status assumed before the first recorded transition */
  initialStatus?: string;
  /** Order entries by timestamp before walking them */
  sortChangelog?: boolean;
}

// ============================================
// Report Types
// ============================================

/**
 * Operations that can fail while building a report
 */
export type ReportOperation =
  | "listIssues"
  | "getChangelog"
  | "computeStatusDurations";

/**
 * Status breakdown for a single issue
 */
export interface IssueStatusReport {
  issue: IssueSummary;
  transitions: StatusTransition[];
  intervals: StatusInterval[];
  durations: StatusDurations;
  totalHours: number;
}

/**
 * An issue that could not be reported on
 */
export interface IssueFailure {
  issueKey: string;
  operation: ReportOperation;
  error: Error;
}

/**
 * Status breakdown for every issue returned by a query
 */
export interface StatusReport {
  projectKey: string | null;
  /** Custom JQL the issues were selected with, if any */
  jql: string | null;
  evaluatedAt: Instant;
  initialStatus: string;
  issues: IssueStatusReport[];
  failures: IssueFailure[];
}

// ============================================
// Result Type
// ============================================

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });
