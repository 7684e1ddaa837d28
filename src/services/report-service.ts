import type { JiraService } from "./jira-service";
import {
  StatusDurationService,
  aggregateIntervals,
  sumDurationHours,
} from "./status-duration-service";
import {
  ChangelogEntry,
  Instant,
  IssueFailure,
  IssueStatusReport,
  IssueSummary,
  Result,
  StatusReport,
  ok,
} from "../types";
import { extractStatusTransitions } from "../utils/changelog-parser";
import { StatusTimeError, TransportError } from "../utils/errors";

/**
 * Parts of the Jira service the report needs
 */
export type IssueHistorySource = Pick<JiraService, "listIssues" | "getChangelog">;

/**
 * Parameters for generating a status report
 */
export interface GenerateReportParams {
  /** Project to report on */
  projectKey: string | null;
  /** Optional JQL replacing the default project query */
  jql?: string | null;
  /** Instant that closes every issue's current status interval */
  now: Instant;
  /** Called before each issue's changelog is fetched */
  onIssue?: (issue: IssueSummary, index: number, total: number) => void;
}

/**
 * Service responsible for orchestrating status report generation
 * Coordinates between the Jira and status duration services
 */
export class ReportService {
  constructor(
    private readonly jiraService: IssueHistorySource,
    private readonly statusDurationService: StatusDurationService
  ) {}

  /**
   * Fetches issues and computes time spent per status for each of them
   *
   * Issues are processed one at a time. A changelog fetch or calculation
   * failure is recorded for that issue and the remaining issues continue.
   *
   * @returns The report, or the failure of the issue search itself
   */
  async generateReport(
    params: GenerateReportParams
  ): Promise<Result<StatusReport, TransportError>> {
    const { projectKey, jql = null, now, onIssue } = params;

    const issuesResult = await this.jiraService.listIssues(projectKey, jql);
    if (!issuesResult.ok) {
      return issuesResult;
    }

    const issues: IssueStatusReport[] = [];
    const failures: IssueFailure[] = [];

    const found = issuesResult.value;
    for (const [index, issue] of found.entries()) {
      onIssue?.(issue, index, found.length);

      const changelogResult = await this.jiraService.getChangelog(issue.key);
      if (!changelogResult.ok) {
        failures.push({
          issueKey: issue.key,
          operation: "getChangelog",
          error: changelogResult.error,
        });
        continue;
      }

      try {
        issues.push(this.buildIssueReport(issue, changelogResult.value, now));
      } catch (error) {
        if (!(error instanceof StatusTimeError)) {
          throw error;
        }
        failures.push({
          issueKey: issue.key,
          operation: "computeStatusDurations",
          error,
        });
      }
    }

    return ok({
      projectKey,
      jql,
      evaluatedAt: now,
      initialStatus: this.statusDurationService.initialStatus,
      issues,
      failures,
    });
  }

  /**
   * Builds the status breakdown for a single issue
   * @throws {InvalidIntervalError} When the history runs backwards in time
   * @throws {MalformedChangelogEntryError} When a status change has no target status
   */
  buildIssueReport(
    issue: IssueSummary,
    changelog: ChangelogEntry[],
    now: Instant
  ): IssueStatusReport {
    const intervals = this.statusDurationService.buildIntervals(
      changelog,
      issue.createdAt,
      now
    );
    const durations = aggregateIntervals(intervals);

    return {
      issue,
      transitions: extractStatusTransitions(
        this.statusDurationService.orderChangelog(changelog)
      ),
      intervals,
      durations,
      totalHours: sumDurationHours(durations),
    };
  }
}
