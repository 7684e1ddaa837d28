import chalk from "chalk";
import type {
  IssueFailure,
  IssueStatusReport,
  StatusDurations,
  StatusReport,
} from "../types";

/**
 * Formats an hour count the way reports print it (e.g. "10.00 hours")
 */
export function formatHours(hours: number): string {
  return `${hours.toFixed(2)} hours`;
}

/**
 * Builds the status history lines for an issue, oldest first
 *
 * The first line records the implicit initial status at creation.
 */
export function formatStatusHistory(
  report: IssueStatusReport,
  initialStatus: string
): string[] {
  const lines = [`${report.issue.createdAt.raw}: None → ${initialStatus}`];

  report.transitions.forEach((transition) => {
    const from = transition.fromStatus ?? "Unknown";
    const to = transition.toStatus ?? "Unknown";
    lines.push(`${transition.timestamp.raw}: ${from} → ${to}`);
  });

  return lines;
}

/**
 * Builds one "status: hours" line per visited status
 */
export function formatDurations(durations: StatusDurations): string[] {
  return [...durations].map(
    ([status, hours]) => `${status}: ${formatHours(hours)}`
  );
}

/**
 * Converts a report into plain JSON-serializable data
 */
export function toJsonReport(report: StatusReport): Record<string, unknown> {
  return {
    projectKey: report.projectKey,
    jql: report.jql,
    evaluatedAt: report.evaluatedAt.raw,
    initialStatus: report.initialStatus,
    issues: report.issues.map((issueReport) => ({
      key: issueReport.issue.key,
      summary: issueReport.issue.summary,
      currentStatus: issueReport.issue.currentStatusName,
      created: issueReport.issue.createdAt.raw,
      totalHours: issueReport.totalHours,
      durations: Object.fromEntries(issueReport.durations),
      transitions: issueReport.transitions.map((transition) => ({
        id: transition.entryId,
        timestamp: transition.timestamp.raw,
        from: transition.fromStatus,
        to: transition.toStatus,
        author: transition.author,
      })),
      intervals: issueReport.intervals.map((interval) => ({
        status: interval.status,
        start: interval.startTime.raw,
        end: interval.endTime.raw,
        hours: interval.hours,
      })),
    })),
    failures: report.failures.map((failure) => ({
      issueKey: failure.issueKey,
      operation: failure.operation,
      error: failure.error.name,
      message: failure.error.message,
    })),
  };
}

/**
 * Displays the full status report in a formatted, readable way
 */
export function displayStatusReport(report: StatusReport): void {
  if (report.issues.length === 0 && report.failures.length === 0) {
    displayWarning("No issues found.");
    return;
  }

  console.log("\n" + chalk.bold.blue("📊 Time in Status") + "\n");
  console.log(chalk.gray(`Evaluated at ${report.evaluatedAt.raw}`));

  report.issues.forEach((issueReport) =>
    displayIssueReport(issueReport, report.initialStatus)
  );

  displayFailures(report.failures);

  // Display summary statistics
  console.log("\n" + chalk.bold("📈 Summary Statistics:"));
  console.log(`  ${chalk.green("Reported:")} ${report.issues.length}`);
  console.log(`  ${chalk.red("Failed:")} ${report.failures.length}`);
}

/**
 * Displays one issue with its status history and time per status
 */
function displayIssueReport(
  report: IssueStatusReport,
  initialStatus: string
): void {
  const { key, summary, createdAt, currentStatusName } = report.issue;

  console.log(
    `\n${chalk.cyan("•")} ${chalk.bold(key)}: ${summary} ` +
      chalk.gray(`(Created: ${createdAt.raw}, Current Status: ${currentStatusName})`)
  );

  console.log(chalk.bold("  Status Change History:"));
  formatStatusHistory(report, initialStatus).forEach((line) =>
    console.log(`    - ${line}`)
  );

  console.log(chalk.bold("  Time Spent in Each Status:"));
  formatDurations(report.durations).forEach((line) =>
    console.log(`    - ${chalk.white(line)}`)
  );
}

/**
 * Displays issues that could not be reported on
 */
function displayFailures(failures: IssueFailure[]): void {
  if (failures.length === 0) {
    return;
  }

  console.log("\n" + chalk.bold.red("⚠️  Issues not reported"));
  failures.forEach((failure) => {
    console.log(
      `  ${chalk.red("•")} ${chalk.bold(failure.issueKey)} ` +
        chalk.gray(`[${failure.operation}]`) +
        ` ${failure.error.message}`
    );
  });
}

/**
 * Displays error messages in a consistent format
 */
export function displayError(message: string, error?: Error): void {
  console.error(chalk.red("❌ Error:"), message);
  if (error && process.env.NODE_ENV === "development") {
    console.error(chalk.gray(error.stack));
  }
}

/**
 * Displays warning messages in a consistent format
 */
export function displayWarning(message: string): void {
  console.log(chalk.yellow("⚠️"), message);
}

/**
 * Displays info messages in a consistent format
 */
export function displayInfo(message: string): void {
  console.log(chalk.blue("ℹ️"), message);
}
