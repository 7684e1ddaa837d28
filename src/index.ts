#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import dotenv from "dotenv";
import { validateConfig } from "./config/config";
import { JiraService } from "./services/jira-service";
import { StatusDurationService } from "./services/status-duration-service";
import { ReportService } from "./services/report-service";
import { instantFromDate, parseTimestamp } from "./utils/timestamp";
import {
  isValidProjectKey,
  normalizeOptional,
  parsePositiveInt,
} from "./utils/validation";
import {
  displayError,
  displayInfo,
  displayStatusReport,
  toJsonReport,
} from "./utils/display-utils";

// Load environment variables
dotenv.config();

/**
 * Options accepted on the command line
 */
interface CliOptions {
  project?: string;
  jql?: string;
  maxResults?: string;
  initialStatus?: string;
  at?: string;
  sort: boolean;
  json?: boolean;
}

/**
 * Main CLI program
 */
const program = new Command();

program
  .name("jira-status-time")
  .description("Report how long Jira issues spent in each workflow status")
  .version("1.0.0")
  .option("-p, --project <key>", "Project key to report on (defaults to JIRA_PROJECT_KEY)")
  .option("-q, --jql <query>", "Custom JQL query instead of the project filter")
  .option("-m, --max-results <n>", "Number of issues to fetch (one page)")
  .option(
    "-i, --initial-status <name>",
    "Status assumed before the first transition (defaults to INITIAL_STATUS)"
  )
  .option(
    "--at <timestamp>",
    "Evaluate open statuses at this time instead of now (e.g. 2024-01-02T00:00:00.000+0000)"
  )
  .option("--no-sort", "Process changelog entries in API order")
  .option("--json", "Print the report as JSON")
  .action(async (options: CliOptions) => {
    try {
      // Validate configuration before starting
      const config = validateConfig();

      const projectOption = normalizeOptional(options.project);
      const projectKey = projectOption ?? config.jira.projectKey;
      const jql = normalizeOptional(options.jql) ?? config.jira.jql;

      if (!projectKey && !jql) {
        displayError("A project key or JQL query is required");
        console.log(
          chalk.gray("Usage: jira-status-time --project TEST (or set JIRA_PROJECT_KEY)")
        );
        process.exit(1);
      }

      if (projectOption && !isValidProjectKey(projectOption)) {
        throw new Error(`Invalid project key: ${projectOption}`);
      }

      const maxResults = options.maxResults
        ? parsePositiveInt("--max-results", options.maxResults, config.jira.maxResults)
        : config.jira.maxResults;

      const now = options.at
        ? parseTimestamp(options.at)
        : instantFromDate(new Date());

      // Initialize all services with dependency injection
      const jiraService = new JiraService({ ...config.jira, maxResults });
      const statusDurationService = new StatusDurationService({
        initialStatus: options.initialStatus?.trim() || config.app.initialStatus,
        sortChangelog: options.sort && config.app.sortChangelog,
      });
      const reportService = new ReportService(jiraService, statusDurationService);

      if (!options.json) {
        console.log(chalk.blue("🚀 Calculating time in status..."));
        if (!options.sort) {
          displayInfo("Changelog entries are processed in API order");
        }
      }

      // ora writes to stderr, so JSON output on stdout stays clean
      const spinner = ora("Fetching Jira issues...").start();
      const result = await reportService.generateReport({
        projectKey,
        jql,
        now,
        onIssue: (issue, index, total) => {
          spinner.text = `Fetching history for ${issue.key} (${index + 1}/${total})...`;
        },
      });

      if (!result.ok) {
        spinner.fail("Failed to fetch Jira issues");
        displayError(result.error.message, result.error);
        process.exit(1);
      }

      const report = result.value;
      if (report.failures.length > 0) {
        spinner.warn(
          `Processed ${report.issues.length + report.failures.length} issues, ${report.failures.length} failed`
        );
      } else {
        spinner.succeed(`Processed ${report.issues.length} issues`);
      }

      if (options.json) {
        console.log(JSON.stringify(toJsonReport(report), null, 2));
      } else {
        displayStatusReport(report);
      }
    } catch (error) {
      console.error(
        chalk.red("\n❌ Error:"),
        error instanceof Error ? error.message : "Unknown error"
      );
      process.exit(1);
    }
  });

// Parse command line arguments
program.parseAsync(process.argv).catch((error: unknown) => {
  displayError(error instanceof Error ? error.message : "Unknown error");
  process.exit(1);
});
