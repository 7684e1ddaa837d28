import {
  validateRequired,
  isValidJiraUrl,
  isValidProjectKey,
  getOptional,
  parsePositiveInt,
} from "../utils/validation";

/**
 * Jira API configuration
 */
export interface JiraConfig {
  url: string;
  username: string;
  token: string;
  /** Project whose issues are reported (may be overridden on the command line) */
  projectKey: string | null;
  /** Custom JQL replacing the default project query */
  jql: string | null;
  maxResults: number;
  /** Request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Retrieves and validates Jira configuration from environment variables
 */
export function getJiraConfig(env: NodeJS.ProcessEnv = process.env): JiraConfig {
  const url = validateRequired("JIRA_URL", env.JIRA_URL);
  const username = validateRequired("JIRA_USERNAME", env.JIRA_USERNAME);
  const token = validateRequired("JIRA_TOKEN", env.JIRA_TOKEN);

  // Validate Jira URL format
  if (!isValidJiraUrl(url)) {
    throw new Error(
      `Invalid JIRA_URL format: ${url}\n` +
        `Expected format: https://your-company.atlassian.net`
    );
  }

  const projectKeyRaw = getOptional(env.JIRA_PROJECT_KEY, "");
  if (projectKeyRaw && !isValidProjectKey(projectKeyRaw)) {
    throw new Error(
      `Invalid JIRA_PROJECT_KEY: ${projectKeyRaw}\n` +
        `Expected an upper-case project key such as TEST`
    );
  }

  const jql = getOptional(env.JIRA_JQL, "");

  // One page of results; the search API caps it server-side anyway
  const maxResults = parsePositiveInt(
    "JIRA_MAX_RESULTS",
    getOptional(env.JIRA_MAX_RESULTS, "50"),
    50
  );

  const timeoutMs = parsePositiveInt(
    "JIRA_TIMEOUT_MS",
    getOptional(env.JIRA_TIMEOUT_MS, "30000"),
    30000
  );

  return {
    url: url.replace(/\/+$/, ""),
    username,
    token,
    projectKey: projectKeyRaw ? projectKeyRaw.trim() : null,
    jql: jql || null,
    maxResults,
    timeoutMs,
  };
}
