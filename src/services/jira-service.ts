import axios, { type AxiosInstance } from "axios";
import { JiraConfig } from "../config/config";
import {
  ChangelogEntry,
  IssueSummary,
  JiraChangelogResponse,
  JiraSearchResponse,
  ReportOperation,
  Result,
  ok,
  err,
} from "../types";
import { toChangelogEntry, toIssueSummary } from "../utils/changelog-parser";
import { TransportError, toErrorMessage } from "../utils/errors";

/**
 * Issue fields requested from the search endpoint
 */
const SEARCH_FIELDS = "summary,status,created";

/**
 * Checks that a search response carries an issues array
 */
function isSearchResponse(data: unknown): data is JiraSearchResponse {
  return (
    typeof data === "object" &&
    data !== null &&
    "issues" in data &&
    Array.isArray(data.issues)
  );
}

/**
 * Checks that a changelog response carries a values array
 */
function isChangelogResponse(data: unknown): data is JiraChangelogResponse {
  return (
    typeof data === "object" &&
    data !== null &&
    "values" in data &&
    Array.isArray(data.values)
  );
}

/**
 * Formats Jira's error messages from a failed response body
 */
function formatErrorDetails(data: unknown): string {
  if (typeof data !== "object" || data === null) {
    return "";
  }

  const messages: unknown[] = [];
  if ("errorMessages" in data && Array.isArray(data.errorMessages)) {
    messages.push(...data.errorMessages);
  }
  if ("errors" in data && typeof data.errors === "object" && data.errors) {
    messages.push(...Object.values(data.errors));
  }

  const texts = messages.filter(
    (message): message is string => typeof message === "string"
  );

  return texts.length > 0 ? ` - ${texts.join("; ")}` : "";
}

/**
 * Service class for interacting with Jira API
 *
 * Every public method resolves to a Result; transport failures never throw.
 */
export class JiraService {
  private readonly client: AxiosInstance;

  constructor(private readonly config: JiraConfig) {
    this.client = axios.create({
      baseURL: this.config.url,
      headers: {
        Authorization: `Basic ${Buffer.from(
          `${this.config.username}:${this.config.token}`
        ).toString("base64")}`,
        Accept: "application/json",
      },
      timeout: this.config.timeoutMs,
      // Non-2xx responses are mapped to TransportError below
      validateStatus: () => true,
    });
  }

  /**
   * Builds the default JQL query for a project
   * @param projectKey - Jira project key
   * @returns JQL query string, newest issues first
   */
  buildProjectJql(projectKey: string): string {
    return `project = ${projectKey} ORDER BY created DESC`;
  }

  /**
   * Fetches one page of issues for a project or custom JQL query
   * @param projectKey - Project to list issues for
   * @param jql - Optional JQL replacing the default project query
   * @returns Issue summaries, or the transport failure
   */
  async listIssues(
    projectKey: string | null,
    jql?: string | null
  ): Promise<Result<IssueSummary[], TransportError>> {
    const query = jql ?? (projectKey ? this.buildProjectJql(projectKey) : null);
    if (!query) {
      throw new Error("A project key or JQL query is required to list issues");
    }

    const response = await this.get("listIssues", "/rest/api/3/search/jql", {
      jql: query,
      maxResults: this.config.maxResults,
      fields: SEARCH_FIELDS,
    });
    if (!response.ok) {
      return response;
    }

    if (!isSearchResponse(response.value)) {
      return err(
        new TransportError(
          "Unexpected search response: missing issues array",
          "listIssues"
        )
      );
    }

    try {
      return ok(response.value.issues.map(toIssueSummary));
    } catch (error) {
      return err(
        new TransportError(
          `Invalid issue data: ${toErrorMessage(error)}`,
          "listIssues"
        )
      );
    }
  }

  /**
   * Fetches one page of an issue's changelog
   * @param issueKey - Key of the issue (e.g. "TEST-1")
   * @returns Changelog entries in API order, or the transport failure
   */
  async getChangelog(
    issueKey: string
  ): Promise<Result<ChangelogEntry[], TransportError>> {
    const response = await this.get(
      "getChangelog",
      `/rest/api/3/issue/${encodeURIComponent(issueKey)}/changelog`,
      {},
      issueKey
    );
    if (!response.ok) {
      return response;
    }

    if (!isChangelogResponse(response.value)) {
      return err(
        new TransportError(
          `Unexpected changelog response for ${issueKey}: missing values array`,
          "getChangelog",
          undefined,
          issueKey
        )
      );
    }

    try {
      return ok(response.value.values.map(toChangelogEntry));
    } catch (error) {
      return err(
        new TransportError(
          `Invalid changelog data for ${issueKey}: ${toErrorMessage(error)}`,
          "getChangelog",
          undefined,
          issueKey
        )
      );
    }
  }

  /**
   * Performs a GET request and maps failures to TransportError
   */
  private async get(
    operation: ReportOperation,
    path: string,
    params: Record<string, string | number>,
    issueKey?: string
  ): Promise<Result<unknown, TransportError>> {
    try {
      const response = await this.client.get<unknown>(path, { params });

      if (response.status < 200 || response.status >= 300) {
        return err(
          new TransportError(
            `Jira API request failed: ${response.status} ${
              response.statusText
            }${formatErrorDetails(response.data)}`,
            operation,
            response.status,
            issueKey
          )
        );
      }

      return ok(response.data);
    } catch (error) {
      return err(
        new TransportError(
          `Jira API request failed: ${toErrorMessage(error)}`,
          operation,
          undefined,
          issueKey
        )
      );
    }
  }
}
