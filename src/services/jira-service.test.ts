import { describe, it, expect, vi, beforeEach } from "vitest";
import { JiraService } from "./jira-service";
import type { JiraConfig } from "../config/config";
import { TransportError } from "../utils/errors";

const { getMock, createMock } = vi.hoisted(() => {
  const getMock = vi.fn();
  return { getMock, createMock: vi.fn(() => ({ get: getMock })) };
});

vi.mock("axios", () => ({ default: { create: createMock } }));

const config: JiraConfig = {
  url: "https://test.atlassian.net",
  username: "user@example.com",
  token: "test-token",
  projectKey: "TEST",
  jql: null,
  maxResults: 50,
  timeoutMs: 30000,
};

const okResponse = (data: unknown) => ({ status: 200, statusText: "OK", data });

describe("JiraService", () => {
  let jiraService: JiraService;

  beforeEach(() => {
    vi.clearAllMocks();
    jiraService = new JiraService(config);
  });

  it("creates a client with basic auth, JSON accept header and timeout", () => {
    expect(createMock).toHaveBeenCalledWith(
      expect.objectContaining({
        baseURL: "https://test.atlassian.net",
        timeout: 30000,
        headers: {
          Authorization: `Basic ${Buffer.from("user@example.com:test-token").toString("base64")}`,
          Accept: "application/json",
        },
      })
    );
  });

  describe("listIssues", () => {
    it("queries one page of the project's issues and maps them", async () => {
      getMock.mockResolvedValue(
        okResponse({
          issues: [
            {
              key: "TEST-2",
              fields: {
                summary: "Second issue",
                status: { name: "In Progress" },
                created: "2024-01-01T00:00:00.000+0000",
              },
            },
          ],
        })
      );

      const result = await jiraService.listIssues("TEST");

      expect(getMock).toHaveBeenCalledWith("/rest/api/3/search/jql", {
        params: {
          jql: "project = TEST ORDER BY created DESC",
          maxResults: 50,
          fields: "summary,status,created",
        },
      });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toHaveLength(1);
        expect(result.value[0].key).toBe("TEST-2");
        expect(result.value[0].summary).toBe("Second issue");
        expect(result.value[0].currentStatusName).toBe("In Progress");
        expect(result.value[0].createdAt.epochMs).toBe(1704067200000);
      }
    });

    it("uses a custom JQL query instead of the project filter", async () => {
      getMock.mockResolvedValue(okResponse({ issues: [] }));

      const result = await jiraService.listIssues("TEST", "assignee = currentUser()");

      expect(getMock.mock.calls[0][1]).toMatchObject({
        params: { jql: "assignee = currentUser()" },
      });
      expect(result).toEqual({ ok: true, value: [] });
    });

    it("returns a transport error with Jira's messages on a non-2xx response", async () => {
      getMock.mockResolvedValue({
        status: 400,
        statusText: "Bad Request",
        data: { errorMessages: ["Invalid JQL"], errors: {} },
      });

      const result = await jiraService.listIssues("TEST");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TransportError);
        expect(result.error.message).toBe(
          "Jira API request failed: 400 Bad Request - Invalid JQL"
        );
        expect(result.error.status).toBe(400);
        expect(result.error.operation).toBe("listIssues");
      }
    });

    it("reports authentication rejections", async () => {
      getMock.mockResolvedValue({ status: 401, statusText: "Unauthorized", data: "" });

      const result = await jiraService.listIssues("TEST");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("Jira API request failed: 401 Unauthorized");
      }
    });

    it("returns a transport error when the request itself fails", async () => {
      getMock.mockRejectedValue(new Error("connect ECONNREFUSED"));

      const result = await jiraService.listIssues("TEST");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          "Jira API request failed: connect ECONNREFUSED"
        );
        expect(result.error.status).toBeUndefined();
      }
    });

    it("rejects a body without an issues array", async () => {
      getMock.mockResolvedValue(okResponse({ values: [] }));

      const result = await jiraService.listIssues("TEST");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          "Unexpected search response: missing issues array"
        );
      }
    });

    it("reports issues with unparseable creation dates", async () => {
      getMock.mockResolvedValue(
        okResponse({
          issues: [
            {
              key: "TEST-1",
              fields: { summary: "Bad", status: { name: "To Do" }, created: "not a date" },
            },
          ],
        })
      );

      const result = await jiraService.listIssues("TEST");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toMatch(/^Invalid issue data: Invalid timestamp: "not a date"/);
      }
    });

    it("requires a project key or a query", async () => {
      await expect(jiraService.listIssues(null)).rejects.toThrow(
        "A project key or JQL query is required to list issues"
      );
      expect(getMock).not.toHaveBeenCalled();
    });
  });

  describe("getChangelog", () => {
    it("fetches the changelog and maps status and other field changes", async () => {
      getMock.mockResolvedValue(
        okResponse({
          values: [
            {
              id: "10001",
              author: { displayName: "Alex" },
              created: "2024-01-01T10:00:00.000+0000",
              items: [
                { field: "status", fromString: "To Do", toString: "In Progress" },
                { field: "assignee", fromString: null },
              ],
            },
          ],
        })
      );

      const result = await jiraService.getChangelog("TEST-1");

      expect(getMock).toHaveBeenCalledWith("/rest/api/3/issue/TEST-1/changelog", {
        params: {},
      });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toHaveLength(1);
        expect(result.value[0].id).toBe("10001");
        expect(result.value[0].author).toBe("Alex");
        expect(result.value[0].timestamp.epochMs).toBe(1704103200000);
        expect(result.value[0].fieldChanges).toEqual([
          { field: "status", fromValue: "To Do", toValue: "In Progress" },
          { field: "assignee", fromValue: null, toValue: null },
        ]);
      }
    });

    it("treats an empty changelog as a valid result", async () => {
      getMock.mockResolvedValue(okResponse({ values: [] }));

      const result = await jiraService.getChangelog("TEST-1");

      expect(result).toEqual({ ok: true, value: [] });
    });

    it("carries the issue key on failure", async () => {
      getMock.mockResolvedValue({
        status: 404,
        statusText: "Not Found",
        data: { errorMessages: ["Issue does not exist or you do not have permission to see it."] },
      });

      const result = await jiraService.getChangelog("TEST-9");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.issueKey).toBe("TEST-9");
        expect(result.error.operation).toBe("getChangelog");
        expect(result.error.status).toBe(404);
        expect(result.error.message).toBe(
          "Jira API request failed: 404 Not Found - Issue does not exist or you do not have permission to see it."
        );
      }
    });

    it("rejects a body without a values array", async () => {
      getMock.mockResolvedValue(okResponse({}));

      const result = await jiraService.getChangelog("TEST-1");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          "Unexpected changelog response for TEST-1: missing values array"
        );
      }
    });
  });
});
