import { IssueTrackerError, Logger, LogLevel } from "threadwatch-core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { JiraIssueTracker } from "../../src/jira/JiraIssueTracker.js";

const mockFetch = vi.fn();
const silentLogger = new Logger({ level: LogLevel.SILENT });

function jsonResponse(body: unknown, status = 200) {
	return { ok: true, status, json: async () => body };
}

function errorResponse(status: number, statusText: string, body: string) {
	return { ok: false, status, statusText, text: async () => body };
}

function issuePayload(key: string, summary: string) {
	return {
		id: `id-${key}`,
		key,
		fields: {
			summary,
			status: { name: "To Do" },
			assignee: null,
			reporter: { displayName: "Jane Doe" },
			created: "2024-01-01T12:00:00.000+0000",
		},
	};
}

function requestBody(callIndex: number): unknown {
	const init = mockFetch.mock.calls[callIndex]?.[1];
	return JSON.parse(String(init?.body));
}

describe("JiraIssueTracker", () => {
	let tracker: JiraIssueTracker;

	beforeEach(() => {
		mockFetch.mockReset();
		vi.stubGlobal("fetch", mockFetch);
		tracker = new JiraIssueTracker(
			{ baseUrl: "https://jira.example.com/", auth: { token: "test-token" } },
			silentLogger,
		);
	});

	afterEach(() => {
		vi.unstubAllGlobals();
	});

	describe("authentication", () => {
		it("sends a token as Bearer", async () => {
			mockFetch.mockResolvedValueOnce(jsonResponse(issuePayload("TEST-1", "x")));

			await tracker.getIssue("TEST-1");

			expect(mockFetch.mock.calls[0]?.[1]?.headers.Authorization).toBe(
				"Bearer test-token",
			);
		});

		it("sends username and password as Basic", async () => {
			const basic = new JiraIssueTracker(
				{
					baseUrl: "https://jira.example.com",
					auth: { username: "user", password: "test-secret" },
				},
				silentLogger,
			);
			mockFetch.mockResolvedValueOnce(jsonResponse(issuePayload("TEST-1", "x")));

			await basic.getIssue("TEST-1");

			expect(mockFetch.mock.calls[0]?.[1]?.headers.Authorization).toBe(
				`Basic ${Buffer.from("user:test-secret").toString("base64")}`,
			);
		});
	});

	describe("createIssue", () => {
		it("builds the fields payload", async () => {
			mockFetch.mockResolvedValueOnce(
				jsonResponse({
					id: "10001",
					key: "TEST-1",
					self: "https://jira.example.com/rest/api/2/issue/10001",
				}),
			);

			const created = await tracker.createIssue({
				projectKey: "TEST",
				issueType: "Bug",
				summary: "Login page broken",
				description: "Steps to reproduce",
				assignee: "jane@example.com",
				priority: "High",
				labels: ["frontend", "urgent"],
				customFields: { customfield_10010: 5 },
			});

			expect(created).toEqual({
				id: "10001",
				key: "TEST-1",
				self: "https://jira.example.com/rest/api/2/issue/10001",
			});
			expect(mockFetch.mock.calls[0]?.[0]).toBe(
				"https://jira.example.com/rest/api/2/issue",
			);
			expect(mockFetch.mock.calls[0]?.[1]?.method).toBe("POST");
			expect(requestBody(0)).toEqual({
				fields: {
					project: { key: "TEST" },
					issuetype: { name: "Bug" },
					summary: "Login page broken",
					description: "Steps to reproduce",
					assignee: { accountId: "jane@example.com" },
					priority: { name: "High" },
					labels: ["frontend", "urgent"],
					customfield_10010: 5,
				},
			});
		});

		it("leaves out empty optional fields", async () => {
			mockFetch.mockResolvedValueOnce(
				jsonResponse({ id: "1", key: "TEST-2", self: "s" }),
			);

			await tracker.createIssue({
				projectKey: "TEST",
				issueType: "Task",
				summary: "Minimal",
				assignee: "jdoe",
				labels: [],
			});

			expect(requestBody(0)).toEqual({
				fields: {
					project: { key: "TEST" },
					issuetype: { name: "Task" },
					summary: "Minimal",
					assignee: { name: "jdoe" },
				},
			});
		});

		it("lets custom fields override standard ones", async () => {
			mockFetch.mockResolvedValueOnce(
				jsonResponse({ id: "1", key: "TEST-3", self: "s" }),
			);

			await tracker.createIssue({
				projectKey: "TEST",
				issueType: "Task",
				summary: "Original",
				customFields: { summary: "Overridden" },
			});

			expect(requestBody(0)).toMatchObject({
				fields: { summary: "Overridden" },
			});
		});

		it("throws an IssueTrackerError on failure", async () => {
			mockFetch.mockResolvedValueOnce(
				errorResponse(400, "Bad Request", '{"errors":{"project":"invalid"}}'),
			);

			const failure = tracker.createIssue({
				projectKey: "NOPE",
				issueType: "Task",
				summary: "x",
			});

			await expect(failure).rejects.toBeInstanceOf(IssueTrackerError);
			await expect(failure).rejects.toThrow(
				'Failed to create issue in project NOPE: [JiraIssueTracker] Failed to create issue: 400 Bad Request - {"errors":{"project":"invalid"}}',
			);
		});
	});

	describe("searchIssues", () => {
		it("posts the JQL with the default limit", async () => {
			mockFetch.mockResolvedValueOnce(
				jsonResponse({
					total: 2,
					issues: [
						issuePayload("TEST-1", "First"),
						issuePayload("TEST-2", "Second"),
					],
				}),
			);

			const issues = await tracker.searchIssues("project = TEST");

			expect(issues.map((issue) => `${issue.key}: ${issue.summary}`)).toEqual([
				"TEST-1: First",
				"TEST-2: Second",
			]);
			expect(mockFetch.mock.calls[0]?.[0]).toBe(
				"https://jira.example.com/rest/api/2/search",
			);
			expect(requestBody(0)).toEqual({ jql: "project = TEST", maxResults: 50 });
		});

		it("passes maxResults and fields through", async () => {
			mockFetch.mockResolvedValueOnce(jsonResponse({ issues: [] }));

			await tracker.searchIssues("assignee = currentUser()", {
				maxResults: 5,
				fields: ["summary", "status"],
			});

			expect(requestBody(0)).toEqual({
				jql: "assignee = currentUser()",
				maxResults: 5,
				fields: ["summary", "status"],
			});
		});

		it("throws on a malformed response", async () => {
			mockFetch.mockResolvedValueOnce(jsonResponse({ unexpected: true }));

			await expect(tracker.searchIssues("project = TEST")).rejects.toThrow(
				'Failed to run query "project = TEST": [JiraIssueTracker] Unexpected response to search issues',
			);
		});
	});

	describe("getIssue", () => {
		it("maps the issue and requests selected fields", async () => {
			mockFetch.mockResolvedValueOnce(
				jsonResponse(issuePayload("TEST-7", "Flaky test")),
			);

			const issue = await tracker.getIssue("TEST-7", ["summary", "status"]);

			expect(issue).toMatchObject({
				key: "TEST-7",
				summary: "Flaky test",
				status: "To Do",
				assignee: null,
				reporter: "Jane Doe",
				created: "2024-01-01T12:00:00.000+0000",
			});
			expect(mockFetch.mock.calls[0]?.[0]).toBe(
				"https://jira.example.com/rest/api/2/issue/TEST-7?fields=summary%2Cstatus",
			);
			expect(mockFetch.mock.calls[0]?.[1]?.body).toBeUndefined();
		});

		it("carries the issue key on failure", async () => {
			mockFetch.mockResolvedValueOnce(
				errorResponse(404, "Not Found", "Issue does not exist"),
			);

			await expect(tracker.getIssue("TEST-404")).rejects.toMatchObject({
				issueKey: "TEST-404",
				message:
					"Failed to get issue TEST-404: [JiraIssueTracker] Failed to get issue: 404 Not Found - Issue does not exist",
			});
		});
	});

	describe("updateIssue", () => {
		it("puts the fields and resolves true", async () => {
			mockFetch.mockResolvedValueOnce({ ok: true, status: 204 });

			const updated = await tracker.updateIssue("TEST-1", {
				summary: "Renamed",
			});

			expect(updated).toBe(true);
			expect(mockFetch.mock.calls[0]?.[1]?.method).toBe("PUT");
			expect(requestBody(0)).toEqual({ fields: { summary: "Renamed" } });
		});

		it("resolves false on failure", async () => {
			mockFetch.mockResolvedValueOnce(errorResponse(403, "Forbidden", ""));

			await expect(
				tracker.updateIssue("TEST-1", { summary: "Renamed" }),
			).resolves.toBe(false);
		});
	});

	describe("addComment", () => {
		it("posts the comment body", async () => {
			mockFetch.mockResolvedValueOnce(jsonResponse({ id: "c-1" }, 201));

			await expect(tracker.addComment("TEST-1", "Looking into it")).resolves.toBe(
				true,
			);
			expect(mockFetch.mock.calls[0]?.[0]).toBe(
				"https://jira.example.com/rest/api/2/issue/TEST-1/comment",
			);
			expect(requestBody(0)).toEqual({ body: "Looking into it" });
		});

		it("resolves false when the request throws", async () => {
			mockFetch.mockRejectedValueOnce(new Error("getaddrinfo ENOTFOUND"));

			await expect(tracker.addComment("TEST-1", "hi")).resolves.toBe(false);
		});
	});

	describe("transitionIssue", () => {
		const transitions = {
			transitions: [
				{ id: "11", name: "To Do" },
				{ id: "21", name: "In Progress" },
				{ id: "31", name: "Done" },
			],
		};

		it("matches the transition name case-insensitively", async () => {
			mockFetch
				.mockResolvedValueOnce(jsonResponse(transitions))
				.mockResolvedValueOnce({ ok: true, status: 204 });

			await expect(tracker.transitionIssue("TEST-1", "in progress")).resolves.toBe(
				true,
			);
			expect(mockFetch.mock.calls[1]?.[0]).toBe(
				"https://jira.example.com/rest/api/2/issue/TEST-1/transitions",
			);
			expect(requestBody(1)).toEqual({ transition: { id: "21" } });
		});

		it("resolves false for an unknown status without posting", async () => {
			mockFetch.mockResolvedValueOnce(jsonResponse(transitions));

			await expect(tracker.transitionIssue("TEST-1", "Archived")).resolves.toBe(
				false,
			);
			expect(mockFetch).toHaveBeenCalledTimes(1);
		});

		it("resolves false when transitions cannot be read", async () => {
			mockFetch.mockResolvedValueOnce(errorResponse(404, "Not Found", ""));

			await expect(tracker.transitionIssue("TEST-9", "Done")).resolves.toBe(
				false,
			);
		});
	});
});
