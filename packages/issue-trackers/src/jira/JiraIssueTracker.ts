/**
 * Jira client over REST API v2
 */

import {
	IssueTrackerError,
	type Logger,
	createLogger,
	toError,
} from "threadwatch-core";
import type { z } from "zod";
import { mapAssignee, mapJiraIssue } from "./mappers.js";
import {
	JiraCreatedIssueSchema,
	JiraIssueSchema,
	JiraSearchResponseSchema,
	JiraTransitionsResponseSchema,
} from "./schemas.js";
import type {
	CreateIssueInput,
	CreatedIssue,
	JiraAuth,
	JiraIssue,
	JiraIssueTrackerConfig,
	SearchOptions,
} from "./types.js";

type HttpMethod = "GET" | "POST" | "PUT";

function authorizationHeader(auth: JiraAuth): string {
	if ("token" in auth) {
		return `Bearer ${auth.token}`;
	}
	const credentials = Buffer.from(`${auth.username}:${auth.password}`).toString(
		"base64",
	);
	return `Basic ${credentials}`;
}

/**
 * Creates, searches and updates Jira issues.
 *
 * Reads (`getIssue`, `searchIssues`) and `createIssue` throw
 * {@link IssueTrackerError}; the update operations log the failure and
 * resolve to `false`.
 *
 * @example
 * ```typescript
 * const tracker = new JiraIssueTracker({
 *   baseUrl: "https://jira.example.com",
 *   auth: { token: process.env.JIRA_TOKEN ?? "" },
 * });
 *
 * const created = await tracker.createIssue({
 *   projectKey: "OPS",
 *   issueType: "Bug",
 *   summary: "Deploy pipeline stuck",
 * });
 * await tracker.transitionIssue(created.key, "In Progress");
 * ```
 */
export class JiraIssueTracker {
	private readonly baseUrl: string;
	private readonly authorization: string;
	private readonly logger: Logger;

	constructor(config: JiraIssueTrackerConfig, logger?: Logger) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, "");
		this.authorization = authorizationHeader(config.auth);
		this.logger = logger ?? createLogger("issues");
	}

	async createIssue(input: CreateIssueInput): Promise<CreatedIssue> {
		const fields: Record<string, unknown> = {
			project: { key: input.projectKey },
			issuetype: { name: input.issueType },
			summary: input.summary,
		};
		if (input.description) {
			fields.description = input.description;
		}
		if (input.assignee) {
			fields.assignee = mapAssignee(input.assignee);
		}
		if (input.priority) {
			fields.priority = { name: input.priority };
		}
		if (input.labels && input.labels.length > 0) {
			fields.labels = input.labels;
		}
		Object.assign(fields, input.customFields);

		try {
			const created = await this.requestJson(
				"POST",
				"/issue",
				JiraCreatedIssueSchema,
				"create issue",
				{ fields },
			);
			this.logger.info("Created issue", { issueKey: created.key });
			return created;
		} catch (error) {
			const err = toError(error);
			throw new IssueTrackerError(
				`Failed to create issue in project ${input.projectKey}: ${err.message}`,
				undefined,
				err,
			);
		}
	}

	/**
	 * Run a JQL query
	 */
	async searchIssues(
		jql: string,
		options: SearchOptions = {},
	): Promise<JiraIssue[]> {
		const { maxResults = 50, fields } = options;
		try {
			const response = await this.requestJson(
				"POST",
				"/search",
				JiraSearchResponseSchema,
				"search issues",
				fields ? { jql, maxResults, fields } : { jql, maxResults },
			);
			return response.issues.map(mapJiraIssue);
		} catch (error) {
			const err = toError(error);
			throw new IssueTrackerError(
				`Failed to run query "${jql}": ${err.message}`,
				undefined,
				err,
			);
		}
	}

	/**
	 * @param issueKey - Issue key (e.g., "PROJ-123")
	 * @param fields - Field names to return; all fields when omitted
	 */
	async getIssue(issueKey: string, fields?: string[]): Promise<JiraIssue> {
		const query =
			fields && fields.length > 0
				? `?${new URLSearchParams({ fields: fields.join(",") }).toString()}`
				: "";
		try {
			const payload = await this.requestJson(
				"GET",
				`/issue/${encodeURIComponent(issueKey)}${query}`,
				JiraIssueSchema,
				"get issue",
			);
			return mapJiraIssue(payload);
		} catch (error) {
			const err = toError(error);
			throw new IssueTrackerError(
				`Failed to get issue ${issueKey}: ${err.message}`,
				issueKey,
				err,
			);
		}
	}

	async updateIssue(
		issueKey: string,
		fields: Record<string, unknown>,
	): Promise<boolean> {
		try {
			await this.send(
				"PUT",
				`/issue/${encodeURIComponent(issueKey)}`,
				"update issue",
				{ fields },
			);
			this.logger.info("Updated issue", { issueKey });
			return true;
		} catch (error) {
			this.logger.error("Error updating issue", {
				issueKey,
				error: toError(error),
			});
			return false;
		}
	}

	async addComment(issueKey: string, body: string): Promise<boolean> {
		try {
			await this.send(
				"POST",
				`/issue/${encodeURIComponent(issueKey)}/comment`,
				"add comment",
				{ body },
			);
			this.logger.info("Added comment to issue", { issueKey });
			return true;
		} catch (error) {
			this.logger.error("Error adding comment to issue", {
				issueKey,
				error: toError(error),
			});
			return false;
		}
	}

	/**
	 * Move an issue through the workflow transition whose name matches
	 * `status` (case-insensitive).
	 */
	async transitionIssue(issueKey: string, status: string): Promise<boolean> {
		const path = `/issue/${encodeURIComponent(issueKey)}/transitions`;
		try {
			const { transitions } = await this.requestJson(
				"GET",
				path,
				JiraTransitionsResponseSchema,
				"get transitions",
			);
			const target = transitions.find(
				(transition) => transition.name.toLowerCase() === status.toLowerCase(),
			);
			if (!target) {
				this.logger.warn(
					`Transition '${status}' not found for issue ${issueKey}`,
					{
						issueKey,
						available: transitions.map((transition) => transition.name),
					},
				);
				return false;
			}

			await this.send("POST", path, "transition issue", {
				transition: { id: target.id },
			});
			this.logger.info(`Transitioned issue to ${target.name}`, { issueKey });
			return true;
		} catch (error) {
			this.logger.error("Error transitioning issue", {
				issueKey,
				error: toError(error),
			});
			return false;
		}
	}

	private async send(
		method: HttpMethod,
		path: string,
		operation: string,
		body?: unknown,
	): Promise<Response> {
		const headers: Record<string, string> = {
			Authorization: this.authorization,
			Accept: "application/json",
		};
		if (body !== undefined) {
			headers["Content-Type"] = "application/json";
		}

		const response = await fetch(`${this.baseUrl}/rest/api/2${path}`, {
			method,
			headers,
			body: body === undefined ? undefined : JSON.stringify(body),
		});

		if (!response.ok) {
			const errorBody = await response.text();
			throw new Error(
				`[JiraIssueTracker] Failed to ${operation}: ${response.status} ${response.statusText} - ${errorBody}`,
			);
		}
		return response;
	}

	private async requestJson<T>(
		method: HttpMethod,
		path: string,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
		operation: string,
		body?: unknown,
	): Promise<T> {
		const response = await this.send(method, path, operation, body);
		const parsed = schema.safeParse(await response.json());
		if (!parsed.success) {
			throw new Error(
				`[JiraIssueTracker] Unexpected response to ${operation}: ${parsed.error.message}`,
			);
		}
		return parsed.data;
	}
}
