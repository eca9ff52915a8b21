/**
 * Mappers from Jira REST payloads to the flattened JiraIssue view
 */

import type { JiraIssuePayload, JiraUser } from "./schemas.js";
import type { JiraIssue } from "./types.js";

export function mapJiraUser(user: JiraUser | null | undefined): string | null {
	if (!user) return null;
	return user.displayName ?? user.name ?? user.accountId ?? null;
}

export function mapJiraIssue(payload: JiraIssuePayload): JiraIssue {
	const { fields } = payload;
	return {
		id: payload.id,
		key: payload.key,
		summary: fields.summary ?? "",
		status: fields.status?.name ?? null,
		assignee: mapJiraUser(fields.assignee),
		reporter: mapJiraUser(fields.reporter),
		created: fields.created ?? null,
		fields,
	};
}

/**
 * Jira Server identifies users by name, Jira Cloud by account id
 */
export function mapAssignee(assignee: string): { accountId: string } | { name: string } {
	return assignee.includes("@") ? { accountId: assignee } : { name: assignee };
}
