/**
 * Credentials for the Jira REST API: a personal access token (sent as a
 * Bearer token) or a username and password (HTTP Basic)
 */
export type JiraAuth =
	| { token: string }
	| { username: string; password: string };

export interface JiraIssueTrackerConfig {
	/** Instance root, e.g. "https://jira.example.com" */
	baseUrl: string;
	auth: JiraAuth;
}

/**
 * Flattened view of a Jira issue. The raw `fields` object is kept for
 * anything not lifted to the top level.
 */
export interface JiraIssue {
	id: string;
	/** Issue key (e.g., "PROJ-123") */
	key: string;
	summary: string;
	status: string | null;
	/** Display name, or null when unassigned */
	assignee: string | null;
	reporter: string | null;
	/** ISO timestamp as Jira reports it */
	created: string | null;
	fields: Record<string, unknown>;
}

export interface CreateIssueInput {
	projectKey: string;
	/** e.g. "Task", "Bug", "Story" */
	issueType: string;
	summary: string;
	description?: string;
	/** Account id when it contains "@", otherwise a username */
	assignee?: string;
	priority?: string;
	labels?: string[];
	/** Raw field values merged over everything above */
	customFields?: Record<string, unknown>;
}

export interface CreatedIssue {
	id: string;
	key: string;
	self: string;
}

export interface SearchOptions {
	/** Defaults to 50 */
	maxResults?: number;
	/** Field names to return; all fields when omitted */
	fields?: string[];
}
