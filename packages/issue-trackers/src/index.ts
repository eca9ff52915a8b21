/**
 * Ticketing adapters for threadwatch
 *
 * @packageDocumentation
 */

export type {
	CreatedIssue,
	CreateIssueInput,
	JiraAuth,
	JiraIssue,
	JiraIssuePayload,
	JiraIssueTrackerConfig,
	JiraUser,
	SearchOptions,
} from "./jira/index.js";
export {
	JiraIssueTracker,
	mapAssignee,
	mapJiraIssue,
	mapJiraUser,
} from "./jira/index.js";
