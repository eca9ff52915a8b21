export { JiraIssueTracker } from "./JiraIssueTracker.js";
export { mapAssignee, mapJiraIssue, mapJiraUser } from "./mappers.js";
export type { JiraIssuePayload, JiraUser } from "./schemas.js";
export type {
	CreatedIssue,
	CreateIssueInput,
	JiraAuth,
	JiraIssue,
	JiraIssueTrackerConfig,
	SearchOptions,
} from "./types.js";
