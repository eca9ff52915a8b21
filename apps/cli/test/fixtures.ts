import type {
	CreatedIssue,
	CreateIssueInput,
	JiraIssue,
	SearchOptions,
} from "threadwatch-issue-trackers";
import type { CliContext, IssueTrackerClient } from "../src/context.js";
import { createProgram } from "../src/program.js";

export const jiraEnv = {
	JIRA_URL: "https://jira.example.com",
	JIRA_TOKEN: "test-token",
};

export function makeIssue(key: string, overrides: Partial<JiraIssue> = {}): JiraIssue {
	return {
		id: `id-${key}`,
		key,
		summary: `Summary of ${key}`,
		status: "To Do",
		assignee: null,
		reporter: "Jane Doe",
		created: "2024-01-01T12:00:00.000+0000",
		fields: {},
		...overrides,
	};
}

/**
 * Records every call; results are set per test
 */
export class FakeIssueTracker implements IssueTrackerClient {
	readonly created: CreateIssueInput[] = [];
	readonly searches: Array<{ jql: string; options?: SearchOptions }> = [];
	readonly updates: Array<{ key: string; fields: Record<string, unknown> }> = [];
	readonly comments: Array<{ key: string; body: string }> = [];
	readonly transitions: Array<{ key: string; status: string }> = [];

	searchResult: JiraIssue[] = [];
	issue: JiraIssue | Error = makeIssue("TEST-1");
	outcome = true;

	async createIssue(input: CreateIssueInput): Promise<CreatedIssue> {
		this.created.push(input);
		return {
			id: "10001",
			key: `${input.projectKey}-1`,
			self: "https://jira.example.com/rest/api/2/issue/10001",
		};
	}

	async searchIssues(jql: string, options?: SearchOptions): Promise<JiraIssue[]> {
		this.searches.push({ jql, options });
		return this.searchResult;
	}

	async getIssue(_issueKey: string): Promise<JiraIssue> {
		if (this.issue instanceof Error) {
			throw this.issue;
		}
		return this.issue;
	}

	async updateIssue(key: string, fields: Record<string, unknown>): Promise<boolean> {
		this.updates.push({ key, fields });
		return this.outcome;
	}

	async addComment(key: string, body: string): Promise<boolean> {
		this.comments.push({ key, body });
		return this.outcome;
	}

	async transitionIssue(key: string, status: string): Promise<boolean> {
		this.transitions.push({ key, status });
		return this.outcome;
	}
}

export interface TestCli {
	context: CliContext;
	stdout: string[];
	stderr: string[];
	tracker: FakeIssueTracker;
}

export function createTestCli(overrides: Partial<CliContext> = {}): TestCli {
	const stdout: string[] = [];
	const stderr: string[] = [];
	const tracker = new FakeIssueTracker();
	const context: CliContext = {
		env: { ...jiraEnv },
		cwd: "/nonexistent-threadwatch-dir",
		io: {
			stdout: (line) => stdout.push(line),
			stderr: (line) => stderr.push(line),
		},
		createIssueTracker: () => tracker,
		createMonitor: () => {
			throw new Error("monitor not configured for this test");
		},
		onShutdown: () => () => {},
		...overrides,
	};
	return { context, stdout, stderr, tracker };
}

export async function runCli(context: CliContext, args: string[]): Promise<void> {
	await createProgram(context).parseAsync(["node", "threadwatch", ...args]);
}
