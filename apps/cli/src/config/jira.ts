import { ConfigurationError } from "threadwatch-core";
import type {
	JiraAuth,
	JiraIssueTrackerConfig,
} from "threadwatch-issue-trackers";
import { z } from "zod";

const JiraEnvSchema = z.object({
	JIRA_URL: z.string().url(),
	JIRA_TOKEN: z.string().optional(),
	JIRA_USERNAME: z.string().optional(),
	JIRA_PASSWORD: z.string().optional(),
	DEFAULT_PROJECT_KEY: z.string().default("TEST"),
	DEFAULT_ISSUE_TYPE: z.string().default("Task"),
	DEFAULT_PRIORITY: z.string().default("Medium"),
	DEFAULT_MAX_RESULTS: z.coerce.number().int().positive().default(50),
});

type JiraEnvKey = keyof z.infer<typeof JiraEnvSchema>;

const JIRA_ENV_KEYS: readonly JiraEnvKey[] = [
	"JIRA_URL",
	"JIRA_TOKEN",
	"JIRA_USERNAME",
	"JIRA_PASSWORD",
	"DEFAULT_PROJECT_KEY",
	"DEFAULT_ISSUE_TYPE",
	"DEFAULT_PRIORITY",
	"DEFAULT_MAX_RESULTS",
];

/**
 * Defaults applied when a ticketing command leaves an option out
 */
export interface JiraDefaults {
	projectKey: string;
	issueType: string;
	priority: string;
	maxResults: number;
}

export interface JiraSettings {
	tracker: JiraIssueTrackerConfig;
	defaults: JiraDefaults;
}

/**
 * Blank variables (as an empty `KEY=` line in .env leaves them) count as unset
 */
function pickSet(env: NodeJS.ProcessEnv): Partial<Record<JiraEnvKey, string>> {
	const picked: Partial<Record<JiraEnvKey, string>> = {};
	for (const key of JIRA_ENV_KEYS) {
		const value = env[key]?.trim();
		if (value) {
			picked[key] = value;
		}
	}
	return picked;
}

/**
 * @throws ConfigurationError when JIRA_URL or the credentials are missing
 */
export function loadJiraConfig(
	rawEnv: NodeJS.ProcessEnv = process.env,
): JiraSettings {
	const picked = pickSet(rawEnv);
	if (!picked.JIRA_URL) {
		throw new ConfigurationError(
			"JIRA_URL must be set in environment variables or .env",
			"JIRA_URL",
		);
	}

	const parsed = JiraEnvSchema.safeParse(picked);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const setting = issue ? String(issue.path[0]) : undefined;
		throw new ConfigurationError(
			`Invalid ${setting ?? "Jira configuration"}: ${issue?.message ?? parsed.error.message}`,
			setting,
		);
	}
	const env = parsed.data;

	let auth: JiraAuth;
	if (env.JIRA_TOKEN) {
		auth = { token: env.JIRA_TOKEN };
	} else if (env.JIRA_USERNAME && env.JIRA_PASSWORD) {
		auth = { username: env.JIRA_USERNAME, password: env.JIRA_PASSWORD };
	} else {
		throw new ConfigurationError(
			"Either JIRA_TOKEN or both JIRA_USERNAME and JIRA_PASSWORD must be set",
			"JIRA_TOKEN",
		);
	}

	return {
		tracker: { baseUrl: env.JIRA_URL, auth },
		defaults: {
			projectKey: env.DEFAULT_PROJECT_KEY,
			issueType: env.DEFAULT_ISSUE_TYPE,
			priority: env.DEFAULT_PRIORITY,
			maxResults: env.DEFAULT_MAX_RESULTS,
		},
	};
}
