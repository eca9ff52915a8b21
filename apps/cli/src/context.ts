import {
	JiraIssueTracker,
	type JiraIssueTrackerConfig,
} from "threadwatch-issue-trackers";
import {
	KeywordMonitor,
	SlackMessageSource,
} from "threadwatch-slack-monitor";
import type { MonitorSettings } from "./config/monitor.js";

/**
 * The ticketing operations the commands use
 */
export type IssueTrackerClient = Pick<
	JiraIssueTracker,
	| "createIssue"
	| "searchIssues"
	| "getIssue"
	| "updateIssue"
	| "addComment"
	| "transitionIssue"
>;

export interface MonitorRunner {
	run(signal?: AbortSignal): Promise<void>;
}

export interface CliIO {
	stdout(line: string): void;
	stderr(line: string): void;
}

/**
 * Everything a command touches outside its own arguments
 */
export interface CliContext {
	env: NodeJS.ProcessEnv;
	cwd: string;
	io: CliIO;
	createIssueTracker(config: JiraIssueTrackerConfig): IssueTrackerClient;
	createMonitor(settings: MonitorSettings): MonitorRunner;
	/** Register a shutdown handler; returns a function that unregisters it */
	onShutdown(handler: () => void): () => void;
}

export function createDefaultContext(): CliContext {
	return {
		env: process.env,
		cwd: process.cwd(),
		io: {
			stdout: (line) => console.log(line),
			stderr: (line) => console.error(line),
		},
		createIssueTracker: (config) => new JiraIssueTracker(config),
		createMonitor: (settings) =>
			new KeywordMonitor({
				config: settings.monitor,
				source: new SlackMessageSource({ token: settings.token }),
			}),
		onShutdown: (handler) => {
			process.once("SIGINT", handler);
			process.once("SIGTERM", handler);
			return () => {
				process.off("SIGINT", handler);
				process.off("SIGTERM", handler);
			};
		},
	};
}
