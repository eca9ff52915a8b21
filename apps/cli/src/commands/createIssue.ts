import { Command } from "commander";
import { loadJiraConfig } from "../config/jira.js";
import type { CliContext } from "../context.js";
import {
	outputFormatOf,
	parseLabels,
	printJson,
	runAction,
} from "../utils/output.js";

interface CreateIssueOptions {
	summary: string;
	project?: string;
	type?: string;
	description?: string;
	assignee?: string;
	priority?: string;
	labels?: string;
}

export function createCreateIssueCommand(context: CliContext): Command {
	const cmd = new Command("create-issue");

	cmd
		.description("Create a new Jira issue")
		.requiredOption("-s, --summary <summary>", "Issue summary")
		.option("-p, --project <key>", "Project key (default: DEFAULT_PROJECT_KEY)")
		.option(
			"-t, --type <type>",
			"Issue type, e.g. Task, Bug, Story (default: DEFAULT_ISSUE_TYPE)",
		)
		.option("-d, --description <description>", "Issue description")
		.option("-a, --assignee <assignee>", "Assignee username or account ID")
		.option("--priority <priority>", "Priority (default: DEFAULT_PRIORITY)")
		.option("--labels <labels>", "Comma-separated list of labels")
		.action(async (options: CreateIssueOptions, command: Command) => {
			await runAction(context, "creating issue", async () => {
				const { tracker, defaults } = loadJiraConfig(context.env);
				const created = await context.createIssueTracker(tracker).createIssue({
					projectKey: options.project ?? defaults.projectKey,
					issueType: options.type ?? defaults.issueType,
					summary: options.summary,
					description: options.description,
					assignee: options.assignee,
					priority: options.priority ?? defaults.priority,
					labels: parseLabels(options.labels),
				});

				if (outputFormatOf(command) === "json") {
					printJson(context, created);
				} else {
					context.io.stdout(`Successfully created issue: ${created.key}`);
				}
			});
		});

	return cmd;
}
