import { Command } from "commander";
import { loadJiraConfig } from "../config/jira.js";
import type { CliContext } from "../context.js";
import {
	outputFormatOf,
	parseLabels,
	reportOutcome,
	runAction,
} from "../utils/output.js";

interface UpdateIssueOptions {
	summary?: string;
	description?: string;
	priority?: string;
	labels?: string;
}

export function buildUpdateFields(
	options: UpdateIssueOptions,
): Record<string, unknown> {
	const fields: Record<string, unknown> = {};
	if (options.summary !== undefined) {
		fields.summary = options.summary;
	}
	if (options.description !== undefined) {
		fields.description = options.description;
	}
	if (options.priority !== undefined) {
		fields.priority = { name: options.priority };
	}
	const labels = parseLabels(options.labels);
	if (labels !== undefined) {
		fields.labels = labels;
	}
	return fields;
}

export function createUpdateIssueCommand(context: CliContext): Command {
	const cmd = new Command("update-issue");

	cmd
		.description("Update fields of a Jira issue")
		.argument("<key>", "Issue key (e.g., PROJ-123)")
		.option("--summary <summary>", "New summary")
		.option("--description <description>", "New description")
		.option("--priority <priority>", "New priority")
		.option("--labels <labels>", "Comma-separated labels, replacing the current ones")
		.action(
			async (key: string, options: UpdateIssueOptions, command: Command) => {
				await runAction(context, "updating issue", async () => {
					const fields = buildUpdateFields(options);
					if (Object.keys(fields).length === 0) {
						throw new Error(
							"nothing to update, pass --summary, --description, --priority or --labels",
						);
					}

					const { tracker } = loadJiraConfig(context.env);
					const success = await context
						.createIssueTracker(tracker)
						.updateIssue(key, fields);

					reportOutcome(
						context,
						outputFormatOf(command),
						{ issueKey: key, success },
						{
							success: `Successfully updated issue ${key}`,
							failure: `Failed to update issue ${key}`,
						},
					);
				});
			},
		);

	return cmd;
}
