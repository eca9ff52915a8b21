import { Command } from "commander";
import { loadJiraConfig } from "../config/jira.js";
import type { CliContext } from "../context.js";
import { outputFormatOf, printJson, runAction } from "../utils/output.js";

export function createGetIssueCommand(context: CliContext): Command {
	const cmd = new Command("get-issue");

	cmd
		.description("Show the details of a Jira issue")
		.argument("<key>", "Issue key (e.g., PROJ-123)")
		.action(async (key: string, _options: unknown, command: Command) => {
			await runAction(context, "getting issue", async () => {
				const { tracker } = loadJiraConfig(context.env);
				const issue = await context.createIssueTracker(tracker).getIssue(key);

				if (outputFormatOf(command) === "json") {
					printJson(context, issue);
					return;
				}
				context.io.stdout(`Issue Key: ${issue.key}`);
				context.io.stdout(`Summary: ${issue.summary}`);
				context.io.stdout(`Status: ${issue.status ?? "Unknown"}`);
				context.io.stdout(`Assignee: ${issue.assignee ?? "Unassigned"}`);
				context.io.stdout(`Reporter: ${issue.reporter ?? "Unknown"}`);
				context.io.stdout(`Created: ${issue.created ?? "Unknown"}`);
			});
		});

	return cmd;
}
