import { Command } from "commander";
import { loadJiraConfig } from "../config/jira.js";
import type { CliContext } from "../context.js";
import { outputFormatOf, reportOutcome, runAction } from "../utils/output.js";

export function createTransitionCommand(context: CliContext): Command {
	const cmd = new Command("transition");

	cmd
		.description("Move a Jira issue to another status")
		.argument("<key>", "Issue key (e.g., PROJ-123)")
		.argument("<status>", "Target status, e.g. \"In Progress\" or Done")
		.action(
			async (key: string, status: string, _options: unknown, command: Command) => {
				await runAction(context, "transitioning issue", async () => {
					const { tracker } = loadJiraConfig(context.env);
					const success = await context
						.createIssueTracker(tracker)
						.transitionIssue(key, status);

					reportOutcome(
						context,
						outputFormatOf(command),
						{ issueKey: key, success },
						{
							success: `Successfully transitioned issue ${key} to ${status}`,
							failure: `Failed to transition issue ${key} to ${status}`,
						},
					);
				});
			},
		);

	return cmd;
}
