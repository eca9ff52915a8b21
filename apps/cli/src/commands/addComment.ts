import { Command } from "commander";
import { loadJiraConfig } from "../config/jira.js";
import type { CliContext } from "../context.js";
import { outputFormatOf, reportOutcome, runAction } from "../utils/output.js";

export function createAddCommentCommand(context: CliContext): Command {
	const cmd = new Command("add-comment");

	cmd
		.description("Add a comment to a Jira issue")
		.argument("<key>", "Issue key (e.g., PROJ-123)")
		.argument("<comment>", "Comment text")
		.action(
			async (key: string, comment: string, _options: unknown, command: Command) => {
				await runAction(context, "adding comment", async () => {
					const { tracker } = loadJiraConfig(context.env);
					const success = await context
						.createIssueTracker(tracker)
						.addComment(key, comment);

					reportOutcome(
						context,
						outputFormatOf(command),
						{ issueKey: key, success },
						{
							success: `Successfully added comment to issue ${key}`,
							failure: `Failed to add comment to issue ${key}`,
						},
					);
				});
			},
		);

	return cmd;
}
