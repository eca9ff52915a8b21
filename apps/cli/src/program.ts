import { Command, Option } from "commander";
import { createAddCommentCommand } from "./commands/addComment.js";
import { createCreateIssueCommand } from "./commands/createIssue.js";
import { createGetIssueCommand } from "./commands/getIssue.js";
import { createMonitorCommand } from "./commands/monitor.js";
import { createSearchCommand } from "./commands/search.js";
import { createTransitionCommand } from "./commands/transition.js";
import { createUpdateIssueCommand } from "./commands/updateIssue.js";
import { type CliContext, createDefaultContext } from "./context.js";
import { OUTPUT_FORMATS } from "./utils/output.js";

export function createProgram(
	context: CliContext = createDefaultContext(),
): Command {
	const program = new Command();

	program
		.name("threadwatch")
		.description(
			"Answer keyword mentions in a Slack channel and manage Jira issues",
		)
		.version("0.1.0")
		.addOption(
			new Option("-o, --output-format <format>", "Output format")
				.choices(OUTPUT_FORMATS)
				.default("text"),
		);

	// Slack
	program.addCommand(createMonitorCommand(context));

	// Jira
	program.addCommand(createCreateIssueCommand(context));
	program.addCommand(createSearchCommand(context));
	program.addCommand(createGetIssueCommand(context));
	program.addCommand(createAddCommentCommand(context));
	program.addCommand(createUpdateIssueCommand(context));
	program.addCommand(createTransitionCommand(context));

	return program;
}
