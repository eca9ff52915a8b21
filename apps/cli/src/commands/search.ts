import { Command } from "commander";
import { loadJiraConfig } from "../config/jira.js";
import type { CliContext } from "../context.js";
import { outputFormatOf, printJson, runAction } from "../utils/output.js";

interface SearchOptions {
	maxResults?: string;
}

function parseMaxResults(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new Error(`--max-results must be a positive integer, got "${value}"`);
	}
	return parsed;
}

export function createSearchCommand(context: CliContext): Command {
	const cmd = new Command("search");

	cmd
		.description("Search for Jira issues with JQL")
		.argument("<jql>", "JQL query string")
		.option(
			"-m, --max-results <n>",
			"Maximum number of results (default: DEFAULT_MAX_RESULTS)",
		)
		.action(async (jql: string, options: SearchOptions, command: Command) => {
			await runAction(context, "searching issues", async () => {
				const { tracker, defaults } = loadJiraConfig(context.env);
				const maxResults =
					options.maxResults === undefined
						? defaults.maxResults
						: parseMaxResults(options.maxResults);

				const issues = await context
					.createIssueTracker(tracker)
					.searchIssues(jql, { maxResults });

				if (outputFormatOf(command) === "json") {
					printJson(context, issues);
					return;
				}
				context.io.stdout(`Found ${issues.length} issues:`);
				for (const issue of issues) {
					context.io.stdout(`  - ${issue.key}: ${issue.summary}`);
				}
			});
		});

	return cmd;
}
