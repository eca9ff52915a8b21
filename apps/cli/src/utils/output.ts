import type { Command } from "commander";
import { ThreadwatchError, toError } from "threadwatch-core";
import type { CliContext } from "../context.js";

export type OutputFormat = "text" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json"];

/**
 * Read the global -o/--output-format option from any subcommand
 */
export function outputFormatOf(command: Command): OutputFormat {
	const value: unknown = command.optsWithGlobals().outputFormat;
	return value === "json" ? "json" : "text";
}

export function printJson(context: CliContext, value: unknown): void {
	context.io.stdout(JSON.stringify(value, null, 2));
}

/**
 * Run a command body, turning any failure into an error line on stderr and
 * exit code 1
 *
 * @param activity - what the command was doing, e.g. "creating issue"
 */
export async function runAction(
	context: CliContext,
	activity: string,
	action: () => Promise<void>,
): Promise<void> {
	try {
		await action();
	} catch (error) {
		const err = toError(error);
		context.io.stderr(
			err instanceof ThreadwatchError && err.isFatal()
				? `Configuration error: ${err.message}`
				: `Error ${activity}: ${err.message}`,
		);
		process.exitCode = 1;
	}
}

/**
 * Report a boolean ticketing result in the chosen format
 */
export function reportOutcome(
	context: CliContext,
	format: OutputFormat,
	outcome: { issueKey: string; success: boolean },
	messages: { success: string; failure: string },
): void {
	if (format === "json") {
		printJson(context, outcome);
	} else if (outcome.success) {
		context.io.stdout(messages.success);
	} else {
		context.io.stderr(messages.failure);
	}
	if (!outcome.success) {
		process.exitCode = 1;
	}
}

export function parseLabels(value: string | undefined): string[] | undefined {
	if (value === undefined) return undefined;
	return value
		.split(",")
		.map((label) => label.trim())
		.filter((label) => label.length > 0);
}
