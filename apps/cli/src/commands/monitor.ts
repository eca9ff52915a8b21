import { Command } from "commander";
import { createLogger } from "threadwatch-core";
import { loadMonitorConfig } from "../config/monitor.js";
import type { CliContext } from "../context.js";
import { runAction } from "../utils/output.js";

interface MonitorCommandOptions {
	channel?: string;
	channelFile?: string;
	keyword?: string;
	interval?: string;
	tokenFile?: string;
	simple?: boolean;
}

const logger = createLogger("cli");

export function createMonitorCommand(context: CliContext): Command {
	const cmd = new Command("monitor");

	cmd
		.description(
			"Poll a Slack channel for the keyword and reply in the right thread",
		)
		.option("--channel <id>", "Channel ID (overrides the channel file)")
		.option(
			"--channel-file <path>",
			"File whose first non-empty line is the channel ID",
		)
		.option("--keyword <keyword>", "Trigger keyword (default: bugbot)")
		.option("--interval <seconds>", "Seconds between polls (default: 30)")
		.option(
			"--token-file <path>",
			"File whose first line is the bot token, used when SLACK_BOT_TOKEN is unset",
		)
		.option("--simple", "Reply with a plain acknowledgement, no thread handling")
		.action(async (options: MonitorCommandOptions) => {
			await runAction(context, "running monitor", async () => {
				const settings = loadMonitorConfig(options, context.env, context.cwd);
				const monitor = context.createMonitor(settings);

				const controller = new AbortController();
				const dispose = context.onShutdown(() => {
					logger.info("Shutdown signal received");
					controller.abort();
				});
				try {
					await monitor.run(controller.signal);
				} finally {
					dispose();
				}
			});
		});

	return cmd;
}
