import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigurationError } from "threadwatch-core";
import type { MonitorConfig } from "threadwatch-slack-monitor";
import { z } from "zod";

const MonitorEnvSchema = z.object({
	SLACK_BOT_TOKEN: z.string().optional(),
	SLACK_BOT_TOKEN_FILE: z.string().optional(),
	CHANNEL_ID: z.string().optional(),
	THREADWATCH_KEYWORD: z.string().optional(),
	THREADWATCH_POLL_INTERVAL: z.string().optional(),
});

const PollIntervalSchema = z.coerce.number().int().min(1);

export const DEFAULT_TOKEN_FILE = "SLACK_BOT_KEY.txt";
export const DEFAULT_CHANNEL_FILE = "CHANNEL_ID.txt";
export const DEFAULT_KEYWORD = "bugbot";
export const DEFAULT_POLL_INTERVAL_SECONDS = 30;
const SLEEP_SLICE_SECONDS = 5;

/**
 * Values given on the command line; each wins over the environment
 */
export interface MonitorOverrides {
	channel?: string;
	channelFile?: string;
	keyword?: string;
	interval?: string;
	tokenFile?: string;
	/** Plain acknowledgements, no thread handling */
	simple?: boolean;
}

export interface MonitorSettings {
	token: string;
	monitor: MonitorConfig;
}

function present(value: string | undefined): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}

function readLines(path: string): string[] | undefined {
	if (!existsSync(path)) {
		return undefined;
	}
	return readFileSync(path, "utf-8")
		.split(/\r?\n/)
		.map((line) => line.trim());
}

function resolveToken(
	env: z.infer<typeof MonitorEnvSchema>,
	overrides: MonitorOverrides,
	cwd: string,
): string {
	const fromEnv = present(env.SLACK_BOT_TOKEN);
	if (fromEnv) {
		return fromEnv;
	}

	const path = resolve(
		cwd,
		overrides.tokenFile ?? present(env.SLACK_BOT_TOKEN_FILE) ?? DEFAULT_TOKEN_FILE,
	);
	const token = readLines(path)?.[0];
	if (!token) {
		throw new ConfigurationError(
			`Slack bot token not found: set SLACK_BOT_TOKEN or put the token on the first line of ${path}`,
			"SLACK_BOT_TOKEN",
		);
	}
	return token;
}

function resolveChannel(
	env: z.infer<typeof MonitorEnvSchema>,
	overrides: MonitorOverrides,
	cwd: string,
): string {
	const fromFlag = present(overrides.channel);
	if (fromFlag) {
		return fromFlag;
	}

	const path = resolve(cwd, overrides.channelFile ?? DEFAULT_CHANNEL_FILE);
	const fromFile = readLines(path)?.find((line) => line.length > 0);
	const channel = fromFile ?? present(env.CHANNEL_ID);
	if (!channel) {
		throw new ConfigurationError(
			`Channel ID not found: pass --channel, create ${path}, or set CHANNEL_ID`,
			"CHANNEL_ID",
		);
	}
	return channel;
}

/**
 * Resolve monitor settings from flags, the environment and the token and
 * channel files in `cwd`.
 *
 * @throws ConfigurationError when the token or channel is missing or a value is invalid
 */
export function loadMonitorConfig(
	overrides: MonitorOverrides = {},
	rawEnv: NodeJS.ProcessEnv = process.env,
	cwd: string = process.cwd(),
): MonitorSettings {
	const env = MonitorEnvSchema.parse(rawEnv);

	const keyword =
		present(overrides.keyword) ??
		present(env.THREADWATCH_KEYWORD) ??
		DEFAULT_KEYWORD;

	const rawInterval =
		present(overrides.interval) ??
		present(env.THREADWATCH_POLL_INTERVAL) ??
		String(DEFAULT_POLL_INTERVAL_SECONDS);
	const interval = PollIntervalSchema.safeParse(rawInterval);
	if (!interval.success) {
		throw new ConfigurationError(
			`Invalid poll interval "${rawInterval}": expected a whole number of seconds, at least 1`,
			"pollIntervalSeconds",
		);
	}

	return {
		token: resolveToken(env, overrides, cwd),
		monitor: {
			channel: resolveChannel(env, overrides, cwd),
			keyword,
			pollIntervalSeconds: interval.data,
			threadAware: !overrides.simple,
			sleepSliceSeconds: SLEEP_SLICE_SECONDS,
		},
	};
}
