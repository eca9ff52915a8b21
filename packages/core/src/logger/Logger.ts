/**
 * Log levels in order of severity (lower = more verbose)
 */
export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	SILENT = 4,
}

/**
 * Log domains for categorizing and filtering logs
 */
export type LogDomain =
	| "monitor" // Poll loop lifecycle and state transitions
	| "tracker" // Watermark bookkeeping
	| "source" // Chat platform API calls (history, replies)
	| "responder" // Reply composition and dispatch
	| "issues" // Ticketing API calls
	| "config" // Configuration loading
	| "cli" // Command line entry points
	| "system"; // Startup, shutdown

const LOG_DOMAINS: readonly LogDomain[] = [
	"monitor",
	"tracker",
	"source",
	"responder",
	"issues",
	"config",
	"cli",
	"system",
];

/**
 * Structured context that can be attached to log messages
 */
export interface LogContext {
	/** Channel being monitored */
	channel?: string;
	/** Message timestamp the entry is about */
	ts?: string;
	/** Ticket key (e.g., "PROJ-123") */
	issueKey?: string;
	/** Duration in milliseconds for timing operations */
	durationMs?: number;
	[key: string]: unknown;
}

export interface LoggerConfig {
	/** Minimum level to output (defaults to INFO, or THREADWATCH_LOG_LEVEL) */
	level?: LogLevel;
	/** Only show logs from these domains (all when unset) */
	enabledDomains?: LogDomain[];
	/** Prefix lines with a time of day (defaults to true) */
	timestamps?: boolean;
	/** One JSON object per line instead of human-readable text */
	json?: boolean;
}

interface LogEntry {
	level: LogLevel;
	domain: LogDomain;
	message: string;
	context?: LogContext;
	timestamp: Date;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
	[LogLevel.SILENT]: "SILENT",
};

/**
 * Parse log level from string (case-insensitive)
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
	if (!value) return undefined;
	switch (value.trim().toUpperCase()) {
		case "DEBUG":
			return LogLevel.DEBUG;
		case "INFO":
			return LogLevel.INFO;
		case "WARN":
		case "WARNING":
			return LogLevel.WARN;
		case "ERROR":
			return LogLevel.ERROR;
		case "SILENT":
		case "NONE":
			return LogLevel.SILENT;
		default:
			return undefined;
	}
}

function isValidDomain(domain: string): domain is LogDomain {
	return LOG_DOMAINS.some((d) => d === domain);
}

/**
 * Parse enabled domains from a comma-separated string, dropping unknown names
 */
function parseEnabledDomains(
	value: string | undefined,
): LogDomain[] | undefined {
	if (!value) return undefined;
	const domains = value
		.split(",")
		.map((d) => d.trim().toLowerCase())
		.filter(isValidDomain);
	return domains.length > 0 ? domains : undefined;
}

function formatContextValue(value: unknown): string {
	if (value instanceof Error) {
		return value.message;
	}
	return typeof value === "object" ? JSON.stringify(value) : String(value);
}

/**
 * Structured logger shared by the monitor, the ticketing client and the CLI.
 *
 * Environment variables:
 * - THREADWATCH_LOG_LEVEL: minimum level (DEBUG, INFO, WARN, ERROR, SILENT)
 * - THREADWATCH_LOG_DOMAINS: comma-separated domains to show (e.g., "monitor,source")
 * - THREADWATCH_LOG_JSON: "true" for one JSON object per line
 * - THREADWATCH_LOG_TIMESTAMPS: "false" to drop timestamps
 *
 * ```typescript
 * const log = createLogger("monitor", { channel: "C0123" });
 * log.info("Cycle finished", { matched: 2 });
 * log.debug("tracker", "Watermark advanced", { ts: "1704110400.000100" });
 * ```
 */
export class Logger {
	private level: LogLevel;
	private enabledDomains: LogDomain[] | undefined;
	private timestamps: boolean;
	private json: boolean;
	private defaultDomain: LogDomain | undefined;
	private defaultContext: LogContext = {};

	constructor(config: LoggerConfig = {}) {
		// Explicit config wins over the environment
		this.level =
			config.level ??
			parseLogLevel(process.env.THREADWATCH_LOG_LEVEL) ??
			LogLevel.INFO;
		this.enabledDomains =
			config.enabledDomains ??
			parseEnabledDomains(process.env.THREADWATCH_LOG_DOMAINS);
		this.timestamps =
			config.timestamps ?? process.env.THREADWATCH_LOG_TIMESTAMPS !== "false";
		this.json = config.json ?? process.env.THREADWATCH_LOG_JSON === "true";
	}

	debug(domain: LogDomain, message: string, context?: LogContext): void;
	debug(message: string, context?: LogContext): void;
	debug(
		domainOrMessage: string,
		messageOrContext?: string | LogContext,
		context?: LogContext,
	): void {
		this.log(LogLevel.DEBUG, domainOrMessage, messageOrContext, context);
	}

	info(domain: LogDomain, message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	info(
		domainOrMessage: string,
		messageOrContext?: string | LogContext,
		context?: LogContext,
	): void {
		this.log(LogLevel.INFO, domainOrMessage, messageOrContext, context);
	}

	warn(domain: LogDomain, message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	warn(
		domainOrMessage: string,
		messageOrContext?: string | LogContext,
		context?: LogContext,
	): void {
		this.log(LogLevel.WARN, domainOrMessage, messageOrContext, context);
	}

	error(domain: LogDomain, message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
	error(
		domainOrMessage: string,
		messageOrContext?: string | LogContext,
		context?: LogContext,
	): void {
		this.log(LogLevel.ERROR, domainOrMessage, messageOrContext, context);
	}

	/**
	 * Child logger bound to a domain, with extra default context
	 */
	child(domain: LogDomain, context?: LogContext): Logger {
		const child = this.clone();
		child.defaultDomain = domain;
		child.defaultContext = { ...this.defaultContext, ...context };
		return child;
	}

	/**
	 * Child logger with additional context (same domain)
	 */
	withContext(context: LogContext): Logger {
		const child = this.clone();
		child.defaultDomain = this.defaultDomain;
		child.defaultContext = { ...this.defaultContext, ...context };
		return child;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	isDebugEnabled(): boolean {
		return this.level <= LogLevel.DEBUG;
	}

	private clone(): Logger {
		return new Logger({
			level: this.level,
			enabledDomains: this.enabledDomains,
			timestamps: this.timestamps,
			json: this.json,
		});
	}

	private log(
		level: LogLevel,
		domainOrMessage: string,
		messageOrContext: string | LogContext | undefined,
		context: LogContext | undefined,
	): void {
		let domain: LogDomain;
		let message: string;
		let ctx: LogContext | undefined;
		if (isValidDomain(domainOrMessage) && typeof messageOrContext === "string") {
			domain = domainOrMessage;
			message = messageOrContext;
			ctx = context;
		} else {
			domain = this.defaultDomain ?? "system";
			message = domainOrMessage;
			ctx = typeof messageOrContext === "string" ? context : messageOrContext;
		}

		if (level < this.level) return;
		if (this.enabledDomains && !this.enabledDomains.includes(domain)) return;

		this.output({ level, domain, message, context: ctx, timestamp: new Date() });
	}

	private output(entry: LogEntry): void {
		const fullContext: LogContext = { ...this.defaultContext, ...entry.context };
		const contextEntries = Object.entries(fullContext).filter(
			([, value]) => value !== undefined && value !== null,
		);

		let line: string;
		if (this.json) {
			line = JSON.stringify({
				timestamp: entry.timestamp.toISOString(),
				level: LEVEL_NAMES[entry.level],
				domain: entry.domain,
				message: entry.message,
				...Object.fromEntries(
					contextEntries.map(([key, value]) => [
						key,
						value instanceof Error ? value.message : value,
					]),
				),
			});
		} else {
			const parts: string[] = [];
			if (this.timestamps) {
				parts.push(`[${entry.timestamp.toISOString().slice(11, 23)}]`);
			}
			parts.push(LEVEL_NAMES[entry.level].padEnd(5));
			parts.push(`[${entry.domain}]`);
			parts.push(entry.message);
			if (contextEntries.length > 0) {
				const pairs = contextEntries.map(
					([key, value]) => `${key}=${formatContextValue(value)}`,
				);
				parts.push(`{${pairs.join(", ")}}`);
			}
			line = parts.join(" ");
		}

		if (entry.level >= LogLevel.ERROR) {
			console.error(line);
		} else if (entry.level >= LogLevel.WARN) {
			console.warn(line);
		} else {
			console.log(line);
		}
	}
}

/**
 * Process-wide root logger
 */
export const logger = new Logger();

/**
 * Create a domain-specific child of the root logger
 */
export function createLogger(domain: LogDomain, context?: LogContext): Logger {
	return logger.child(domain, context);
}
