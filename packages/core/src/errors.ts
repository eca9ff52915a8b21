/**
 * Error codes shared across the monitor, the ticketing client and the CLI
 */
export enum ThreadwatchErrorCode {
	/** History or thread fetch against the chat platform failed */
	SOURCE_UNAVAILABLE = "SOURCE_UNAVAILABLE",

	/** Posting a reply failed */
	DISPATCH_FAILURE = "DISPATCH_FAILURE",

	/** Missing credential, channel or invalid option at startup */
	CONFIGURATION = "CONFIGURATION",

	/** Ticketing API call failed */
	ISSUE_TRACKER = "ISSUE_TRACKER",

	UNKNOWN = "UNKNOWN",
}

/**
 * Base error class carrying a code, structured details and the original cause
 */
export class ThreadwatchError extends Error {
	constructor(
		public readonly code: ThreadwatchErrorCode,
		message: string,
		public readonly details?: Record<string, unknown>,
		public readonly cause?: Error,
	) {
		super(message);
		this.name = "ThreadwatchError";

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}

	toDetailedString(): string {
		let msg = `${this.name} [${this.code}]: ${this.message}`;
		if (this.details && Object.keys(this.details).length > 0) {
			msg += `\nDetails: ${JSON.stringify(this.details, null, 2)}`;
		}
		if (this.cause) {
			msg += `\nCaused by: ${this.cause.message}`;
		}
		return msg;
	}

	/**
	 * Only configuration errors stop the process; everything else is logged
	 * and the monitor keeps polling.
	 */
	isFatal(): boolean {
		return this.code === ThreadwatchErrorCode.CONFIGURATION;
	}
}

/**
 * The message source could not be reached (history or thread fetch)
 */
export class SourceUnavailableError extends ThreadwatchError {
	constructor(
		message: string,
		public readonly channel?: string,
		originalError?: Error,
	) {
		super(
			ThreadwatchErrorCode.SOURCE_UNAVAILABLE,
			message,
			{ channel },
			originalError,
		);
		this.name = "SourceUnavailableError";
	}
}

/**
 * A reply could not be posted
 */
export class DispatchFailureError extends ThreadwatchError {
	constructor(
		message: string,
		public readonly threadTs?: string,
		originalError?: Error,
	) {
		super(
			ThreadwatchErrorCode.DISPATCH_FAILURE,
			message,
			{ threadTs },
			originalError,
		);
		this.name = "DispatchFailureError";
	}
}

export class ConfigurationError extends ThreadwatchError {
	constructor(
		message: string,
		public readonly setting?: string,
		originalError?: Error,
	) {
		super(
			ThreadwatchErrorCode.CONFIGURATION,
			message,
			{ setting },
			originalError,
		);
		this.name = "ConfigurationError";
	}
}

export class IssueTrackerError extends ThreadwatchError {
	constructor(
		message: string,
		public readonly issueKey?: string,
		originalError?: Error,
	) {
		super(
			ThreadwatchErrorCode.ISSUE_TRACKER,
			message,
			{ issueKey },
			originalError,
		);
		this.name = "IssueTrackerError";
	}
}

/**
 * Normalise a thrown value into an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
