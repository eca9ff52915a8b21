export {
	ConfigurationError,
	DispatchFailureError,
	IssueTrackerError,
	SourceUnavailableError,
	ThreadwatchError,
	ThreadwatchErrorCode,
	toError,
} from "./errors.js";
export type {
	LogContext,
	LogDomain,
	LoggerConfig,
} from "./logger/Logger.js";
export {
	createLogger,
	Logger,
	LogLevel,
	logger,
	parseLogLevel,
} from "./logger/Logger.js";
export { sleep } from "./utils/sleep.js";
