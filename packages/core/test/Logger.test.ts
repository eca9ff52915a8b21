import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	createLogger,
	Logger,
	LogLevel,
	parseLogLevel,
} from "../src/logger/Logger.js";

describe("parseLogLevel", () => {
	it("parses names case-insensitively", () => {
		expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
		expect(parseLogLevel(" Warning ")).toBe(LogLevel.WARN);
		expect(parseLogLevel("none")).toBe(LogLevel.SILENT);
	});

	it("returns undefined for unknown or empty values", () => {
		expect(parseLogLevel("verbose")).toBeUndefined();
		expect(parseLogLevel("")).toBeUndefined();
		expect(parseLogLevel(undefined)).toBeUndefined();
	});
});

function spyOnConsole() {
	return {
		log: vi.spyOn(console, "log").mockImplementation(() => {}),
		warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
		error: vi.spyOn(console, "error").mockImplementation(() => {}),
	};
}

describe("Logger", () => {
	let logSpy: ReturnType<typeof spyOnConsole>["log"];
	let warnSpy: ReturnType<typeof spyOnConsole>["warn"];
	let errorSpy: ReturnType<typeof spyOnConsole>["error"];

	beforeEach(() => {
		({ log: logSpy, warn: warnSpy, error: errorSpy } = spyOnConsole());
	});

	afterEach(() => {
		vi.restoreAllMocks();
		vi.unstubAllEnvs();
	});

	it("formats level, domain, message and context", () => {
		const log = new Logger({ level: LogLevel.DEBUG, timestamps: false });

		log.info("monitor", "Cycle finished", { matched: 2, channel: "C1" });

		expect(logSpy).toHaveBeenCalledWith(
			"INFO  [monitor] Cycle finished {matched=2, channel=C1}",
		);
	});

	it("uses the child's domain and merges default context", () => {
		const log = new Logger({ level: LogLevel.DEBUG, timestamps: false })
			.child("tracker", { channel: "C1" })
			.withContext({ run: 1 });

		log.debug("Watermark advanced", { ts: "5.0" });

		expect(logSpy).toHaveBeenCalledWith(
			"DEBUG [tracker] Watermark advanced {channel=C1, run=1, ts=5.0}",
		);
	});

	it("falls back to the system domain", () => {
		new Logger({ timestamps: false, level: LogLevel.INFO }).info("hello");
		expect(logSpy).toHaveBeenCalledWith("INFO  [system] hello");
	});

	it("routes warnings and errors to their console streams", () => {
		const log = new Logger({ level: LogLevel.DEBUG, timestamps: false });

		log.warn("responder", "slow");
		log.error("responder", "Error posting reply", {
			error: new Error("not_in_channel"),
			skipped: undefined,
		});

		expect(warnSpy).toHaveBeenCalledWith("WARN  [responder] slow");
		expect(errorSpy).toHaveBeenCalledWith(
			"ERROR [responder] Error posting reply {error=not_in_channel}",
		);
	});

	it("drops entries below the configured level", () => {
		const log = new Logger({ level: LogLevel.WARN, timestamps: false });

		log.info("hidden");
		log.debug("hidden");

		expect(logSpy).not.toHaveBeenCalled();
		expect(log.isDebugEnabled()).toBe(false);
	});

	it("filters by enabled domains", () => {
		const log = new Logger({
			level: LogLevel.DEBUG,
			timestamps: false,
			enabledDomains: ["source"],
		});

		log.info("monitor", "hidden");
		log.info("source", "shown");

		expect(logSpy).toHaveBeenCalledTimes(1);
		expect(logSpy).toHaveBeenCalledWith("INFO  [source] shown");
	});

	it("writes one JSON object per line in json mode", () => {
		const log = new Logger({ level: LogLevel.INFO, json: true });

		log.error("issues", "Failed", { issueKey: "TEST-1", error: new Error("boom") });

		const [line] = errorSpy.mock.calls[0] ?? [];
		expect(typeof line).toBe("string");
		const parsed: unknown = JSON.parse(String(line));
		expect(parsed).toMatchObject({
			level: "ERROR",
			domain: "issues",
			message: "Failed",
			issueKey: "TEST-1",
			error: "boom",
		});
	});

	it("reads level and domains from the environment", () => {
		vi.stubEnv("THREADWATCH_LOG_LEVEL", "error");
		vi.stubEnv("THREADWATCH_LOG_DOMAINS", "cli, bogus");

		const log = new Logger({ timestamps: false });
		log.warn("cli", "hidden");
		log.error("monitor", "hidden");
		log.error("cli", "shown");

		expect(log.getLevel()).toBe(LogLevel.ERROR);
		expect(warnSpy).not.toHaveBeenCalled();
		expect(errorSpy).toHaveBeenCalledTimes(1);
		expect(errorSpy).toHaveBeenCalledWith("ERROR [cli] shown");
	});

	it("prefixes a time of day when timestamps are on", () => {
		new Logger({ level: LogLevel.INFO, timestamps: true }).info("tick");

		expect(logSpy.mock.calls[0]?.[0]).toMatch(
			/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] INFO  \[system\] tick$/,
		);
	});

	it("createLogger binds a domain", () => {
		const log = createLogger("cli");
		log.setLevel(LogLevel.INFO);
		log.info("started");

		expect(String(logSpy.mock.calls[0]?.[0])).toContain("[cli] started");
	});
});
