import { type Logger, createLogger, sleep, toError } from "threadwatch-core";
import { ContextAssembler } from "./ContextAssembler.js";
import { KeywordFilter } from "./KeywordFilter.js";
import {
	MonitorEvent,
	MonitorState,
	MonitorStateMachine,
} from "./MonitorStateMachine.js";
import { Responder } from "./Responder.js";
import { ThreadClassifier } from "./ThreadClassifier.js";
import {
	type ChatMessage,
	type ComponentOptions,
	type CycleReport,
	type DispatchResult,
	type MessageSource,
	type MessageTs,
	type MonitorConfig,
	type ThreadClassification,
	ThreadVerdict,
} from "./types.js";
import { WatermarkTracker } from "./WatermarkTracker.js";

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface KeywordMonitorOptions extends ComponentOptions {
	config: MonitorConfig;
	source: MessageSource;
	/** Clock in epoch milliseconds, used for the first look-back window */
	now?: () => number;
	/** Cancellable wait; must resolve promptly once the signal aborts */
	sleep?: SleepFn;
}

/**
 * Polls one channel for the trigger keyword and answers each match in the
 * right thread.
 *
 * A cycle runs to completion (fetch, filter, classify, assemble, respond)
 * before the monitor sleeps. Only configuration problems are fatal; source
 * and dispatch failures are logged and polling continues.
 */
export class KeywordMonitor {
	private readonly config: MonitorConfig;
	private readonly tracker: WatermarkTracker;
	private readonly filter: KeywordFilter;
	private readonly classifier = new ThreadClassifier();
	private readonly assembler: ContextAssembler;
	private readonly responder: Responder;
	private readonly stateMachine: MonitorStateMachine;
	private readonly sleep: SleepFn;
	private readonly logger: Logger;
	private abortController?: AbortController;

	constructor(options: KeywordMonitorOptions) {
		const { config, source } = options;
		this.config = config;
		this.logger =
			options.logger ?? createLogger("monitor", { channel: config.channel });
		this.sleep = options.sleep ?? sleep;

		this.tracker = new WatermarkTracker({
			source,
			channel: config.channel,
			pollIntervalSeconds: config.pollIntervalSeconds,
			now: options.now,
			logger: this.logger.child("tracker"),
		});
		this.filter = new KeywordFilter(config.keyword);
		this.assembler = new ContextAssembler({
			source,
			channel: config.channel,
			logger: this.logger.child("source"),
		});
		this.responder = new Responder({
			source,
			channel: config.channel,
			keyword: config.keyword,
			threadAware: config.threadAware,
			logger: this.logger.child("responder"),
		});
		this.stateMachine = new MonitorStateMachine(
			MonitorState.Stopped,
			this.logger,
		);
	}

	getState(): MonitorState {
		return this.stateMachine.getState();
	}

	getWatermark(): MessageTs | null {
		return this.tracker.getWatermark();
	}

	/**
	 * One poll cycle. The watermark is committed by the fetch, before any
	 * reply is sent, so reply failures never hold it back.
	 */
	async runCycle(): Promise<CycleReport> {
		const batch = await this.tracker.fetchNew();
		const matches = this.filter.select(batch.messages);

		let replied = 0;
		let failed = 0;
		for (const message of matches) {
			const result = await this.handleMatch(message);
			if (result.ok) {
				replied++;
			} else {
				failed++;
			}
		}

		return {
			fetched: batch.messages.length,
			matched: matches.length,
			replied,
			failed,
			watermark: this.tracker.getWatermark(),
			sourceError: batch.error,
		};
	}

	/**
	 * Poll until `signal` aborts or {@link stop} is called.
	 */
	async run(signal?: AbortSignal): Promise<void> {
		this.stateMachine.transition(MonitorEvent.Start, true);

		const controller = new AbortController();
		this.abortController = controller;
		const onExternalAbort = (): void => controller.abort();
		if (signal?.aborted) {
			controller.abort();
		} else {
			signal?.addEventListener("abort", onExternalAbort, { once: true });
		}

		this.logger.info(
			`Starting monitor for keyword '${this.config.keyword}' in channel ${this.config.channel}`,
			{
				pollIntervalSeconds: this.config.pollIntervalSeconds,
				threadAware: this.config.threadAware,
			},
		);

		try {
			while (!controller.signal.aborted) {
				try {
					const report = await this.runCycle();
					if (report.matched > 0) {
						this.logger.info("Cycle finished", {
							fetched: report.fetched,
							matched: report.matched,
							replied: report.replied,
							failed: report.failed,
						});
					}
				} catch (error) {
					this.logger.error("Error in monitoring loop", {
						error: toError(error),
					});
				}
				if (controller.signal.aborted) break;

				this.stateMachine.transition(MonitorEvent.CycleComplete);
				await this.waitForNextCycle(controller.signal);
				if (controller.signal.aborted) break;
				this.stateMachine.transition(MonitorEvent.Wake);
			}
		} finally {
			signal?.removeEventListener("abort", onExternalAbort);
			this.stateMachine.transition(MonitorEvent.Stop);
			this.abortController = undefined;
			this.logger.info("Shutting down monitor", {
				watermark: this.tracker.getWatermark(),
			});
		}
	}

	/**
	 * Stop a running loop; takes effect between sleep slices at the latest
	 */
	stop(): void {
		this.abortController?.abort();
	}

	private async handleMatch(message: ChatMessage): Promise<DispatchResult> {
		const classification: ThreadClassification = this.config.threadAware
			? this.classifier.resolve(message)
			: { verdict: ThreadVerdict.Standalone };

		this.logger.debug("Processing message", {
			ts: message.ts,
			threadTs: message.threadTs,
			verdict: classification.verdict,
		});

		const context =
			classification.verdict === ThreadVerdict.Standalone
				? undefined
				: await this.assembler.assembleContext(classification.threadTs);

		return this.responder.respond(message, classification, context);
	}

	private async waitForNextCycle(signal: AbortSignal): Promise<void> {
		let remaining = this.config.pollIntervalSeconds;
		while (remaining > 0 && !signal.aborted) {
			if (remaining % 5 === 0 || remaining <= 5) {
				this.logger.debug(`Next check in ${remaining} seconds...`);
			}
			const slice = Math.min(this.config.sleepSliceSeconds, remaining);
			await this.sleep(slice * 1000, signal);
			remaining -= slice;
		}
	}
}
