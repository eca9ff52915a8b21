import { type Logger, createLogger, toError } from "threadwatch-core";
import { compareTs, maxTs, tsBefore } from "./timestamps.js";
import type {
	ChatMessage,
	ComponentOptions,
	MessageSource,
	MessageTs,
} from "./types.js";

export interface WatermarkTrackerOptions extends ComponentOptions {
	source: MessageSource;
	channel: string;
	pollIntervalSeconds: number;
	/** Clock in epoch milliseconds */
	now?: () => number;
}

/**
 * Result of one fetch. `error` is set when the source failed; the batch is
 * then empty and the watermark untouched.
 */
export interface PollBatch {
	messages: ChatMessage[];
	error?: Error;
}

/**
 * Owns the boundary between already-seen and new messages.
 *
 * The watermark starts unset, only ever moves forward, and is committed once
 * per fetch to the highest ts in the surviving batch. It lives in memory
 * only; a restart re-reads the bootstrap window of two poll intervals.
 */
export class WatermarkTracker {
	private watermark: MessageTs | null = null;
	private readonly source: MessageSource;
	private readonly channel: string;
	private readonly pollIntervalSeconds: number;
	private readonly now: () => number;
	private readonly logger: Logger;

	constructor(options: WatermarkTrackerOptions) {
		this.source = options.source;
		this.channel = options.channel;
		this.pollIntervalSeconds = options.pollIntervalSeconds;
		this.now = options.now ?? Date.now;
		this.logger = options.logger ?? createLogger("tracker");
	}

	getWatermark(): MessageTs | null {
		return this.watermark;
	}

	/**
	 * Lower bound for the next request: the watermark, or a look-back of two
	 * poll intervals before the first commit
	 */
	lowerBound(): MessageTs {
		return (
			this.watermark ?? tsBefore(this.now(), this.pollIntervalSeconds * 2)
		);
	}

	/**
	 * Fetch messages newer than the watermark, in the order the source
	 * returned them, and commit the new watermark.
	 */
	async fetchNew(): Promise<PollBatch> {
		const oldest = this.lowerBound();

		let received: ChatMessage[];
		try {
			// Inclusive request; the boundary message is dropped below
			received = await this.source.fetchSince(this.channel, oldest, true);
		} catch (error) {
			const err = toError(error);
			this.logger.error("Message source unavailable, treating as no new messages", {
				channel: this.channel,
				oldest,
				error: err,
			});
			return { messages: [], error: err };
		}

		const current = this.watermark;
		const fresh =
			current === null
				? received
				: received.filter((message) => compareTs(message.ts, current) > 0);

		// Commit after the whole batch so out-of-order deliveries still pass
		const highest = maxTs(fresh.map((message) => message.ts));
		if (highest !== null && (current === null || compareTs(highest, current) > 0)) {
			this.watermark = highest;
			this.logger.debug("Watermark advanced", {
				channel: this.channel,
				from: current,
				ts: highest,
			});
		}

		if (received.length !== fresh.length) {
			this.logger.debug("Dropped already-seen messages", {
				channel: this.channel,
				dropped: received.length - fresh.length,
			});
		}

		return { messages: fresh };
	}
}
