import type { Logger } from "threadwatch-core";

/**
 * Platform message timestamp, e.g. "1704110400.000100".
 *
 * Unique per channel; serves as both message identity and ordering key.
 * Compare with {@link compareTs}, never as floats.
 */
export type MessageTs = string;

/**
 * One channel event as seen by the monitor
 */
export interface ChatMessage {
	ts: MessageTs;
	/** Message body (absent for joins, file shares and similar events) */
	text?: string;
	/** Author user ID (absent for some bot events) */
	user?: string;
	/**
	 * Root of the thread this message belongs to. Equal to `ts` on the root
	 * itself, absent when the message is not part of a thread.
	 */
	threadTs?: MessageTs;
}

export enum ThreadVerdict {
	Root = "root",
	Reply = "reply",
	Standalone = "standalone",
}

/**
 * Classifier output: threaded verdicts carry the id every reply must address
 */
export type ThreadClassification =
	| { verdict: ThreadVerdict.Standalone }
	| { verdict: ThreadVerdict.Root | ThreadVerdict.Reply; threadTs: MessageTs };

export interface PostedReply {
	/** Timestamp of the posted reply, when the platform returns one */
	ts?: MessageTs;
}

/**
 * Chat platform capabilities the monitor consumes
 */
export interface MessageSource {
	/** Messages at or after `oldest` (when `inclusive`), oldest first */
	fetchSince(
		channel: string,
		oldest: MessageTs,
		inclusive: boolean,
	): Promise<ChatMessage[]>;
	/** Every message of the thread rooted at `threadTs`, in chronological order */
	fetchThread(channel: string, threadTs: MessageTs): Promise<ChatMessage[]>;
	postReply(
		channel: string,
		text: string,
		threadTs: MessageTs,
	): Promise<PostedReply>;
}

/**
 * Startup options for one monitor run
 */
export interface MonitorConfig {
	channel: string;
	/** Trigger string, matched case-insensitively */
	keyword: string;
	pollIntervalSeconds: number;
	/**
	 * When false every match is answered as a new thread on the message
	 * itself, without classification or thread context.
	 */
	threadAware: boolean;
	/** Length of each interruptible slice of the inter-cycle sleep */
	sleepSliceSeconds: number;
}

export type DispatchResult =
	| { ok: true; threadTs: MessageTs; replyTs?: MessageTs }
	| { ok: false; threadTs: MessageTs; error: Error };

/**
 * Summary of one poll cycle
 */
export interface CycleReport {
	fetched: number;
	matched: number;
	replied: number;
	failed: number;
	/** Watermark after the cycle committed */
	watermark: MessageTs | null;
	sourceError?: Error;
}

export interface ComponentOptions {
	logger?: Logger;
}
