/**
 * Shared test fixtures for the slack monitor tests
 */
import { Logger, LogLevel } from "threadwatch-core";
import type {
	ChatMessage,
	MessageSource,
	MessageTs,
	MonitorConfig,
	PostedReply,
} from "../src/types.js";

export const silentLogger = new Logger({ level: LogLevel.SILENT });

export const testConfig: MonitorConfig = {
	channel: "C9876543210",
	keyword: "bugbot",
	pollIntervalSeconds: 30,
	threadAware: true,
	sleepSliceSeconds: 5,
};

export function makeMessage(
	ts: MessageTs,
	overrides: Partial<ChatMessage> = {},
): ChatMessage {
	return { ts, text: `message ${ts}`, user: "U1234567890", ...overrides };
}

export interface RecordedPost {
	channel: string;
	text: string;
	threadTs: MessageTs;
}

/**
 * In-memory message source. History responses are consumed one per call;
 * once exhausted every call returns an empty batch.
 */
export class FakeMessageSource implements MessageSource {
	readonly historyCalls: Array<{
		channel: string;
		oldest: MessageTs;
		inclusive: boolean;
	}> = [];
	readonly threadCalls: Array<{ channel: string; threadTs: MessageTs }> = [];
	readonly posts: RecordedPost[] = [];
	private readonly history: Array<ChatMessage[] | Error> = [];
	private readonly threads = new Map<MessageTs, ChatMessage[] | Error>();
	private readonly failingThreads = new Set<MessageTs>();

	queueHistory(...batches: Array<ChatMessage[] | Error>): this {
		this.history.push(...batches);
		return this;
	}

	setThread(threadTs: MessageTs, messages: ChatMessage[] | Error): this {
		this.threads.set(threadTs, messages);
		return this;
	}

	failPostsTo(threadTs: MessageTs): this {
		this.failingThreads.add(threadTs);
		return this;
	}

	async fetchSince(
		channel: string,
		oldest: MessageTs,
		inclusive: boolean,
	): Promise<ChatMessage[]> {
		this.historyCalls.push({ channel, oldest, inclusive });
		const next = this.history.shift() ?? [];
		if (next instanceof Error) {
			throw next;
		}
		return next;
	}

	async fetchThread(
		channel: string,
		threadTs: MessageTs,
	): Promise<ChatMessage[]> {
		this.threadCalls.push({ channel, threadTs });
		const thread = this.threads.get(threadTs) ?? [];
		if (thread instanceof Error) {
			throw thread;
		}
		return thread;
	}

	async postReply(
		channel: string,
		text: string,
		threadTs: MessageTs,
	): Promise<PostedReply> {
		if (this.failingThreads.has(threadTs)) {
			throw new Error(`post to ${threadTs} rejected`);
		}
		this.posts.push({ channel, text, threadTs });
		return { ts: `9000000000.${String(this.posts.length).padStart(6, "0")}` };
	}
}
