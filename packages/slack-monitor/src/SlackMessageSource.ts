import {
	DispatchFailureError,
	type Logger,
	SourceUnavailableError,
	createLogger,
	toError,
} from "threadwatch-core";
import type { SlackMessage } from "./schemas.js";
import { SlackMessageService } from "./SlackMessageService.js";
import type {
	ChatMessage,
	ComponentOptions,
	MessageSource,
	MessageTs,
	PostedReply,
} from "./types.js";

export interface SlackMessageSourceOptions extends ComponentOptions {
	/** Slack Bot OAuth token */
	token: string;
	service?: SlackMessageService;
	/** Page size for history fetches; all pages are read */
	historyPageSize?: number;
	/** Page budget for one thread fetch */
	threadLimit?: number;
}

export function toChatMessage(message: SlackMessage): ChatMessage {
	return {
		ts: message.ts,
		text: message.text,
		user: message.user,
		threadTs: message.thread_ts,
	};
}

/**
 * {@link MessageSource} backed by the Slack Web API.
 *
 * Failures surface as {@link SourceUnavailableError} for reads and
 * {@link DispatchFailureError} for posts, wrapping the service error.
 */
export class SlackMessageSource implements MessageSource {
	private readonly token: string;
	private readonly service: SlackMessageService;
	private readonly historyPageSize: number | undefined;
	private readonly threadLimit: number | undefined;
	private readonly logger: Logger;

	constructor(options: SlackMessageSourceOptions) {
		this.token = options.token;
		this.service = options.service ?? new SlackMessageService();
		this.historyPageSize = options.historyPageSize;
		this.threadLimit = options.threadLimit;
		this.logger = options.logger ?? createLogger("source");
	}

	async fetchSince(
		channel: string,
		oldest: MessageTs,
		inclusive: boolean,
	): Promise<ChatMessage[]> {
		try {
			const messages = await this.service.fetchHistory({
				token: this.token,
				channel,
				oldest,
				inclusive,
				limit: this.historyPageSize,
			});
			this.logger.debug("Fetched channel history", {
				channel,
				oldest,
				count: messages.length,
			});
			// conversations.history returns newest first
			return messages.map(toChatMessage).reverse();
		} catch (error) {
			throw new SourceUnavailableError(
				`Failed to fetch messages for channel ${channel}`,
				channel,
				toError(error),
			);
		}
	}

	async fetchThread(
		channel: string,
		threadTs: MessageTs,
	): Promise<ChatMessage[]> {
		try {
			const messages = await this.service.fetchThreadMessages({
				token: this.token,
				channel,
				thread_ts: threadTs,
				limit: this.threadLimit,
			});
			return messages.map(toChatMessage);
		} catch (error) {
			throw new SourceUnavailableError(
				`Failed to fetch thread ${threadTs} in channel ${channel}`,
				channel,
				toError(error),
			);
		}
	}

	async postReply(
		channel: string,
		text: string,
		threadTs: MessageTs,
	): Promise<PostedReply> {
		try {
			const { ts } = await this.service.postMessage({
				token: this.token,
				channel,
				text,
				thread_ts: threadTs,
			});
			return { ts };
		} catch (error) {
			throw new DispatchFailureError(
				`Failed to post reply to thread ${threadTs}`,
				threadTs,
				toError(error),
			);
		}
	}
}
