/**
 * Service for reading and posting Slack channel messages.
 *
 * Uses the Slack Web API with a bot token: channel history and thread
 * replies for polling, chat.postMessage for answering in a thread.
 */

import type { z } from "zod";
import {
	type SlackMessage,
	SlackPagedMessagesResponseSchema,
	SlackPostMessageResponseSchema,
} from "./schemas.js";

/**
 * Parameters for fetching channel history from Slack
 */
export interface SlackFetchHistoryParams {
	/** Slack Bot OAuth token */
	token: string;
	channel: string;
	/** Only messages after this timestamp */
	oldest: string;
	/** Include the message whose ts equals `oldest` */
	inclusive?: boolean;
	/** Messages per page (default 200); every page is fetched */
	limit?: number;
}

/**
 * Parameters for fetching thread messages from Slack
 */
export interface SlackFetchThreadParams {
	/** Slack Bot OAuth token */
	token: string;
	/** Channel ID containing the thread */
	channel: string;
	/** Timestamp of the thread parent message */
	thread_ts: string;
	/** Maximum number of messages to fetch (default 100) */
	limit?: number;
}

/**
 * Parameters for posting a message to Slack
 */
export interface SlackPostMessageParams {
	/** Slack Bot OAuth token */
	token: string;
	/** Channel ID to post the message in */
	channel: string;
	/** Message text */
	text: string;
	/** Thread timestamp to reply in a thread */
	thread_ts?: string;
}

/** Slack caps a single page at 200 messages */
const MAX_PAGE_SIZE = 200;

export class SlackMessageService {
	private apiBaseUrl: string;

	constructor(apiBaseUrl?: string) {
		this.apiBaseUrl = apiBaseUrl ?? "https://slack.com/api";
	}

	/**
	 * Post a message to a Slack channel. Returns the ts of the new message.
	 *
	 * @see https://api.slack.com/methods/chat.postMessage
	 */
	async postMessage(
		params: SlackPostMessageParams,
	): Promise<{ ts: string | undefined }> {
		const { token, channel, text, thread_ts } = params;

		const body: Record<string, string> = { channel, text };
		if (thread_ts) {
			body.thread_ts = thread_ts;
		}

		const response = await fetch(`${this.apiBaseUrl}/chat.postMessage`, {
			method: "POST",
			headers: {
				Authorization: `Bearer ${token}`,
				"Content-Type": "application/json",
			},
			body: JSON.stringify(body),
		});

		const responseBody = await this.readBody(
			response,
			SlackPostMessageResponseSchema,
			"post message",
		);
		return { ts: responseBody.ts };
	}

	/**
	 * Fetch every channel message newer than `oldest`, newest first (Slack
	 * order). `limit` sets the page size; pages are followed until Slack
	 * reports no more.
	 *
	 * @see https://api.slack.com/methods/conversations.history
	 */
	async fetchHistory(params: SlackFetchHistoryParams): Promise<SlackMessage[]> {
		const { token, channel, oldest, inclusive = false, limit = 200 } = params;
		return this.fetchPaged(
			"conversations.history",
			token,
			{ channel, oldest, inclusive: String(inclusive) },
			Math.min(limit, MAX_PAGE_SIZE),
			undefined,
			"fetch channel history",
		);
	}

	/**
	 * Fetch all messages in a Slack thread using cursor-based pagination.
	 *
	 * @see https://api.slack.com/methods/conversations.replies
	 */
	async fetchThreadMessages(
		params: SlackFetchThreadParams,
	): Promise<SlackMessage[]> {
		const { token, channel, thread_ts, limit = 100 } = params;
		return this.fetchPaged(
			"conversations.replies",
			token,
			{ channel, ts: thread_ts },
			Math.min(limit, MAX_PAGE_SIZE),
			limit,
			"fetch thread messages",
		);
	}

	private async fetchPaged(
		method: string,
		token: string,
		query: Record<string, string>,
		pageSize: number,
		maxMessages: number | undefined,
		operation: string,
	): Promise<SlackMessage[]> {
		const messages: SlackMessage[] = [];
		let cursor: string | undefined;

		while (maxMessages === undefined || messages.length < maxMessages) {
			const remaining =
				maxMessages === undefined ? pageSize : maxMessages - messages.length;
			const queryParams = new URLSearchParams({
				...query,
				limit: String(Math.min(remaining, pageSize)),
			});
			if (cursor) {
				queryParams.set("cursor", cursor);
			}

			const response = await fetch(
				`${this.apiBaseUrl}/${method}?${queryParams.toString()}`,
				{
					method: "GET",
					headers: {
						Authorization: `Bearer ${token}`,
					},
				},
			);

			const responseBody = await this.readBody(
				response,
				SlackPagedMessagesResponseSchema,
				operation,
			);

			if (responseBody.messages) {
				messages.push(...responseBody.messages);
			}

			const nextCursor = responseBody.response_metadata?.next_cursor;
			if (!responseBody.has_more || !nextCursor) {
				break;
			}
			cursor = nextCursor;
		}

		return maxMessages === undefined ? messages : messages.slice(0, maxMessages);
	}

	private async readBody<T extends { ok: boolean; error?: string }>(
		response: Response,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
		operation: string,
	): Promise<T> {
		if (!response.ok) {
			const errorBody = await response.text();
			throw new Error(
				`[SlackMessageService] Failed to ${operation}: ${response.status} ${response.statusText} - ${errorBody}`,
			);
		}

		const parsed = schema.safeParse(await response.json());
		if (!parsed.success) {
			throw new Error(
				`[SlackMessageService] Unexpected response to ${operation}: ${parsed.error.message}`,
			);
		}

		// Slack API returns HTTP 200 even for errors; check the response body
		if (!parsed.data.ok) {
			throw new Error(
				`[SlackMessageService] Slack API error: ${parsed.data.error ?? "unknown"}`,
			);
		}
		return parsed.data;
	}
}
