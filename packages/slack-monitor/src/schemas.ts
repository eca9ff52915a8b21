/**
 * Zod schemas for the Slack Web API responses the monitor reads.
 *
 * Slack answers HTTP 200 for most failures, so every body is checked for
 * `ok` before its payload is trusted.
 */

import { z } from "zod";
import { isMessageTs } from "./timestamps.js";

export const SlackTsSchema = z
	.string()
	.refine(isMessageTs, "Invalid Slack timestamp");

/**
 * A message from conversations.history or conversations.replies.
 * Unknown fields (blocks, files, reactions...) are kept.
 */
export const SlackMessageSchema = z
	.object({
		type: z.string().optional(),
		subtype: z.string().optional(),
		ts: SlackTsSchema,
		text: z.string().optional(),
		user: z.string().optional(),
		bot_id: z.string().optional(),
		thread_ts: SlackTsSchema.optional(),
	})
	.passthrough();

export type SlackMessage = z.infer<typeof SlackMessageSchema>;

const SlackErrorFields = {
	ok: z.boolean(),
	error: z.string().optional(),
};

export const SlackPagedMessagesResponseSchema = z.object({
	...SlackErrorFields,
	messages: z.array(SlackMessageSchema).optional(),
	has_more: z.boolean().optional(),
	response_metadata: z
		.object({ next_cursor: z.string().optional() })
		.optional(),
});

export type SlackPagedMessagesResponse = z.infer<
	typeof SlackPagedMessagesResponseSchema
>;

export const SlackPostMessageResponseSchema = z.object({
	...SlackErrorFields,
	channel: z.string().optional(),
	ts: SlackTsSchema.optional(),
});

export type SlackPostMessageResponse = z.infer<
	typeof SlackPostMessageResponseSchema
>;
