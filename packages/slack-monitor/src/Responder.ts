import { type Logger, createLogger, toError } from "threadwatch-core";
import { formatAuthor } from "./ContextAssembler.js";
import {
	type ChatMessage,
	type ComponentOptions,
	type DispatchResult,
	type MessageSource,
	type MessageTs,
	type ThreadClassification,
	ThreadVerdict,
} from "./types.js";

export interface ResponderOptions extends ComponentOptions {
	source: MessageSource;
	channel: string;
	keyword: string;
	/** Reply with the plain acknowledgement used when thread handling is off */
	threadAware?: boolean;
}

/**
 * A reply ready to post
 */
export interface ReplyPlan {
	/** Thread the reply is addressed to */
	threadTs: MessageTs;
	text: string;
}

function escapeRegex(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Remove every case-insensitive occurrence of `keyword` together with the
 * whitespace around it, then collapse whitespace runs and trim.
 *
 * Adjacent occurrences each consume their surrounding whitespace:
 * "bugbot bugbot duplicate" → "duplicate".
 */
export function stripKeyword(text: string, keyword: string): string {
	if (keyword.length === 0) {
		return text.replace(/\s+/g, " ").trim();
	}
	const pattern = new RegExp(`\\s*${escapeRegex(keyword)}\\s*`, "gi");
	return text.replace(pattern, " ").replace(/\s+/g, " ").trim();
}

/**
 * Composes replies and posts them to the right thread: a standalone message
 * opens a thread on itself, a threaded message is answered in its root's
 * thread. Posting is not retried; failures come back in the result.
 */
export class Responder {
	private readonly source: MessageSource;
	private readonly channel: string;
	private readonly keyword: string;
	private readonly threadAware: boolean;
	private readonly logger: Logger;

	constructor(options: ResponderOptions) {
		this.source = options.source;
		this.channel = options.channel;
		this.keyword = options.keyword;
		this.threadAware = options.threadAware ?? true;
		this.logger = options.logger ?? createLogger("responder");
	}

	clean(text: string | undefined): string {
		return stripKeyword(text ?? "", this.keyword);
	}

	compose(
		message: ChatMessage,
		classification: ThreadClassification,
		context = "",
	): ReplyPlan {
		const author = formatAuthor(message.user);
		const cleaned = this.clean(message.text);

		if (!this.threadAware) {
			return {
				threadTs: message.ts,
				text: `Hello ${author}, I will respond to your input '${cleaned}'.`,
			};
		}

		if (classification.verdict === ThreadVerdict.Standalone) {
			return {
				threadTs: message.ts,
				text: `Hello ${author}, I detected your keyword in your message: '${cleaned}'. Starting a new thread...`,
			};
		}

		return {
			threadTs: classification.threadTs,
			text: `Hello ${author}, I detected your keyword in this thread:\n\n${context}\n\nCleaned input: '${cleaned}'`,
		};
	}

	async respond(
		message: ChatMessage,
		classification: ThreadClassification,
		context?: string,
	): Promise<DispatchResult> {
		const plan = this.compose(message, classification, context);
		try {
			const posted = await this.source.postReply(
				this.channel,
				plan.text,
				plan.threadTs,
			);
			this.logger.info(
				classification.verdict === ThreadVerdict.Standalone
					? "Started new thread"
					: "Replied in existing thread",
				{
					channel: this.channel,
					ts: message.ts,
					threadTs: plan.threadTs,
					replyTs: posted.ts,
				},
			);
			return { ok: true, threadTs: plan.threadTs, replyTs: posted.ts };
		} catch (error) {
			const err = toError(error);
			this.logger.error("Error posting reply", {
				channel: this.channel,
				ts: message.ts,
				threadTs: plan.threadTs,
				error: err,
			});
			return { ok: false, threadTs: plan.threadTs, error: err };
		}
	}
}
