import { type Logger, createLogger, toError } from "threadwatch-core";
import type {
	ChatMessage,
	ComponentOptions,
	MessageSource,
	MessageTs,
} from "./types.js";

export interface ContextAssemblerOptions extends ComponentOptions {
	source: MessageSource;
	channel: string;
}

/**
 * Slack mention markup for an author; "unknown" when the event carries none
 */
export function formatAuthor(user: string | undefined): string {
	return `<@${user ?? "unknown"}>`;
}

export function formatContextLine(message: ChatMessage): string {
	return `${formatAuthor(message.user)}: ${message.text ?? ""}`;
}

/**
 * Renders a whole thread as "author: body" lines in the order the source
 * returns them. A failed fetch yields an empty context rather than blocking
 * the reply.
 */
export class ContextAssembler {
	private readonly source: MessageSource;
	private readonly channel: string;
	private readonly logger: Logger;

	constructor(options: ContextAssemblerOptions) {
		this.source = options.source;
		this.channel = options.channel;
		this.logger = options.logger ?? createLogger("source");
	}

	async assembleContext(threadTs: MessageTs): Promise<string> {
		try {
			const messages = await this.source.fetchThread(this.channel, threadTs);
			return messages.map(formatContextLine).join("\n");
		} catch (error) {
			this.logger.error("Error retrieving thread context", {
				channel: this.channel,
				ts: threadTs,
				error: toError(error),
			});
			return "";
		}
	}
}
