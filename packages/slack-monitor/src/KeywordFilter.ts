import type { ChatMessage } from "./types.js";

/**
 * Case-insensitive substring match of the trigger keyword against the body.
 * No word boundaries: "xbugboty" matches "bugbot".
 */
export class KeywordFilter {
	private readonly needle: string;

	constructor(readonly keyword: string) {
		this.needle = keyword.toLowerCase();
	}

	matches(message: ChatMessage): boolean {
		if (message.text === undefined) {
			return false;
		}
		return message.text.toLowerCase().includes(this.needle);
	}

	select(messages: readonly ChatMessage[]): ChatMessage[] {
		return messages.filter((message) => this.matches(message));
	}
}
