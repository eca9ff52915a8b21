import {
	type ChatMessage,
	type MessageTs,
	type ThreadClassification,
	ThreadVerdict,
} from "./types.js";

/**
 * Decides where a matched message sits in a thread.
 *
 * - no `threadTs` → standalone
 * - `threadTs === ts` → thread root
 * - any other `threadTs` → reply inside that thread
 *
 * The root referenced by a reply is trusted as-is; it is not fetched to
 * check that it exists.
 */
export class ThreadClassifier {
	classify(message: ChatMessage): ThreadVerdict {
		if (message.threadTs === undefined) {
			return ThreadVerdict.Standalone;
		}
		return message.threadTs === message.ts
			? ThreadVerdict.Root
			: ThreadVerdict.Reply;
	}

	/**
	 * Thread id every reply must address so it lands in the existing thread.
	 * `null` for standalone messages.
	 */
	canonicalThreadId(message: ChatMessage): MessageTs | null {
		return message.threadTs ?? null;
	}

	resolve(message: ChatMessage): ThreadClassification {
		const verdict = this.classify(message);
		if (verdict === ThreadVerdict.Standalone || message.threadTs === undefined) {
			return { verdict: ThreadVerdict.Standalone };
		}
		return { verdict, threadTs: message.threadTs };
	}
}
