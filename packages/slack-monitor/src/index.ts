export { ContextAssembler, formatAuthor, formatContextLine } from "./ContextAssembler.js";
export type { ContextAssemblerOptions } from "./ContextAssembler.js";
export { KeywordFilter } from "./KeywordFilter.js";
export { KeywordMonitor } from "./KeywordMonitor.js";
export type { KeywordMonitorOptions, SleepFn } from "./KeywordMonitor.js";
export {
	InvalidTransitionError,
	MAX_TRANSITION_HISTORY,
	MonitorEvent,
	MonitorState,
	MonitorStateMachine,
} from "./MonitorStateMachine.js";
export type { TransitionResult } from "./MonitorStateMachine.js";
export { Responder, stripKeyword } from "./Responder.js";
export type { ReplyPlan, ResponderOptions } from "./Responder.js";
export type { SlackMessage } from "./schemas.js";
export { SlackMessageService } from "./SlackMessageService.js";
export type {
	SlackFetchHistoryParams,
	SlackFetchThreadParams,
	SlackPostMessageParams,
} from "./SlackMessageService.js";
export { SlackMessageSource, toChatMessage } from "./SlackMessageSource.js";
export type { SlackMessageSourceOptions } from "./SlackMessageSource.js";
export { ThreadClassifier } from "./ThreadClassifier.js";
export { compareTs, isMessageTs, maxTs, tsBefore } from "./timestamps.js";
export { ThreadVerdict } from "./types.js";
export type {
	ChatMessage,
	CycleReport,
	DispatchResult,
	MessageSource,
	MessageTs,
	MonitorConfig,
	PostedReply,
	ThreadClassification,
} from "./types.js";
export { WatermarkTracker } from "./WatermarkTracker.js";
export type { PollBatch, WatermarkTrackerOptions } from "./WatermarkTracker.js";
