import { type Logger, createLogger } from "threadwatch-core";

/**
 * Monitor loop state
 *
 * ```
 * Stopped --start--> Polling
 * Polling --cycleComplete--> Sleeping
 * Sleeping --wake--> Polling
 * Polling | Sleeping --stop--> Stopped
 * ```
 */
export enum MonitorState {
	/** Fetching, filtering and answering one batch */
	Polling = "polling",

	/** Waiting out the poll interval */
	Sleeping = "sleeping",

	/** Not running; initial and final state */
	Stopped = "stopped",
}

/**
 * Events that trigger state transitions
 */
export enum MonitorEvent {
	Start = "start",
	CycleComplete = "cycleComplete",
	Wake = "wake",
	/** Cancellation from a signal or stop() */
	Stop = "stop",
}

const STATE_TRANSITIONS: Record<
	MonitorState,
	Partial<Record<MonitorEvent, MonitorState>>
> = {
	[MonitorState.Stopped]: {
		[MonitorEvent.Start]: MonitorState.Polling,
		[MonitorEvent.Stop]: MonitorState.Stopped,
	},

	[MonitorState.Polling]: {
		[MonitorEvent.CycleComplete]: MonitorState.Sleeping,
		[MonitorEvent.Stop]: MonitorState.Stopped,
	},

	[MonitorState.Sleeping]: {
		[MonitorEvent.Wake]: MonitorState.Polling,
		[MonitorEvent.Stop]: MonitorState.Stopped,
	},
};

/**
 * Error thrown when an invalid state transition is attempted
 */
export class InvalidTransitionError extends Error {
	constructor(
		public readonly currentState: MonitorState,
		public readonly event: MonitorEvent,
	) {
		super(
			`Invalid monitor transition: Cannot transition from "${currentState}" with event "${event}"`,
		);
		this.name = "InvalidTransitionError";
	}
}

export interface TransitionResult {
	success: boolean;
	previousState: MonitorState;
	/** Same as previousState when the transition was rejected */
	newState: MonitorState;
	event: MonitorEvent;
	timestamp: number;
}

/** Transitions kept for inspection; older ones are discarded */
export const MAX_TRANSITION_HISTORY = 50;

export class MonitorStateMachine {
	private currentState: MonitorState;
	private transitionHistory: TransitionResult[] = [];
	private readonly logger: Logger;

	constructor(
		initialState: MonitorState = MonitorState.Stopped,
		logger?: Logger,
	) {
		this.currentState = initialState;
		this.logger = logger ?? createLogger("monitor");
	}

	getState(): MonitorState {
		return this.currentState;
	}

	/**
	 * The most recent successful transitions, oldest first, at most
	 * {@link MAX_TRANSITION_HISTORY}
	 */
	getTransitionHistory(): readonly TransitionResult[] {
		return this.transitionHistory;
	}

	canTransition(event: MonitorEvent): boolean {
		return STATE_TRANSITIONS[this.currentState][event] !== undefined;
	}

	/**
	 * Perform a state transition
	 *
	 * @param throwOnInvalid - throw InvalidTransitionError instead of returning a failed result
	 */
	transition(event: MonitorEvent, throwOnInvalid = false): TransitionResult {
		const previousState = this.currentState;
		const nextState = STATE_TRANSITIONS[previousState][event];

		if (nextState === undefined) {
			if (throwOnInvalid) {
				throw new InvalidTransitionError(previousState, event);
			}
			this.logger.warn(
				`Invalid transition: ${previousState} + ${event} -> (blocked)`,
			);
			return {
				success: false,
				previousState,
				newState: previousState,
				event,
				timestamp: Date.now(),
			};
		}

		this.currentState = nextState;
		const result: TransitionResult = {
			success: true,
			previousState,
			newState: nextState,
			event,
			timestamp: Date.now(),
		};
		this.transitionHistory.push(result);
		if (this.transitionHistory.length > MAX_TRANSITION_HISTORY) {
			this.transitionHistory.shift();
		}

		if (previousState !== nextState) {
			this.logger.debug(`${previousState} -> ${nextState} (${event})`);
		}
		return result;
	}

	isRunning(): boolean {
		return this.currentState !== MonitorState.Stopped;
	}
}
