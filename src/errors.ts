/**
 * Machine-readable error codes carried by every {@link AutomatonError}.
 */
export type AutomatonErrorCode =
	| "FIELD_ALREADY_SET"
	| "MISSING_FIELD"
	| "INVALID_ARGUMENT"
	| "ILLEGAL_ORDER"
	| "ALREADY_ENABLED"
	| "NOT_ENABLED"
	| "REFERENTIAL_INTEGRITY"
	| "UNDEFINED_CURRENT_STATE"
	| "EXECUTOR_REJECTED";

/**
 * Base class of all errors thrown by this library.
 */
export class AutomatonError extends Error {
	readonly code: AutomatonErrorCode;

	constructor(code: AutomatonErrorCode, message: string) {
		super(message);
		this.name = "AutomatonError";
		this.code = code;
	}
}

/**
 * Misuse of the API: a builder field assigned twice, a required field left
 * unset, an absent argument, `enable()` called twice or `post()` before
 * `enable()`. Always reported synchronously at the point of misuse.
 */
export class PreconditionError extends AutomatonError {
	constructor(
		code: Extract<
			AutomatonErrorCode,
			| "FIELD_ALREADY_SET"
			| "MISSING_FIELD"
			| "INVALID_ARGUMENT"
			| "ILLEGAL_ORDER"
			| "ALREADY_ENABLED"
			| "NOT_ENABLED"
		>,
		message: string
	) {
		super(code, message);
		this.name = "PreconditionError";
	}
}

/**
 * A transition or initial state references a state that is not registered
 * with the automaton.
 */
export class ReferentialIntegrityError extends AutomatonError {
	constructor(message: string) {
		super("REFERENTIAL_INTEGRITY", message);
		this.name = "ReferentialIntegrityError";
	}
}

/**
 * Dispatch started while the current state was undefined. This only happens
 * when the executor does not run submitted work one unit at a time.
 */
export class DispatchConsistencyError extends AutomatonError {
	readonly event: unknown;

	constructor(event: unknown) {
		super(
			"UNDEFINED_CURRENT_STATE",
			"Current state is undefined! Automaton cannot process any events right now."
		);
		this.name = "DispatchConsistencyError";
		this.event = event;
	}
}

/**
 * A bounded executor refused a unit of work because its queue is full.
 */
export class ExecutorRejectedError extends AutomatonError {
	readonly maxQueueSize: number;

	constructor(maxQueueSize: number) {
		super(
			"EXECUTOR_REJECTED",
			`Executor queue is full (max ${maxQueueSize} pending units)`
		);
		this.name = "ExecutorRejectedError";
		this.maxQueueSize = maxQueueSize;
	}
}
