import { assertAction } from "./assert.ts";
import { PreconditionError } from "./errors.ts";
import { EventType, toEventType, type EventTypeLike } from "./event-type.ts";
import type { Guard, State, Transition, TransitionAction } from "./types.ts";

/**
 * Immutable implementation of {@link Transition}, created via
 * {@link TransitionBuilder}.
 *
 * @template T - Type of events that may trigger this transition
 */
export class TransitionDefinition<T = unknown> implements Transition {
	readonly source: State;
	readonly destination: State;
	readonly eventType: EventType<T>;
	readonly guard?: Guard<T>;
	readonly action?: TransitionAction<T>;

	constructor(fields: {
		source: State;
		destination: State;
		eventType: EventType<T>;
		guard?: Guard<T>;
		action?: TransitionAction<T>;
	}) {
		this.source = fields.source;
		this.destination = fields.destination;
		this.eventType = fields.eventType;
		if (fields.guard !== undefined) this.guard = fields.guard;
		if (fields.action !== undefined) this.action = fields.action;
		Object.freeze(this);
	}

	get isSelfTransition(): boolean {
		return this.source === this.destination;
	}

	matches(event: unknown): boolean {
		return this.eventType.matches(event);
	}

	passes(event: unknown): boolean {
		if (!this.eventType.matches(event)) return false;
		return this.guard === undefined || this.guard(event);
	}

	fire(event: unknown): void {
		if (this.action !== undefined && this.eventType.matches(event)) {
			this.action(event);
		}
	}
}

type TransitionBuilderFields = {
	source?: State;
	destination?: State;
	eventTypeSet?: boolean;
	onBuild?: (transition: Transition) => void;
};

/**
 * Builder for construction of a {@link TransitionDefinition}. Every field may
 * only be set once. Source and destination are required; the event type
 * defaults to {@link EventType.any} when created via {@link createTransition}.
 *
 * `on()` returns the builder retyped to the chosen event type, so it must
 * come before `check()` and `execute()`. The builder `on()` was called on is
 * retired; only the returned one may be used further.
 *
 * @example
 * ```typescript
 * const greet = createTransition()
 *   .from(state).to(state)
 *   .on(String)
 *   .check((e) => e.length > 0)
 *   .execute((e) => console.log(`Hello, ${e}!`))
 *   .build();
 * ```
 */
export class TransitionBuilder<T = unknown> {
	#source?: State;
	#destination?: State;
	#eventType: EventType<T>;
	#eventTypeSet: boolean;
	#guard?: Guard<T>;
	#action?: TransitionAction<T>;
	#onBuild?: (transition: Transition) => void;
	#retired = false;

	/**
	 * @param eventType - Filter applied when `on()` is never called
	 * @param fields - Fields carried over from a previous builder
	 */
	constructor(eventType: EventType<T>, fields: TransitionBuilderFields = {}) {
		this.#eventType = eventType;
		this.#eventTypeSet = fields.eventTypeSet ?? false;
		this.#source = fields.source;
		this.#destination = fields.destination;
		this.#onBuild = fields.onBuild;
	}

	#assertActive(): void {
		if (this.#retired) {
			// prettier-ignore
			throw new PreconditionError("ILLEGAL_ORDER", "Builder was retyped by on(), continue with the returned one!");
		}
	}

	/** Sets the source state. The transition is only taken from this state. */
	from(state: State): this {
		this.#assertActive();
		if (this.#source !== undefined) {
			throw new PreconditionError("FIELD_ALREADY_SET", "Source state already set!");
		}
		if (state == null) {
			throw new PreconditionError(
				"INVALID_ARGUMENT",
				"Source state must not be null!"
			);
		}
		this.#source = state;
		return this;
	}

	/** Sets the destination state, the new current state once taken. */
	to(state: State): this {
		this.#assertActive();
		if (this.#destination !== undefined) {
			throw new PreconditionError(
				"FIELD_ALREADY_SET",
				"Destination state already set!"
			);
		}
		if (state == null) {
			throw new PreconditionError(
				"INVALID_ARGUMENT",
				"Destination state must not be null!"
			);
		}
		this.#destination = state;
		return this;
	}

	/**
	 * Sets the type of events that may trigger the transition. Any event that
	 * is an instance of the type matches, including instances of subclasses.
	 */
	on(type: StringConstructor): TransitionBuilder<string>;
	on(type: NumberConstructor): TransitionBuilder<number>;
	on(type: BooleanConstructor): TransitionBuilder<boolean>;
	on<X>(type: EventTypeLike<X>): TransitionBuilder<X>;
	on<X>(type: EventTypeLike<X>): TransitionBuilder<X> {
		if (this.#eventTypeSet) {
			throw new PreconditionError("FIELD_ALREADY_SET", "Event type already set!");
		}
		if (type == null) {
			throw new PreconditionError(
				"INVALID_ARGUMENT",
				"Event type must not be null!"
			);
		}
		if (this.#guard !== undefined || this.#action !== undefined) {
			// prettier-ignore
			throw new PreconditionError("ILLEGAL_ORDER", "Event type must be set before guard and action!");
		}
		this.#eventTypeSet = true;
		this.#retired = true;
		return new TransitionBuilder<X>(toEventType(type), {
			source: this.#source,
			destination: this.#destination,
			eventTypeSet: true,
			onBuild: this.#onBuild,
		});
	}

	/** Sets the guard that must be satisfied for the transition to be taken. */
	check(guard: Guard<T>): this {
		this.#assertActive();
		if (this.#guard !== undefined) {
			throw new PreconditionError("FIELD_ALREADY_SET", "Guard already set!");
		}
		this.#guard = assertAction(guard, "Guard");
		return this;
	}

	/** Sets the action executed when the transition is taken. */
	execute(action: TransitionAction<T>): this {
		this.#assertActive();
		if (this.#action !== undefined) {
			throw new PreconditionError("FIELD_ALREADY_SET", "Action already set!");
		}
		this.#action = assertAction(action, "Action");
		return this;
	}

	build(): TransitionDefinition<T> {
		this.#assertActive();
		if (this.#source === undefined) {
			throw new PreconditionError(
				"MISSING_FIELD",
				"Source state must not be null!"
			);
		}
		if (this.#destination === undefined) {
			throw new PreconditionError(
				"MISSING_FIELD",
				"Destination state must not be null!"
			);
		}
		const transition = new TransitionDefinition<T>({
			source: this.#source,
			destination: this.#destination,
			eventType: this.#eventType,
			guard: this.#guard,
			action: this.#action,
		});
		this.#onBuild?.(transition);
		return transition;
	}
}

/**
 * Factory function returning a fresh {@link TransitionBuilder}.
 */
export function createTransition(): TransitionBuilder {
	return new TransitionBuilder(EventType.any);
}
