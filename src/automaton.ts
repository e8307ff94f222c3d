import { createPubSub } from "@marianmeres/pubsub";
import {
	DispatchConsistencyError,
	PreconditionError,
	ReferentialIntegrityError,
} from "./errors.ts";
import { EventType } from "./event-type.ts";
import { immediateExecutor } from "./executor.ts";
import { defaultLogger, type Logger, type LoggingOptions } from "./logger.ts";
import { StateBuilder } from "./state.ts";
import { TransitionBuilder } from "./transition.ts";
import type {
	Automaton,
	Executor,
	PublishedState,
	State,
	Transition,
} from "./types.ts";

/**
 * Automaton options.
 */
export type AutomatonOptions = LoggingOptions;

/**
 * Frozen state/transition graph handed from the builder to the engine.
 */
export type AutomatonConfig = AutomatonOptions & {
	initialState: State;
	states: Iterable<State>;
	transitions: Iterable<Transition>;
	executor: Executor;
};

const label = (state: State | undefined): string =>
	state === undefined ? "(undefined)" : (state.name ?? String(state));

/** Set without mutators, so the engine's states stay fixed once built. */
class FrozenSet<T> implements ReadonlySet<T> {
	readonly #values: Set<T>;

	constructor(values: Iterable<T>) {
		this.#values = new Set(values);
		Object.freeze(this);
	}

	get size(): number {
		return this.#values.size;
	}

	has(value: T): boolean {
		return this.#values.has(value);
	}

	forEach(
		callback: (value: T, value2: T, set: ReadonlySet<T>) => void,
		thisArg?: unknown
	): void {
		for (const value of this.#values) {
			callback.call(thisArg, value, value, this);
		}
	}

	entries() {
		return this.#values.entries();
	}

	keys() {
		return this.#values.keys();
	}

	values() {
		return this.#values.values();
	}

	[Symbol.iterator]() {
		return this.#values.values();
	}
}

/**
 * Implementation of {@link Automaton} whose states and transitions are frozen
 * at construction. Only the current state and the enabled flag change over
 * its lifetime. Usually created via {@link AutomatonBuilder}.
 *
 * Deferred work (the initial entry action and each posted event) goes through
 * the executor. The engine keeps no locks: the executor must run submitted
 * units one at a time, in submission order. If it does not, a dispatch may
 * start while another transition is in flight and fail with
 * {@link DispatchConsistencyError}.
 *
 * **Dispatch:** transitions are scanned in registration order. The first one
 * whose source is the current state, whose event type matches and whose guard
 * passes is taken; a failing guard does not stop the scan. Events matching no
 * transition are discarded.
 *
 * Taking a transition to another state executes, in this exact order:
 * 1. exit action of the current state
 * 2. current state becomes undefined
 * 3. transition action
 * 4. current state becomes the destination
 * 5. entry action of the destination
 *
 * A transition back to the current state only runs its action.
 */
export class AutomatonEngine implements Automaton {
	readonly #executor: Executor;
	readonly #initialState: State;
	readonly #states: ReadonlySet<State>;
	readonly #transitions: readonly Transition[];

	#current: State | undefined = undefined;
	#previous: State | undefined = undefined;
	#enabled = false;

	/** Internal pub sub */
	#pubsub = createPubSub();

	#logger: Logger;
	#debug: boolean;

	constructor(config: AutomatonConfig) {
		this.#debug = config.debug ?? false;
		this.#logger = config.logger ?? defaultLogger;
		this.#executor = config.executor;
		this.#initialState = config.initialState;
		this.#states = new FrozenSet(config.states);
		this.#transitions = Object.freeze([...new Set(config.transitions)]);

		if (!this.#states.has(this.#initialState)) {
			// prettier-ignore
			throw new ReferentialIntegrityError("Initial state must be in set of automaton states!");
		}
		for (const transition of this.#transitions) {
			if (
				!this.#states.has(transition.source) ||
				!this.#states.has(transition.destination)
			) {
				// prettier-ignore
				throw new ReferentialIntegrityError("Transition states must be in set of automaton states!");
			}
		}

		this.#debugLog(
			`automaton created with ${this.#states.size} states, ` +
				`${this.#transitions.length} transitions, ` +
				`initial state "${label(this.#initialState)}"`
		);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[automaton]", ...args);
		}
	}

	get initialState(): State {
		return this.#initialState;
	}

	/**
	 * Returns the current state. Undefined if the automaton has not been
	 * enabled yet, or while a state-changing transition is in flight.
	 */
	get currentState(): State | undefined {
		return this.#current;
	}

	get states(): ReadonlySet<State> {
		return this.#states;
	}

	get transitions(): readonly Transition[] {
		return this.#transitions;
	}

	/**
	 * Returns whether the automaton has been enabled. This may be `true` even
	 * if the initial state's entry action has not run yet.
	 */
	get enabled(): boolean {
		return this.#enabled;
	}

	/**
	 * Checks whether the automaton is currently in the given state.
	 */
	is(state: State): boolean {
		return this.#current === state;
	}

	#notify() {
		this.#pubsub.publish("change", {
			current: this.#current,
			previous: this.#previous,
		} satisfies PublishedState);
	}

	/**
	 * Subscribes to state changes. The callback is invoked immediately with
	 * the current data, then every time a state is entered: after the initial
	 * entry action, and after the entry action of each state-changing
	 * transition. Same-state transitions do not notify.
	 *
	 * @returns Unsubscriber function to stop receiving updates
	 */
	subscribe(cb: (data: PublishedState) => void): () => void {
		this.#debugLog("subscribe() called");
		const unsub = this.#pubsub.subscribe("change", cb);
		cb({ current: this.#current, previous: this.#previous });
		return unsub;
	}

	/**
	 * Enables the automaton. The current state is set to the initial state and
	 * its entry action is handed to the executor. May only be called once.
	 */
	enable(): void {
		if (this.#enabled) {
			throw new PreconditionError(
				"ALREADY_ENABLED",
				"Automaton already enabled!"
			);
		}
		const initial = this.#initialState;
		this.#debugLog(`enable() called, entering "${label(initial)}"`);
		this.#current = initial;
		this.#enabled = true;
		this.#executor.execute(() => {
			if (initial.entryAction) {
				this.#debugLog(`executing entry action of "${label(initial)}"`);
				initial.entryAction();
			}
			this.#notify();
		});
	}

	/**
	 * Hands the event to the executor for dispatch and returns without waiting
	 * for it to be processed. The automaton must be enabled.
	 *
	 * @param event - Any value except `null` and `undefined`
	 */
	post(event: unknown): void {
		if (!this.#enabled) {
			throw new PreconditionError(
				"NOT_ENABLED",
				"Automaton must be enabled first!"
			);
		}
		if (event == null) {
			throw new PreconditionError(
				"INVALID_ARGUMENT",
				"Event must not be null!"
			);
		}
		this.#executor.execute(() => this.#dispatch(event));
	}

	#dispatch(event: unknown): void {
		const current = this.#current;
		if (current === undefined) {
			throw new DispatchConsistencyError(event);
		}
		this.#debugLog("dispatching", event, `in "${label(current)}"`);

		for (const transition of this.#transitions) {
			if (transition.source !== current) continue;
			if (!transition.matches(event)) continue;
			if (!transition.passes(event)) {
				this.#debugLog(
					`guard rejected "${label(current)}" -> "${label(transition.destination)}"`
				);
				continue;
			}
			this.#take(transition, current, event);
			return;
		}

		this.#debugLog("no transition matched, discarding", event);
	}

	#take(transition: Transition, current: State, event: unknown): void {
		const destination = transition.destination;

		// same-state transition: action only, the current state stays defined
		if (destination === current) {
			this.#debugLog(`same-state transition in "${label(current)}"`);
			transition.fire(event);
			return;
		}

		this.#debugLog(`transition "${label(current)}" -> "${label(destination)}"`);

		// 1. exit current state
		if (current.exitAction) {
			this.#debugLog(`executing exit action of "${label(current)}"`);
			current.exitAction();
		}

		// 2. undefined while in flight
		this.#current = undefined;

		// 3. transition action
		transition.fire(event);

		if (!this.#states.has(destination)) {
			// prettier-ignore
			throw new ReferentialIntegrityError("Destination state must be in set of automaton states!");
		}

		// 4. enter destination
		this.#previous = current;
		this.#current = destination;

		// 5. entry action
		if (destination.entryAction) {
			this.#debugLog(`executing entry action of "${label(destination)}"`);
			destination.entryAction();
		}

		this.#notify();
	}
}

/**
 * Builder for construction of an {@link AutomatonEngine}.
 *
 * States must be registered before the transitions referencing them.
 * States have set semantics; transitions keep their registration order,
 * which is the order they are matched in. Registering the same instance twice
 * is a no-op.
 *
 * @example
 * ```typescript
 * const builder = createAutomaton();
 * const off = builder.defineState().named("OFF").build();
 * const on = builder.defineState().named("ON").build();
 *
 * builder.defineTransition().from(off).to(on).check((e) => e === "on").build();
 * builder.defineTransition().from(on).to(off).check((e) => e === "off").build();
 *
 * const automaton = builder.initialState(off).build();
 * automaton.enable();
 * automaton.post("on");
 * ```
 */
export class AutomatonBuilder {
	#states = new Set<State>();
	#transitions = new Set<Transition>();
	#initialState?: State;
	#executor?: Executor;
	#options: AutomatonOptions;

	constructor(options: AutomatonOptions = {}) {
		this.#options = options;
	}

	/** Adds the provided state. */
	addState(state: State): this {
		if (state == null) {
			throw new PreconditionError(
				"INVALID_ARGUMENT",
				"State must not be null!"
			);
		}
		this.#states.add(state);
		return this;
	}

	/** Adds the provided states. */
	addStates(states: Iterable<State>): this {
		for (const state of states) {
			this.addState(state);
		}
		return this;
	}

	/**
	 * Returns a state builder whose `build()` also adds the built state.
	 */
	defineState(): StateBuilder {
		return new StateBuilder((state) => this.addState(state));
	}

	/**
	 * Adds the provided transition. Its source and destination states must
	 * have been added before.
	 */
	addTransition(transition: Transition): this {
		if (transition == null) {
			throw new PreconditionError(
				"INVALID_ARGUMENT",
				"Provided transition must not be null!"
			);
		}
		if (!this.#states.has(transition.source)) {
			// prettier-ignore
			throw new ReferentialIntegrityError("Source state must be in automaton states!");
		}
		if (!this.#states.has(transition.destination)) {
			// prettier-ignore
			throw new ReferentialIntegrityError("Destination state must be in automaton states!");
		}
		this.#transitions.add(transition);
		return this;
	}

	/** Adds the provided transitions, in order. */
	addTransitions(transitions: Iterable<Transition>): this {
		for (const transition of transitions) {
			this.addTransition(transition);
		}
		return this;
	}

	/**
	 * Returns a transition builder whose `build()` also adds the built
	 * transition.
	 */
	defineTransition(): TransitionBuilder {
		return new TransitionBuilder(EventType.any, {
			onBuild: (transition) => this.addTransition(transition),
		});
	}

	/**
	 * Sets the state the automaton enters first. May only be set once, and the
	 * state must have been added before.
	 */
	initialState(state: State): this {
		if (this.#initialState !== undefined) {
			throw new PreconditionError(
				"FIELD_ALREADY_SET",
				"Initial state already set!"
			);
		}
		if (state == null) {
			throw new PreconditionError(
				"INVALID_ARGUMENT",
				"Initial state must not be null!"
			);
		}
		if (!this.#states.has(state)) {
			// prettier-ignore
			throw new ReferentialIntegrityError("Initial state must be in automaton states!");
		}
		this.#initialState = state;
		return this;
	}

	/**
	 * Sets the executor which runs the initial entry action and processes all
	 * events. May only be set once.
	 */
	executor(executor: Executor): this {
		if (this.#executor !== undefined) {
			throw new PreconditionError("FIELD_ALREADY_SET", "Executor already set!");
		}
		if (executor == null || typeof executor.execute !== "function") {
			throw new PreconditionError(
				"INVALID_ARGUMENT",
				"Executor must provide an execute function!"
			);
		}
		this.#executor = executor;
		return this;
	}

	/**
	 * Builds the automaton. The initial state must have been set. Without an
	 * explicit executor, {@link immediateExecutor} is used.
	 */
	build(): AutomatonEngine {
		if (this.#initialState === undefined) {
			throw new PreconditionError(
				"MISSING_FIELD",
				"Initial state must not be null!"
			);
		}
		return new AutomatonEngine({
			...this.#options,
			initialState: this.#initialState,
			states: this.#states,
			transitions: this.#transitions,
			executor: this.#executor ?? immediateExecutor,
		});
	}
}

/**
 * Factory function returning a fresh {@link AutomatonBuilder}.
 * Equivalent to calling `new AutomatonBuilder(options)`.
 */
export function createAutomaton(options?: AutomatonOptions): AutomatonBuilder {
	return new AutomatonBuilder(options);
}
