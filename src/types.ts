/** Side effect executed when a state is entered or exited. */
export type StateAction = () => void;

/**
 * Predicate which has to be satisfied for a transition to be taken.
 * Should be a pure check; side effects belong in actions.
 */
export type Guard<T> = (event: T) => boolean;

/**
 * Side effect executed when a transition is taken. For transitions that
 * change the state it runs after the source state is left and before the
 * destination state is entered, so the current state is undefined meanwhile.
 */
export type TransitionAction<T> = (event: T) => void;

/** Zero-argument unit of work handed to an {@link Executor}. */
export type Work = () => void;

/**
 * Accepts a unit of work and arranges for its eventual execution.
 *
 * The automaton relies on its executor to run submitted work one unit at a
 * time, in submission order. It does not enforce this itself.
 */
export interface Executor {
	execute(work: Work): void;
}

/**
 * State of an automaton. Any object may act as a state; states are compared
 * by identity only.
 */
export interface State {
	readonly name?: string;
	readonly entryAction?: StateAction;
	readonly exitAction?: StateAction;
}

/**
 * Type-erased view of a transition, as seen by the dispatch loop.
 */
export interface Transition {
	readonly source: State;
	readonly destination: State;
	readonly eventType: { readonly name: string };
	/** `true` when source and destination are the same state */
	readonly isSelfTransition: boolean;
	/** Runtime event type filter */
	matches(event: unknown): boolean;
	/** Type filter and guard (an absent guard is satisfied) */
	passes(event: unknown): boolean;
	/** Runs the transition action, if any */
	fire(event: unknown): void;
}

/**
 * Published state data sent to subscribers.
 */
export type PublishedState = {
	current: State | undefined;
	previous: State | undefined;
};

/**
 * Automaton with a finite set of states and transitions.
 */
export interface Automaton {
	/** State entered first, once the automaton is enabled */
	readonly initialState: State;
	/**
	 * Undefined before the automaton is enabled and while a state-changing
	 * transition is in flight.
	 */
	readonly currentState: State | undefined;
	readonly states: ReadonlySet<State>;
	/** Transitions in registration order (the order they are matched in) */
	readonly transitions: readonly Transition[];
	/** May be `true` before the initial entry action has run */
	readonly enabled: boolean;
	enable(): void;
	post(event: unknown): void;
	is(state: State): boolean;
	subscribe(cb: (data: PublishedState) => void): () => void;
}

/** Guard that always answers with the same value */
const always = (result: boolean): Guard<unknown> => () => result;

/**
 * Stock guards.
 */
export const Guards = {
	always,
	pass: (): Guard<unknown> => always(true),
	fail: (): Guard<unknown> => always(false),
} as const;
