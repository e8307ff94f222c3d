import { assertAction } from "./assert.ts";
import { PreconditionError } from "./errors.ts";
import type { State, StateAction } from "./types.ts";

let nextStateId = 1;

/**
 * Immutable implementation of {@link State}, created via {@link StateBuilder}.
 *
 * Two definitions are never equal, even if their actions are equivalent.
 */
export class StateDefinition implements State {
	/** Opaque identity token, unique per process */
	readonly id: number;
	readonly name?: string;
	readonly entryAction?: StateAction;
	readonly exitAction?: StateAction;

	constructor(fields: {
		name?: string;
		entryAction?: StateAction;
		exitAction?: StateAction;
	}) {
		this.id = nextStateId++;
		if (fields.name !== undefined) this.name = fields.name;
		if (fields.entryAction !== undefined) this.entryAction = fields.entryAction;
		if (fields.exitAction !== undefined) this.exitAction = fields.exitAction;
		Object.freeze(this);
	}

	toString(): string {
		return this.name ?? `State#${this.id}`;
	}
}

/**
 * Builder for construction of a {@link StateDefinition}. Each field may only
 * be set once. Nothing runs while building; actions only execute when an
 * automaton enters or exits the state.
 *
 * @example
 * ```typescript
 * const on = createState()
 *   .named("ON")
 *   .whenEntered(() => console.log("The light bulb has been turned on!"))
 *   .build();
 * ```
 */
export class StateBuilder {
	#name?: string;
	#entryAction?: StateAction;
	#exitAction?: StateAction;
	#onBuild?: (state: StateDefinition) => void;

	/**
	 * @param onBuild - Invoked with every state this builder builds
	 */
	constructor(onBuild?: (state: StateDefinition) => void) {
		this.#onBuild = onBuild;
	}

	/** Sets the display name used in logs. */
	named(name: string): this {
		if (this.#name !== undefined) {
			throw new PreconditionError("FIELD_ALREADY_SET", "Name already set!");
		}
		if (typeof name !== "string") {
			throw new PreconditionError("INVALID_ARGUMENT", "Name must be a string!");
		}
		this.#name = name;
		return this;
	}

	/** Sets the action executed whenever the state is entered. */
	whenEntered(action: StateAction): this {
		if (this.#entryAction !== undefined) {
			throw new PreconditionError(
				"FIELD_ALREADY_SET",
				"Entry action already set!"
			);
		}
		this.#entryAction = assertAction(action, "Entry action");
		return this;
	}

	/** Sets the action executed whenever the state is left. */
	whenExited(action: StateAction): this {
		if (this.#exitAction !== undefined) {
			throw new PreconditionError(
				"FIELD_ALREADY_SET",
				"Exit action already set!"
			);
		}
		this.#exitAction = assertAction(action, "Exit action");
		return this;
	}

	build(): StateDefinition {
		const state = new StateDefinition({
			name: this.#name,
			entryAction: this.#entryAction,
			exitAction: this.#exitAction,
		});
		this.#onBuild?.(state);
		return state;
	}
}

/**
 * Factory function returning a fresh {@link StateBuilder}.
 */
export function createState(): StateBuilder {
	return new StateBuilder();
}
