import { expect, test } from "vitest";
import * as automatonRuntime from "../src/mod.ts";
import {
	createAutomaton,
	createState,
	createTransition,
	EventType,
	Guards,
	StateDefinition,
	toEventType,
} from "../src/mod.ts";
import { errorCode } from "./support/helpers.ts";

class KeyEvent {
	constructor(readonly key: string) {}
}

class EnterPressed extends KeyEvent {
	constructor() {
		super("Enter");
	}
}

test("state builder", () => {
	let calls = 0;
	const entry = () => {
		calls++;
	};

	const state = createState().named("ON").whenEntered(entry).build();

	expect(state).toBeInstanceOf(StateDefinition);
	expect(state.entryAction).toBe(entry);
	expect(state.exitAction).toBeUndefined();
	expect(state.name).toBe("ON");
	expect(String(state)).toBe("ON");
	expect(Object.isFrozen(state)).toBe(true);

	// building never runs actions
	expect(calls).toBe(0);
});

test("states are compared by identity", () => {
	const a = createState().build();
	const b = createState().build();

	expect(a).not.toBe(b);
	expect(b.id).toBeGreaterThan(a.id);
	expect(String(a)).toBe(`State#${a.id}`);
	expect(new Set([a, b, a]).size).toBe(2);
});

test("state builder fields may be set once", () => {
	const noop = () => undefined;

	expect(errorCode(() => createState().named("A").named("B"))).toBe(
		"FIELD_ALREADY_SET"
	);
	expect(errorCode(() => createState().whenEntered(noop).whenEntered(noop))).toBe(
		"FIELD_ALREADY_SET"
	);
	expect(errorCode(() => createState().whenExited(noop).whenExited(noop))).toBe(
		"FIELD_ALREADY_SET"
	);
	expect(errorCode(() => createState().whenEntered(noop).whenExited(noop))).toBe(
		undefined
	);
});

test("transition builder requires source and destination", () => {
	const a = createState().build();

	expect(errorCode(() => createTransition().to(a).build())).toBe(
		"MISSING_FIELD"
	);
	expect(errorCode(() => createTransition().from(a).build())).toBe(
		"MISSING_FIELD"
	);
	expect(errorCode(() => createTransition().on(String).build())).toBe(
		"MISSING_FIELD"
	);
});

test("transition builder fields may be set once", () => {
	const a = createState().build();
	const b = createState().build();

	expect(errorCode(() => createTransition().from(a).from(b))).toBe(
		"FIELD_ALREADY_SET"
	);
	expect(errorCode(() => createTransition().to(a).to(b))).toBe(
		"FIELD_ALREADY_SET"
	);
	expect(errorCode(() => createTransition().on(String).on(Number))).toBe(
		"FIELD_ALREADY_SET"
	);
	expect(
		errorCode(() => createTransition().check(Guards.pass()).check(Guards.fail()))
	).toBe("FIELD_ALREADY_SET");
	expect(
		errorCode(() =>
			createTransition()
				.execute(() => undefined)
				.execute(() => undefined)
		)
	).toBe("FIELD_ALREADY_SET");

	// source and destination survive the retyping by `on()`
	expect(errorCode(() => createTransition().from(a).on(String).from(b))).toBe(
		"FIELD_ALREADY_SET"
	);
	const t = createTransition().from(a).to(b).on(String).build();
	expect(t.source).toBe(a);
	expect(t.destination).toBe(b);
});

test("on() may be called once per builder", () => {
	const a = createState().build();

	const untyped = createTransition().from(a).to(a);
	const typed = untyped.on(String);
	expect(errorCode(() => untyped.on(Number))).toBe("FIELD_ALREADY_SET");
	expect(errorCode(() => untyped.check(Guards.pass()))).toBe("ILLEGAL_ORDER");
	expect(errorCode(() => untyped.execute(() => undefined))).toBe(
		"ILLEGAL_ORDER"
	);
	expect(errorCode(() => untyped.build())).toBe("ILLEGAL_ORDER");
	expect(typed.build().eventType.name).toBe("String");

	// a retired defined builder never registers anything
	const builder = createAutomaton();
	const s = builder.defineState().build();
	const defined = builder.defineTransition().from(s).to(s);
	defined.on(String).build();
	expect(errorCode(() => defined.on(Number).build())).toBe("FIELD_ALREADY_SET");
	expect(builder.initialState(s).build().transitions).toHaveLength(1);
});

test("builders reject absent and non-callable arguments", () => {
	const state = createState();
	expect(errorCode(() => Reflect.apply(state.whenEntered, state, ["x"]))).toBe(
		"INVALID_ARGUMENT"
	);
	expect(errorCode(() => Reflect.apply(state.whenExited, state, [null]))).toBe(
		"INVALID_ARGUMENT"
	);

	const transition = createTransition();
	expect(errorCode(() => Reflect.apply(transition.from, transition, [null]))).toBe(
		"INVALID_ARGUMENT"
	);
	expect(
		errorCode(() => Reflect.apply(transition.to, transition, [undefined]))
	).toBe("INVALID_ARGUMENT");
	expect(errorCode(() => Reflect.apply(transition.on, transition, [null]))).toBe(
		"INVALID_ARGUMENT"
	);
	expect(errorCode(() => Reflect.apply(transition.check, transition, [true]))).toBe(
		"INVALID_ARGUMENT"
	);
	expect(
		errorCode(() => Reflect.apply(transition.execute, transition, [{}]))
	).toBe("INVALID_ARGUMENT");

	// rejected values leave the fields unset
	const a = createState().build();
	expect(errorCode(() => transition.from(a).to(a).check(Guards.pass()))).toBe(
		undefined
	);
});

test("argument checks are not public API", () => {
	expect("assertAction" in automatonRuntime).toBe(false);
});

test("event type must be set before guard and action", () => {
	expect(errorCode(() => createTransition().check(Guards.pass()).on(String))).toBe(
		"ILLEGAL_ORDER"
	);
	expect(
		errorCode(() =>
			createTransition()
				.execute(() => undefined)
				.on(Number)
		)
	).toBe("ILLEGAL_ORDER");
});

test("transition defaults", () => {
	const a = createState().build();
	const b = createState().build();

	const t = createTransition().from(a).to(b).build();

	expect(t.eventType).toBe(EventType.any);
	expect(t.guard).toBeUndefined();
	expect(t.action).toBeUndefined();
	expect(t.isSelfTransition).toBe(false);
	expect(t.matches(Symbol("x"))).toBe(true);
	expect(t.passes({})).toBe(true);
	expect(Object.isFrozen(t)).toBe(true);

	expect(createTransition().from(a).to(a).build().isSelfTransition).toBe(true);
});

test("guard and action only see events of the transition type", () => {
	const a = createState().build();
	const checked: string[] = [];
	const fired: string[] = [];

	const t = createTransition()
		.from(a)
		.to(a)
		.on(KeyEvent)
		.check((e) => {
			checked.push(e.key);
			return e.key === "Enter";
		})
		.execute((e) => fired.push(e.key))
		.build();

	expect(t.passes("Enter")).toBe(false);
	expect(t.passes({ key: "Enter" })).toBe(false);
	expect(t.passes(new KeyEvent("a"))).toBe(false);
	// subclasses match
	expect(t.passes(new EnterPressed())).toBe(true);
	expect(checked).toEqual(["a", "Enter"]);

	t.fire("Enter");
	t.fire(new KeyEvent("b"));
	expect(fired).toEqual(["b"]);
});

test("event types", () => {
	const key = EventType.instanceOf(KeyEvent);
	expect(key.name).toBe("KeyEvent");
	expect(key.matches(new EnterPressed())).toBe(true);
	expect(key.matches({ key: "a" })).toBe(false);

	// wrapper constructors also accept primitives
	const str = toEventType(String);
	expect(str.name).toBe("String");
	expect(str.matches("x")).toBe(true);
	expect(str.matches(new String("x"))).toBe(true);
	expect(str.matches(1)).toBe(false);
	expect(toEventType(Number).matches(1.5)).toBe(true);
	expect(toEventType(Boolean).matches(false)).toBe(true);

	expect(toEventType(EventType.number)).toBe(EventType.number);
	expect(EventType.string.matches("")).toBe(true);
	expect(EventType.number.matches("1")).toBe(false);
	expect(EventType.boolean.matches(0)).toBe(false);
	expect(EventType.bigint.matches(1n)).toBe(true);
	expect(EventType.symbol.matches(Symbol.iterator)).toBe(true);
	expect(EventType.any.matches(null)).toBe(true);

	const even = EventType.where(
		"even",
		(v): v is number => typeof v === "number" && v % 2 === 0
	);
	expect(even.name).toBe("even");
	expect(even.matches(4)).toBe(true);
	expect(even.matches(3)).toBe(false);
});

test("stock guards", () => {
	expect(Guards.pass()("anything")).toBe(true);
	expect(Guards.fail()("anything")).toBe(false);
	expect(Guards.always(true)(null)).toBe(true);
	expect(Guards.always(false)(null)).toBe(false);
});
