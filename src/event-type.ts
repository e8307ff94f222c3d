/**
 * Runtime type descriptor used to filter events. A transition only
 * considers events for which `matches` answers `true`, and its guard and
 * action are statically typed against `T`.
 *
 * @template T - Type of events this descriptor accepts
 */
export interface EventType<T> {
	/** Human readable name, used in debug logs */
	readonly name: string;
	/** Answers "is this value an instance of T" */
	matches(value: unknown): value is T;
}

/** Any class, including abstract ones. */
export type Constructor<T> = abstract new (...args: never[]) => T;

/** Either a ready descriptor or a class whose instances are accepted. */
export type EventTypeLike<T> = EventType<T> | Constructor<T>;

// boxed primitives are never `instanceof` their wrapper, so map them explicitly
const PRIMITIVE_WRAPPERS = new Map<unknown, string>([
	[String, "string"],
	[Number, "number"],
	[Boolean, "boolean"],
	[BigInt, "bigint"],
	[Symbol, "symbol"],
]);

const where = <T>(
	name: string,
	predicate: (value: unknown) => value is T
): EventType<T> => ({
	name,
	matches: (value: unknown): value is T => predicate(value),
});

const instanceOf = <T>(ctor: Constructor<T>): EventType<T> => {
	const primitive = PRIMITIVE_WRAPPERS.get(ctor);
	return where(
		ctor.name || "(anonymous)",
		(value: unknown): value is T =>
			value instanceof ctor ||
			(primitive !== undefined && typeof value === primitive)
	);
};

/**
 * Built-in event type descriptors.
 *
 * @example
 * ```typescript
 * EventType.string.matches("on"); // true
 * EventType.instanceOf(KeyPressed).matches(new KeyPressed("a")); // true
 * ```
 */
export const EventType = {
	/** Matches every event. This is the default filter of a transition. */
	any: where("any", (_value: unknown): _value is unknown => true),
	string: where("string", (v: unknown): v is string => typeof v === "string"),
	number: where("number", (v: unknown): v is number => typeof v === "number"),
	boolean: where(
		"boolean",
		(v: unknown): v is boolean => typeof v === "boolean"
	),
	bigint: where("bigint", (v: unknown): v is bigint => typeof v === "bigint"),
	symbol: where("symbol", (v: unknown): v is symbol => typeof v === "symbol"),
	instanceOf,
	where,
} as const;

/**
 * Normalizes a class or a descriptor into an {@link EventType}.
 * The `String`, `Number` and `Boolean` constructors map to their primitives.
 */
export function toEventType(type: StringConstructor): EventType<string>;
export function toEventType(type: NumberConstructor): EventType<number>;
export function toEventType(type: BooleanConstructor): EventType<boolean>;
export function toEventType<T>(type: EventTypeLike<T>): EventType<T>;
export function toEventType<T>(type: EventTypeLike<T>): EventType<T> {
	return typeof type === "function" ? instanceOf(type) : type;
}
