import { PreconditionError } from "./errors.ts";

/** Throws `INVALID_ARGUMENT` unless `fn` is callable. */
export function assertAction<F extends (...args: never[]) => unknown>(
	fn: F,
	label: string
): F {
	if (typeof fn !== "function") {
		throw new PreconditionError(
			"INVALID_ARGUMENT",
			`${label} must be a function!`
		);
	}
	return fn;
}
