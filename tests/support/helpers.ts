import {
	AutomatonError,
	type AutomatonErrorCode,
	type Logger,
} from "../../src/mod.ts";

/**
 * Runs `fn` and returns the code of the thrown {@link AutomatonError}, or
 * `undefined` when nothing was thrown.
 */
export function errorCode(
	fn: () => unknown
): AutomatonErrorCode | "UNEXPECTED" | undefined {
	try {
		fn();
	} catch (error) {
		return error instanceof AutomatonError ? error.code : "UNEXPECTED";
	}
	return undefined;
}

/**
 * Logger collecting every call as one space-joined line.
 */
export function createRecordingLogger(): { logger: Logger; lines: string[] } {
	const lines: string[] = [];
	const record = (...args: unknown[]) => {
		lines.push(args.map(String).join(" "));
	};
	return {
		lines,
		logger: { debug: record, log: record, warn: record, error: record },
	};
}
