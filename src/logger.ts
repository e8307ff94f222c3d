/**
 * Logger interface compatible with console and @marianmeres/clog.
 * All methods accept variadic arguments; return values are ignored.
 */
export interface Logger {
	debug: (...args: unknown[]) => unknown;
	log: (...args: unknown[]) => unknown;
	warn: (...args: unknown[]) => unknown;
	error: (...args: unknown[]) => unknown;
}

/**
 * Default console-based logger that wraps console methods.
 */
export const defaultLogger: Logger = {
	debug: (...args: unknown[]) => console.debug(...args),
	log: (...args: unknown[]) => console.log(...args),
	warn: (...args: unknown[]) => console.warn(...args),
	error: (...args: unknown[]) => console.error(...args),
};

/** Options shared by everything that can log debug traces. */
export type LoggingOptions = {
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};
