import { ExecutorRejectedError, PreconditionError } from "./errors.ts";
import { defaultLogger, type Logger, type LoggingOptions } from "./logger.ts";
import type { Executor, Work } from "./types.ts";

/**
 * Runs every unit of work synchronously, before `execute` returns. Errors
 * thrown by the unit propagate to the caller of `execute`.
 *
 * This is the default executor of an automaton: with it, `enable()` and
 * `post()` are fully synchronous calls. Work submitted from inside running
 * work also runs immediately (nested), so a transition action must not post
 * events to its own automaton; use a {@link SerialExecutor} for that.
 */
export const immediateExecutor: Executor = Object.freeze({
	execute: (work: Work): void => work(),
});

/**
 * Serial executor options.
 */
export type SerialExecutorOptions = LoggingOptions & {
	/**
	 * Maximum number of pending units. When reached, `execute` throws
	 * {@link ExecutorRejectedError}. Unbounded by default.
	 */
	maxQueueSize?: number;
	/**
	 * Receives errors thrown by units of work. When absent, the error is
	 * logged and rethrown on a fresh microtask, where it surfaces as an
	 * uncaught exception.
	 */
	onError?: (error: unknown) => void;
	/** Schedules a drain of the queue (default: `queueMicrotask`) */
	schedule?: (drain: () => void) => void;
};

/**
 * Single-consumer mailbox. Submitted units run one at a time, in submission
 * order, on a turn scheduled after the submitting call returns. Units
 * submitted while the queue drains run after the current unit completes.
 *
 * A failing unit does not stop the queue.
 *
 * @example
 * ```typescript
 * const executor = new SerialExecutor({ maxQueueSize: 100 });
 * const automaton = createAutomaton()
 *   // ...
 *   .executor(executor)
 *   .build();
 *
 * automaton.enable();
 * automaton.post("start");
 * await executor.whenIdle();
 * ```
 */
export class SerialExecutor implements Executor {
	#queue: Work[] = [];
	#scheduled = false;
	#running = false;
	#idleWaiters: (() => void)[] = [];

	#maxQueueSize: number;
	#onError?: (error: unknown) => void;
	#schedule: (drain: () => void) => void;
	#logger: Logger;
	#debug: boolean;

	constructor(options: SerialExecutorOptions = {}) {
		const { maxQueueSize } = options;
		if (
			maxQueueSize !== undefined &&
			!(Number.isInteger(maxQueueSize) && maxQueueSize > 0)
		) {
			// prettier-ignore
			throw new PreconditionError("INVALID_ARGUMENT", "Max queue size must be a positive integer!");
		}
		this.#maxQueueSize = options.maxQueueSize ?? Infinity;
		this.#onError = options.onError;
		this.#schedule = options.schedule ?? ((drain) => queueMicrotask(drain));
		this.#logger = options.logger ?? defaultLogger;
		this.#debug = options.debug ?? false;
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[executor]", ...args);
		}
	}

	/** Number of units waiting to run (the running one excluded). */
	get pending(): number {
		return this.#queue.length;
	}

	/** `true` when nothing is queued or running. */
	get idle(): boolean {
		return !this.#running && this.#queue.length === 0;
	}

	execute(work: Work): void {
		if (this.#queue.length >= this.#maxQueueSize) {
			this.#debugLog(`rejected: ${this.#queue.length} units pending`);
			throw new ExecutorRejectedError(this.#maxQueueSize);
		}
		this.#queue.push(work);
		if (!this.#scheduled && !this.#running) {
			this.#scheduled = true;
			this.#schedule(() => this.#drain());
		}
	}

	/**
	 * Resolves once the queue is drained. Resolves immediately when idle.
	 */
	whenIdle(): Promise<void> {
		if (this.idle) return Promise.resolve();
		return new Promise((resolve) => this.#idleWaiters.push(resolve));
	}

	#drain(): void {
		this.#scheduled = false;
		this.#running = true;
		this.#debugLog(`draining ${this.#queue.length} unit(s)`);
		try {
			let work = this.#queue.shift();
			while (work !== undefined) {
				try {
					work();
				} catch (error) {
					this.#report(error);
				}
				work = this.#queue.shift();
			}
		} finally {
			this.#running = false;
			// an `onError` hook that throws leaves units behind
			if (this.#queue.length > 0 && !this.#scheduled) {
				this.#scheduled = true;
				this.#schedule(() => this.#drain());
			}
		}
		const waiters = this.#idleWaiters.splice(0);
		waiters.forEach((resolve) => resolve());
	}

	#report(error: unknown): void {
		if (this.#onError) {
			this.#onError(error);
			return;
		}
		this.#logger.error("[executor] unit of work failed:", error);
		queueMicrotask(() => {
			throw error;
		});
	}
}
