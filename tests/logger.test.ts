import { createClog } from "@marianmeres/clog";
import { afterEach, expect, test, vi } from "vitest";
import { createAutomaton, defaultLogger, type Logger } from "../src/mod.ts";

afterEach(() => {
	vi.restoreAllMocks();
});

test("default logger forwards to console", () => {
	const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
	const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

	expect(defaultLogger.debug("[automaton]", 1)).toBeUndefined();
	defaultLogger.error("failed", { code: 2 });

	expect(debug).toHaveBeenCalledWith("[automaton]", 1);
	expect(error).toHaveBeenCalledWith("failed", { code: 2 });
});

test("debug traces go to the console by default", () => {
	const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

	const builder = createAutomaton({ debug: true });
	const s = builder.defineState().named("S").build();
	builder.initialState(s).build();

	expect(debug).toHaveBeenCalledWith(
		"[automaton]",
		'automaton created with 1 states, 0 transitions, initial state "S"'
	);
});

test("clog loggers are accepted", () => {
	const logger: Logger = createClog("automaton-test");
	const builder = createAutomaton({ logger });
	const s = builder.defineState().build();

	expect(builder.initialState(s).build().states.size).toBe(1);
});
