#!/usr/bin/env -S npx tsx
/**
 * @module
 *
 * Console demos driving an automaton with lines read from standard input.
 *
 * @example Usage via npm script
 * ```sh
 * npm run example -- --example greeter
 * npm run example -- --example engine --debug
 * ```
 *
 * Options:
 * - `--example <name>` - One of `greeter`, `light-bulb`, `engine` (default: `greeter`)
 * - `--debug` - Log every dispatch step
 * - `--help` - Show help message
 */

import { createInterface } from "node:readline";
import { setTimeout as delay } from "node:timers/promises";
import { parseArgs } from "node:util";
import { createClog } from "@marianmeres/clog";
import {
	createAutomaton,
	SerialExecutor,
	type Automaton,
	type AutomatonOptions,
	type Logger,
	type State,
} from "../src/mod.ts";

const { values: args } = parseArgs({
	options: {
		example: { type: "string", default: "greeter" },
		debug: { type: "boolean", default: false },
		help: { type: "boolean", default: false },
	},
});

if (args.help) {
	console.log(`
examples - Drive an automaton from the console

Usage:
  npx tsx scripts/examples.ts [options]

Options:
  --example <name>  greeter | light-bulb | engine (default: greeter)
  --debug           Log every dispatch step
  --help            Show this help message

Examples:
  # Greets every non-empty line
  npx tsx scripts/examples.ts --example greeter

  # Type "on" and "off"
  npx tsx scripts/examples.ts --example light-bulb

  # Type "start", wait, then "stop"
  npx tsx scripts/examples.ts --example engine --debug
`);
	process.exit(0);
}

const logger: Logger = createClog("automaton");
const options: AutomatonOptions = { debug: args.debug, logger };

/**
 * Single state; any non-empty line is added to the phrase "Hello, (...)!".
 */
function greeter(): Automaton {
	const builder = createAutomaton(options);
	const state = builder.defineState().named("GREETING").build();

	builder
		.defineTransition()
		.from(state)
		.to(state)
		.on(String)
		.check((e) => e.length > 0)
		.execute((e) => console.log(`Hello, ${e}!`))
		.build();

	return builder.initialState(state).build();
}

/**
 * Turns on when "on" is entered while off and off when "off" is entered
 * while on.
 */
function lightBulb(): Automaton {
	const builder = createAutomaton(options);

	const off = builder
		.defineState()
		.named("OFF")
		.whenEntered(() => console.log("The light bulb has been turned off!"))
		.build();
	const on = builder
		.defineState()
		.named("ON")
		.whenEntered(() => console.log("The light bulb has been turned on!"))
		.build();

	builder.defineTransition().from(off).to(on).check((e) => e === "on").build();
	builder.defineTransition().from(on).to(off).check((e) => e === "off").build();

	return builder.initialState(off).build();
}

/**
 * Plain constants as states. After "start" the engine cranks for a while and
 * posts a synthetic STARTED event itself; "stop" turns it off again.
 */
function engine(): Automaton {
	const EngineState = {
		OFF: Object.freeze({ name: "OFF" }),
		CRANKING: Object.freeze({ name: "CRANKING" }),
		RUNNING: Object.freeze({ name: "RUNNING" }),
	} satisfies Record<string, State>;
	const STARTED = Symbol("STARTED");

	// actions post follow-up events, so work must be queued, not nested
	const executor = new SerialExecutor({
		onError: (error) => logger.error(error),
	});
	const builder = createAutomaton(options)
		.addStates(Object.values(EngineState))
		.executor(executor);

	builder
		.defineTransition()
		.from(EngineState.OFF)
		.to(EngineState.CRANKING)
		.check((e) => e === "start")
		.execute(() => {
			console.log("Turning engine on...");
			delay(2500)
				.then(() => automaton.post(STARTED))
				.catch((error: unknown) => logger.error(error));
		})
		.build();

	builder
		.defineTransition()
		.from(EngineState.CRANKING)
		.to(EngineState.RUNNING)
		.check((e) => e === STARTED)
		.execute(() => console.log("Engine is now running!"))
		.build();

	builder
		.defineTransition()
		.from(EngineState.RUNNING)
		.to(EngineState.OFF)
		.check((e) => e === "stop")
		.execute(() => console.log("Engine stopped!"))
		.build();

	const automaton = builder.initialState(EngineState.OFF).build();
	return automaton;
}

const factories: Record<string, () => Automaton> = {
	greeter,
	"light-bulb": lightBulb,
	engine,
};

const factory = factories[args.example ?? "greeter"];
if (!factory) {
	console.error(`Error: unknown example "${args.example}"`);
	console.error("Run with --help for usage information");
	process.exit(1);
}

const automaton = factory();
automaton.enable();

const rl = createInterface({ input: process.stdin });
rl.on("line", (line) => {
	try {
		automaton.post(line);
	} catch (error) {
		console.error(`Error: ${error instanceof Error ? error.message : error}`);
	}
});
