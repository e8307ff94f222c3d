/**
 * @module
 *
 * A finite-state-automaton runtime with builder-based construction.
 *
 * Declare states and labeled transitions, freeze them into an automaton, then
 * drive it by posting events. Transitions are matched by source state, runtime
 * event type and an optional guard, in registration order; exit, transition
 * and entry actions fire in a strict order. Deferred work runs on a pluggable
 * executor: synchronous by default, or a {@link SerialExecutor} mailbox.
 *
 * @example Greeter
 * ```typescript
 * import { createAutomaton } from "automaton-runtime";
 *
 * const builder = createAutomaton();
 * const state = builder.defineState().build();
 *
 * builder.defineTransition()
 *   .from(state).to(state)
 *   .on(String)
 *   .check((e) => e.length > 0)
 *   .execute((e) => console.log(`Hello, ${e}!`))
 *   .build();
 *
 * const automaton = builder.initialState(state).build();
 * automaton.enable();
 * automaton.post("Sam"); // Hello, Sam!
 * ```
 */

export * from "./types.ts";
export * from "./errors.ts";
export * from "./event-type.ts";
export * from "./logger.ts";
export * from "./state.ts";
export * from "./transition.ts";
export * from "./executor.ts";
export * from "./automaton.ts";
