/**
 * Contracts module - lifecycle state machines
 */

export type {
	StateDefinition,
	StateTransition,
	StateMachineConfig,
} from "./types.js";

export {
	LifecycleMachine,
	createState,
	createTransition,
} from "./state-machine.js";
