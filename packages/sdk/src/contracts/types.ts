/**
 * Lifecycle types
 *
 * Types for declaring the lifecycle of requests and loans as transition tables.
 */

/**
 * Definition of a single lifecycle state.
 */
export interface StateDefinition<TState extends string, TAction extends string> {
	/** The state name */
	name: TState;
	/** Actions allowed from this state */
	allowedActions: TAction[];
	/** Is this a terminal state (no further transitions)? */
	isFinal: boolean;
	/** Human-readable description of this state */
	description?: string;
}

/**
 * A transition triggered by an action.
 */
export interface StateTransition<TState extends string, TAction extends string> {
	/** Source state(s) for this transition */
	from: TState | TState[];
	/** Action that triggers this transition */
	action: TAction;
	/** Target state after transition */
	to: TState;
}

/**
 * Lifecycle configuration.
 */
export interface StateMachineConfig<
	TState extends string,
	TAction extends string,
> {
	/** State a new record starts in */
	initialState: TState;
	/** All possible states */
	states: StateDefinition<TState, TAction>[];
	/** All possible transitions */
	transitions: StateTransition<TState, TAction>[];
}
