/**
 * Lifecycle State Machine
 *
 * A stateless transition table. Records keep their own state; the machine
 * only answers whether an action is allowed and what state it leads to.
 */

import { invalidState } from "../core/errors.js";
import {
	StateDefinition,
	StateMachineConfig,
	StateTransition,
} from "./types.js";

/**
 * @example
 * ```typescript
 * type DoorState = "open" | "closed";
 * type DoorAction = "close" | "open";
 *
 * const door = new LifecycleMachine<DoorState, DoorAction>({
 *   initialState: "open",
 *   states: [
 *     createState("open", ["close"]),
 *     createState("closed", ["open"]),
 *   ],
 *   transitions: [
 *     createTransition("open", "close", "closed"),
 *     createTransition("closed", "open", "open"),
 *   ],
 * });
 *
 * door.transition("open", "close", "door 1"); // "closed"
 * door.transition("open", "open", "door 1"); // throws INVALID_STATE
 * ```
 */
export class LifecycleMachine<TState extends string, TAction extends string> {
	private readonly stateMap: Map<TState, StateDefinition<TState, TAction>>;
	private readonly transitionMap: Map<string, StateTransition<TState, TAction>>;

	constructor(private readonly config: StateMachineConfig<TState, TAction>) {
		this.stateMap = new Map();
		for (const state of config.states) {
			this.stateMap.set(state.name, state);
		}

		this.transitionMap = new Map();
		for (const transition of config.transitions) {
			const froms = Array.isArray(transition.from)
				? transition.from
				: [transition.from];
			for (const from of froms) {
				this.transitionMap.set(`${from}:${transition.action}`, transition);
			}
		}
	}

	get initialState(): TState {
		return this.config.initialState;
	}

	/**
	 * Check if an action is allowed from a state.
	 */
	canPerform(state: TState, action: TAction): boolean {
		const definition = this.stateMap.get(state);
		return (
			(definition?.allowedActions.includes(action) ?? false) &&
			this.transitionMap.has(`${state}:${action}`)
		);
	}

	/**
	 * Resolve the state reached by performing `action` from `state`.
	 *
	 * @param subject - Used in the error message, e.g. "loan 3"
	 * @throws EscrowError INVALID_STATE when the action is not allowed
	 */
	transition(state: TState, action: TAction, subject: string): TState {
		const transition = this.transitionMap.get(`${state}:${action}`);
		if (!transition || !this.canPerform(state, action)) {
			throw invalidState(`Cannot ${action} ${subject}: it is ${state}`);
		}
		return transition.to;
	}

	isFinal(state: TState): boolean {
		return this.stateMap.get(state)?.isFinal ?? false;
	}

	getAllowedActions(state: TState): TAction[] {
		return this.stateMap.get(state)?.allowedActions ?? [];
	}
}

/**
 * Helper to create a state definition.
 */
export function createState<TState extends string, TAction extends string>(
	name: TState,
	allowedActions: TAction[],
	options: { isFinal?: boolean; description?: string } = {},
): StateDefinition<TState, TAction> {
	return {
		name,
		allowedActions,
		isFinal: options.isFinal ?? false,
		description: options.description,
	};
}

/**
 * Helper to create a state transition.
 */
export function createTransition<TState extends string, TAction extends string>(
	from: TState | TState[],
	action: TAction,
	to: TState,
): StateTransition<TState, TAction> {
	return { from, action, to };
}
