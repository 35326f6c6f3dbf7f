/**
 * Escrow lifecycles: requests and loans.
 */

import {
	LifecycleMachine,
	createState,
	createTransition,
} from "../contracts/index.js";
import {
	LoanAction,
	LoanState,
	RequestAction,
	RequestState,
} from "./types.js";

export const REQUEST_LIFECYCLE = new LifecycleMachine<
	RequestState,
	RequestAction
>({
	initialState: "active",
	states: [
		createState("active", ["rescind", "clear"], {
			description: "Collateral locked, waiting for a lender",
		}),
		createState("rescinded", [], {
			isFinal: true,
			description: "Withdrawn by the borrower, collateral refunded",
		}),
		createState("cleared", [], {
			isFinal: true,
			description: "Activated by a lender",
		}),
	],
	transitions: [
		createTransition("active", "rescind", "rescinded"),
		createTransition("active", "clear", "cleared"),
	],
});

export const LOAN_LIFECYCLE = new LifecycleMachine<LoanState, LoanAction>({
	initialState: "open",
	states: [
		createState(
			"open",
			[
				"repay",
				"repay-in-full",
				"roll",
				"toggle-roll",
				"approve-transfer",
				"transfer",
				"claim-default",
			],
			{ description: "Debt outstanding" },
		),
		createState("repaid", [], {
			isFinal: true,
			description: "Fully repaid, collateral released",
		}),
		createState("defaulted", [], {
			isFinal: true,
			description: "Expired unpaid, collateral seized by the lender",
		}),
	],
	transitions: [
		createTransition("open", "repay", "open"),
		createTransition("open", "roll", "open"),
		createTransition("open", "toggle-roll", "open"),
		createTransition("open", "approve-transfer", "open"),
		createTransition("open", "transfer", "open"),
		createTransition("open", "repay-in-full", "repaid"),
		createTransition("open", "claim-default", "defaulted"),
	],
});
