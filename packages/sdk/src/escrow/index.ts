/**
 * Escrow module - per-borrower loan book
 */

export type {
	RequestState,
	RequestAction,
	LoanState,
	LoanAction,
	LoanRequest,
	Loan,
	LoanSlot,
	EscrowSnapshot,
	EscrowEventKind,
	EscrowNotification,
	NotificationSink,
} from "./types.js";

export { REQUEST_LIFECYCLE, LOAN_LIFECYCLE } from "./escrow-state-machine.js";
export { EscrowEngine, type EscrowEngineOptions } from "./escrow-engine.js";
export {
	EscrowRegistry,
	type EscrowDirectory,
	type EscrowRegistryOptions,
} from "./escrow-registry.js";
