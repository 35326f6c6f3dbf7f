/**
 * Escrow Module Types
 *
 * An escrow belongs to exactly one borrower and one (collateral, debt)
 * asset pair. It holds the borrower's requests and the loans lenders
 * activated from them.
 *
 * Lifecycle:
 * - request: the borrower locks collateral and offers terms
 * - rescind: the borrower withdraws an unfilled request and its collateral
 * - clear: a lender accepts a request, disbursing the debt to the borrower
 * - repay: the borrower pays back part or all of a loan, releasing collateral
 * - roll: the borrower extends a loan by re-applying its terms
 * - default: an expired loan's collateral goes to the lender
 */

import {
	AssetId,
	EscrowId,
	Identity,
	LoanTerms,
	Timestamp,
} from "../core/types.js";

/**
 * Request lifecycle states.
 */
export type RequestState = "active" | "rescinded" | "cleared";

export type RequestAction = "rescind" | "clear";

/**
 * Loan lifecycle states.
 *
 * `repaid` and `defaulted` are tombstones: the loan's id stays allocated but
 * the loan itself is gone.
 */
export type LoanState = "open" | "repaid" | "defaulted";

export type LoanAction =
	| "repay"
	| "repay-in-full"
	| "roll"
	| "toggle-roll"
	| "approve-transfer"
	| "transfer"
	| "claim-default";

/**
 * A borrower's offer. Not a liability until cleared.
 */
export interface LoanRequest extends LoanTerms {
	status: RequestState;
}

/**
 * An activated liability.
 */
export interface Loan {
	/** Terms frozen at clear time */
	request: LoanTerms;
	/** Outstanding debt: principal plus accrued interest */
	amount: bigint;
	/** Collateral currently pledged */
	collateral: bigint;
	/** The loan is in default once the current time is past this */
	expiry: Timestamp;
	/** Whether the borrower may roll the loan; lender-controlled */
	rollable: boolean;
	/** Party owed `amount` */
	lender: Identity;
	/** Party the lender approved to take the loan over */
	pendingLender?: Identity;
}

export type LoanSlot =
	| { status: "open"; loan: Loan }
	| { status: "repaid" }
	| { status: "defaulted" };

/**
 * Full, serializable state of one escrow.
 *
 * `requests` and `loans` are append-only; an id is the index of its slot.
 */
export interface EscrowSnapshot {
	id: EscrowId;
	owner: Identity;
	collateralAsset: AssetId;
	debtAsset: AssetId;
	requests: LoanRequest[];
	loans: LoanSlot[];
}

export type EscrowEventKind =
	| "requested"
	| "rescinded"
	| "cleared"
	| "repaid"
	| "rolled"
	| "defaulted";

/**
 * Emitted after an operation fully succeeds.
 */
export interface EscrowNotification {
	escrowId: EscrowId;
	kind: EscrowEventKind;
	/** Request id for request events, loan id for loan events */
	id: number;
}

/**
 * Fire-and-forget sink for escrow notifications.
 */
export interface NotificationSink {
	notify(notification: EscrowNotification): void;
}
