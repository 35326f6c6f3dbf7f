/**
 * Core Types
 *
 * Primitive types shared by every module of the lending protocol.
 */

/**
 * Opaque identity of a party (borrower, lender, operator, escrow, treasury).
 *
 * No structure is assumed beyond equality.
 */
export type Identity = string;

/**
 * Identifier of a fungible asset on the ledger.
 */
export type AssetId = string;

/**
 * Identifier of an escrow instance, also its identity on the asset ledger.
 */
export type EscrowId = Identity;

/**
 * Unix time in seconds.
 */
export type Timestamp = number;

/**
 * Whole seconds.
 */
export type Seconds = number;

/**
 * Terms a borrower offers and a lender accepts.
 *
 * All fixed-point values use an 18-decimal scale.
 */
export interface LoanTerms {
	/** Requested debt amount in debt-asset base units */
	amount: bigint;
	/** Annualized interest rate (1e18 == 100%) */
	interest: bigint;
	/** Debt units per collateral unit, scaled by 1e18 */
	loanToCollateral: bigint;
	/** Loan tenor */
	duration: Seconds;
}
