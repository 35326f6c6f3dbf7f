/**
 * Error thrown by escrow and gateway operations.
 *
 * Every error aborts the whole operation: no state change is kept and no
 * asset moves.
 */
export class EscrowError extends Error {
	constructor(
		message: string,
		public readonly code: EscrowErrorCode,
		public readonly reason?: PolicyViolationReason,
	) {
		super(message);
		this.name = "EscrowError";
	}
}

export type EscrowErrorCode =
	| "UNAUTHORIZED"
	| "INVALID_STATE"
	// loan is past expiry and the action needs it current
	| "DEFAULT"
	// seizure attempted before expiry
	| "NO_DEFAULT"
	| "NOT_ROLLABLE"
	| "POLICY_VIOLATION";

export type PolicyViolationReason =
	| "INTEREST_BELOW_MINIMUM"
	| "LOAN_TO_COLLATERAL_ABOVE_MAXIMUM"
	| "DURATION_ABOVE_MAXIMUM"
	| "ASSET_MISMATCH"
	| "UNKNOWN_ESCROW"
	| "ZERO_LOAN_TO_COLLATERAL"
	| "OVER_REPAYMENT"
	| "NEGATIVE_AMOUNT"
	| "INVALID_DURATION"
	| "EXPIRY_OUT_OF_RANGE";

export const unauthorized = (message: string) =>
	new EscrowError(message, "UNAUTHORIZED");

export const invalidState = (message: string) =>
	new EscrowError(message, "INVALID_STATE");

export const policyViolation = (
	reason: PolicyViolationReason,
	message: string,
) => new EscrowError(message, "POLICY_VIOLATION", reason);

export function isEscrowError(err: unknown): err is EscrowError {
	return err instanceof EscrowError;
}
