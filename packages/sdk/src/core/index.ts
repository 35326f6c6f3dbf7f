/**
 * Core module - primitive types, errors and fixed-point math
 */

export type {
	Identity,
	AssetId,
	EscrowId,
	Timestamp,
	Seconds,
	LoanTerms,
} from "./types.js";

export {
	EscrowError,
	type EscrowErrorCode,
	type PolicyViolationReason,
	unauthorized,
	invalidState,
	policyViolation,
	isEscrowError,
} from "./errors.js";

export {
	SCALE,
	SECONDS_PER_YEAR,
	collateralFor,
	interestFor,
	collateralReleased,
} from "./fixed-point.js";
