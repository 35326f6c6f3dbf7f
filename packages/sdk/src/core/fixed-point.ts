/**
 * Fixed-point helpers.
 *
 * Pure integer arithmetic on 18-decimal fixed-point values. Every division
 * truncates toward zero, and the order of operations is part of the
 * contract: changing it changes rounding.
 */

import { policyViolation } from "./errors.js";
import { Seconds } from "./types.js";

/** 1.0 in fixed-point. */
export const SCALE = 10n ** 18n;

export const SECONDS_PER_YEAR = 365n * 24n * 60n * 60n;

/**
 * Collateral units required to back `amount` of debt at `loanToCollateral`.
 *
 * `amount * SCALE / loanToCollateral`
 */
export function collateralFor(amount: bigint, loanToCollateral: bigint): bigint {
	if (loanToCollateral === 0n) {
		throw policyViolation(
			"ZERO_LOAN_TO_COLLATERAL",
			"Loan-to-collateral must be greater than zero",
		);
	}
	return (amount * SCALE) / loanToCollateral;
}

/**
 * Interest owed on `amount` at the annual `rate` over `duration` seconds.
 *
 * `amount * (rate * duration / SECONDS_PER_YEAR) / SCALE`
 */
export function interestFor(
	amount: bigint,
	rate: bigint,
	duration: Seconds,
): bigint {
	const interest = (rate * BigInt(duration)) / SECONDS_PER_YEAR;
	return (amount * interest) / SCALE;
}

/**
 * Collateral released when `repaid` of `outstanding` debt is paid back.
 *
 * Proportional and truncated; repaying everything releases everything.
 */
export function collateralReleased(
	collateral: bigint,
	repaid: bigint,
	outstanding: bigint,
): bigint {
	if (repaid === outstanding) {
		return collateral;
	}
	return (collateral * repaid) / outstanding;
}
