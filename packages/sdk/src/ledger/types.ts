/**
 * Asset Ledger Types
 *
 * The fungible-balance capability the protocol consumes. The protocol never
 * reads or writes balances directly: every movement of debt or collateral
 * goes through one of these operations.
 */

import { AssetId, Identity } from "../core/types.js";

/**
 * A single fungible asset.
 *
 * `from`/`owner`/`spender` stand for the identity on whose behalf the call
 * is made, which a hosting environment would take from the transaction.
 */
export interface AssetLedger {
	/** The asset this ledger moves */
	readonly asset: AssetId;

	balanceOf(holder: Identity): Promise<bigint>;

	allowance(owner: Identity, spender: Identity): Promise<bigint>;

	/**
	 * Authorize `spender` to move up to `amount` of `owner`'s balance.
	 *
	 * Replaces any previous allowance.
	 */
	approve(owner: Identity, spender: Identity, amount: bigint): Promise<void>;

	/**
	 * Move `amount` out of `from`'s own balance.
	 *
	 * @throws LedgerError INSUFFICIENT_BALANCE
	 */
	transfer(from: Identity, to: Identity, amount: bigint): Promise<void>;

	/**
	 * Move `amount` from a third party that pre-authorized `spender`.
	 *
	 * @throws LedgerError INSUFFICIENT_ALLOWANCE or INSUFFICIENT_BALANCE
	 */
	transferFrom(
		spender: Identity,
		from: Identity,
		to: Identity,
		amount: bigint,
	): Promise<void>;
}

/**
 * Resolves the ledger of each asset.
 */
export interface LedgerDirectory {
	/**
	 * @throws LedgerError UNKNOWN_ASSET
	 */
	ledgerFor(asset: AssetId): AssetLedger;
}

/**
 * The reserve that funds the gateway.
 */
export interface Treasury {
	/** Identity that receives defunded assets */
	readonly identity: Identity;

	/**
	 * Send `amount` of `asset` from the reserve to `recipient`.
	 *
	 * @param requester - Party asking for the funds; must be authorized
	 */
	withdraw(
		requester: Identity,
		recipient: Identity,
		asset: AssetId,
		amount: bigint,
	): Promise<void>;
}

export type LedgerErrorCode =
	| "INSUFFICIENT_BALANCE"
	| "INSUFFICIENT_ALLOWANCE"
	| "UNKNOWN_ASSET"
	| "INVALID_AMOUNT"
	| "UNAUTHORIZED";

/**
 * Error thrown by ledger and treasury operations.
 */
export class LedgerError extends Error {
	constructor(
		message: string,
		public readonly code: LedgerErrorCode,
		public readonly details?: Record<string, string>,
	) {
		super(message);
		this.name = "LedgerError";
	}
}

export function isLedgerError(err: unknown): err is LedgerError {
	return err instanceof LedgerError;
}
