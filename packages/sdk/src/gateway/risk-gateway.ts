/**
 * Risk Gateway
 *
 * The policy boundary lenders go through to activate requests. It checks
 * protocol-wide bounds before delegating to an escrow, and moves funds
 * between itself and the treasury.
 *
 * Loans cleared through the gateway are lent from the gateway's own
 * balance, so the gateway is their lender of record.
 */

import { policyViolation, unauthorized } from "../core/errors.js";
import { SCALE } from "../core/fixed-point.js";
import { AssetId, EscrowId, Identity, Seconds, Timestamp } from "../core/types.js";
import { EscrowDirectory } from "../escrow/escrow-registry.js";
import { LedgerDirectory, Treasury } from "../ledger/types.js";

/**
 * Protocol-wide bounds on the terms the gateway will clear.
 */
export interface GatewayBounds {
	/** Lowest annual rate, fixed-point */
	minimumInterest: bigint;
	/** Highest debt per unit of collateral, fixed-point */
	maxLoanToCollateral: bigint;
	maxDuration: Seconds;
}

export const DEFAULT_BOUNDS: GatewayBounds = {
	minimumInterest: 2n * 10n ** 16n,
	maxLoanToCollateral: 2500n * SCALE,
	maxDuration: 365 * 24 * 60 * 60,
};

/**
 * Holders of the two gateway roles and their proposed successors.
 */
export interface GatewayRoles {
	operator: Identity;
	overseer: Identity;
	pendingOperator?: Identity;
	pendingOverseer?: Identity;
}

export interface RiskGatewayConfig {
	/** The gateway's own ledger identity */
	identity: Identity;
	roles: GatewayRoles;
	collateralAsset: AssetId;
	debtAsset: AssetId;
	/** Defaults to {@link DEFAULT_BOUNDS} */
	bounds?: Partial<GatewayBounds>;
	directory: EscrowDirectory;
	ledgers: LedgerDirectory;
	treasury: Treasury;
}

/**
 * @example
 * ```typescript
 * const gateway = new RiskGateway({
 *   identity: "gateway",
 *   roles: { operator: "ops", overseer: "council" },
 *   collateralAsset: "gohm",
 *   debtAsset: "dai",
 *   directory: registry,
 *   ledgers,
 *   treasury,
 * });
 *
 * await gateway.fund("council", 10_000n * SCALE);
 * const loanId = await gateway.clear("ops", escrowId, requestId, now);
 * ```
 */
export class RiskGateway {
	readonly identity: Identity;
	readonly collateralAsset: AssetId;
	readonly debtAsset: AssetId;
	readonly bounds: Readonly<GatewayBounds>;
	private current: GatewayRoles;

	constructor(private readonly config: RiskGatewayConfig) {
		this.identity = config.identity;
		this.collateralAsset = config.collateralAsset;
		this.debtAsset = config.debtAsset;
		this.bounds = { ...DEFAULT_BOUNDS, ...config.bounds };
		this.current = { ...config.roles };
	}

	roles(): GatewayRoles {
		return { ...this.current };
	}

	/**
	 * Activate a request within protocol bounds, lending from the gateway.
	 *
	 * @returns The new loan id
	 */
	async clear(
		caller: Identity,
		escrowId: EscrowId,
		requestId: number,
		now: Timestamp,
	): Promise<number> {
		this.assertOperator(caller);
		if (!(await this.config.directory.isGenuine(escrowId))) {
			throw policyViolation("UNKNOWN_ESCROW", `Escrow ${escrowId} is not registered`);
		}

		return this.config.directory.withEscrow(escrowId, async (escrow) => {
			if (
				escrow.collateralAsset !== this.collateralAsset ||
				escrow.debtAsset !== this.debtAsset
			) {
				throw policyViolation(
					"ASSET_MISMATCH",
					`Escrow ${escrowId} lends ${escrow.debtAsset} against ${escrow.collateralAsset}`,
				);
			}

			const request = escrow.getRequest(requestId);
			if (request.interest < this.bounds.minimumInterest) {
				throw policyViolation(
					"INTEREST_BELOW_MINIMUM",
					`Interest ${request.interest} is below ${this.bounds.minimumInterest}`,
				);
			}
			if (request.loanToCollateral > this.bounds.maxLoanToCollateral) {
				throw policyViolation(
					"LOAN_TO_COLLATERAL_ABOVE_MAXIMUM",
					`Loan-to-collateral ${request.loanToCollateral} is above ${this.bounds.maxLoanToCollateral}`,
				);
			}
			if (request.duration > this.bounds.maxDuration) {
				throw policyViolation(
					"DURATION_ABOVE_MAXIMUM",
					`Duration ${request.duration} is above ${this.bounds.maxDuration}`,
				);
			}

			// the escrow may pull exactly the principal; any earlier allowance is put back
			const debt = this.config.ledgers.ledgerFor(this.debtAsset);
			const previous = await debt.allowance(this.identity, escrow.id);
			await debt.approve(this.identity, escrow.id, request.amount);
			try {
				return await escrow.clear(this.identity, requestId, now);
			} finally {
				await debt.approve(this.identity, escrow.id, previous);
			}
		});
	}

	/**
	 * Flip rollability of a loan the gateway lent.
	 *
	 * @returns The new value
	 */
	async toggleRoll(
		caller: Identity,
		escrowId: EscrowId,
		loanId: number,
	): Promise<boolean> {
		this.assertOperator(caller);
		return this.config.directory.withEscrow(escrowId, (escrow) =>
			escrow.toggleRoll(this.identity, loanId),
		);
	}

	/**
	 * Draw debt asset from the treasury into the gateway.
	 */
	async fund(caller: Identity, amount: bigint): Promise<void> {
		if (caller !== this.current.overseer) {
			throw unauthorized("Only the overseer can fund the gateway");
		}
		await this.config.treasury.withdraw(
			this.identity,
			this.identity,
			this.debtAsset,
			amount,
		);
	}

	/**
	 * Return `amount` of `asset` from the gateway to the treasury.
	 */
	async defund(caller: Identity, asset: AssetId, amount: bigint): Promise<void> {
		if (caller !== this.current.operator && caller !== this.current.overseer) {
			throw unauthorized("Only the operator or overseer can defund the gateway");
		}
		await this.config.ledgers
			.ledgerFor(asset)
			.transfer(this.identity, this.config.treasury.identity, amount);
	}

	proposeOperator(caller: Identity, next: Identity): void {
		this.assertOperator(caller);
		this.current.pendingOperator = next;
	}

	acceptOperator(caller: Identity): void {
		if (this.current.pendingOperator !== caller) {
			throw unauthorized(`${caller} is not the proposed operator`);
		}
		this.current.operator = caller;
		delete this.current.pendingOperator;
	}

	proposeOverseer(caller: Identity, next: Identity): void {
		if (caller !== this.current.overseer) {
			throw unauthorized("Only the overseer can propose a new overseer");
		}
		this.current.pendingOverseer = next;
	}

	acceptOverseer(caller: Identity): void {
		if (this.current.pendingOverseer !== caller) {
			throw unauthorized(`${caller} is not the proposed overseer`);
		}
		this.current.overseer = caller;
		delete this.current.pendingOverseer;
	}

	private assertOperator(caller: Identity): void {
		if (caller !== this.current.operator) {
			throw unauthorized("Only the operator can do this");
		}
	}
}
