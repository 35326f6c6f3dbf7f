/**
 * TypeORM Asset Ledger
 *
 * Implements the SDK's AssetLedger over the ledger_balances and
 * ledger_allowances tables. Instances are bound to an EntityManager, so
 * every movement joins the caller's transaction.
 */

import type { EntityManager } from "typeorm";
import {
	type AssetId,
	type AssetLedger,
	type Identity,
	type LedgerDirectory,
	LedgerError,
} from "@pairloan/sdk";
import { Allowance } from "./allowance.entity";
import { Balance } from "./balance.entity";

export class TypeOrmAssetLedger implements AssetLedger {
	constructor(
		private readonly manager: EntityManager,
		readonly asset: AssetId,
	) {}

	async balanceOf(holder: Identity): Promise<bigint> {
		const row = await this.manager.findOne(Balance, {
			where: { asset: this.asset, holder },
		});
		return row?.amount ?? 0n;
	}

	async allowance(owner: Identity, spender: Identity): Promise<bigint> {
		const row = await this.manager.findOne(Allowance, {
			where: { asset: this.asset, owner, spender },
		});
		return row?.amount ?? 0n;
	}

	async approve(
		owner: Identity,
		spender: Identity,
		amount: bigint,
	): Promise<void> {
		assertAmount(amount);
		await this.writeAllowance(owner, spender, amount);
	}

	async transfer(from: Identity, to: Identity, amount: bigint): Promise<void> {
		assertAmount(amount);
		await this.move(from, to, amount);
	}

	async transferFrom(
		spender: Identity,
		from: Identity,
		to: Identity,
		amount: bigint,
	): Promise<void> {
		assertAmount(amount);
		const allowed = await this.allowance(from, spender);
		if (allowed < amount) {
			throw new LedgerError(
				`${spender} may move ${allowed} ${this.asset} of ${from}, needs ${amount}`,
				"INSUFFICIENT_ALLOWANCE",
				{ asset: this.asset, owner: from, spender },
			);
		}
		await this.move(from, to, amount);
		await this.writeAllowance(from, spender, allowed - amount);
	}

	/**
	 * Credit `holder` out of thin air. Development funding only.
	 */
	async mint(holder: Identity, amount: bigint): Promise<void> {
		assertAmount(amount);
		await this.writeBalance(holder, (await this.balanceOf(holder)) + amount);
	}

	private async move(from: Identity, to: Identity, amount: bigint) {
		const available = await this.balanceOf(from);
		if (available < amount) {
			throw new LedgerError(
				`${from} holds ${available} ${this.asset}, needs ${amount}`,
				"INSUFFICIENT_BALANCE",
				{ asset: this.asset, holder: from },
			);
		}
		if (from === to) {
			return;
		}
		await this.writeBalance(from, available - amount);
		await this.writeBalance(to, (await this.balanceOf(to)) + amount);
	}

	private async writeBalance(holder: Identity, amount: bigint) {
		const row =
			(await this.manager.findOne(Balance, {
				where: { asset: this.asset, holder },
			})) ?? this.manager.create(Balance, { asset: this.asset, holder });
		row.amount = amount;
		await this.manager.save(row);
	}

	private async writeAllowance(
		owner: Identity,
		spender: Identity,
		amount: bigint,
	) {
		const row =
			(await this.manager.findOne(Allowance, {
				where: { asset: this.asset, owner, spender },
			})) ??
			this.manager.create(Allowance, { asset: this.asset, owner, spender });
		row.amount = amount;
		await this.manager.save(row);
	}
}

/**
 * The ledgers of the assets this deployment trades.
 */
export class TypeOrmLedgerDirectory implements LedgerDirectory {
	private readonly ledgers = new Map<AssetId, TypeOrmAssetLedger>();

	constructor(manager: EntityManager, assets: AssetId[]) {
		for (const asset of assets) {
			this.ledgers.set(asset, new TypeOrmAssetLedger(manager, asset));
		}
	}

	ledgerFor(asset: AssetId): TypeOrmAssetLedger {
		const ledger = this.ledgers.get(asset);
		if (!ledger) {
			throw new LedgerError(`Unknown asset ${asset}`, "UNKNOWN_ASSET", {
				asset,
			});
		}
		return ledger;
	}
}

function assertAmount(amount: bigint): void {
	if (amount < 0n) {
		throw new LedgerError(`Invalid amount ${amount}`, "INVALID_AMOUNT");
	}
}
