/**
 * In-Memory Ledger
 *
 * Reference implementations of the ledger capabilities for tests,
 * development and embedding. Data is lost when the process exits.
 */

import { AssetId, Identity } from "../core/types.js";
import {
	AssetLedger,
	LedgerDirectory,
	LedgerError,
	Treasury,
} from "./types.js";

/**
 * @example
 * ```typescript
 * const dai = new MemoryAssetLedger("dai");
 * dai.mint("alice", 100n);
 * await dai.approve("alice", "escrow-1", 40n);
 * await dai.transferFrom("escrow-1", "alice", "bob", 40n);
 * await dai.balanceOf("bob"); // 40n
 * ```
 */
export class MemoryAssetLedger implements AssetLedger {
	private readonly balances = new Map<Identity, bigint>();
	private readonly allowances = new Map<string, bigint>();

	constructor(readonly asset: AssetId) {}

	/**
	 * Credit `holder` out of thin air.
	 */
	mint(holder: Identity, amount: bigint): void {
		assertAmount(amount);
		this.balances.set(holder, this.read(holder) + amount);
	}

	async balanceOf(holder: Identity): Promise<bigint> {
		return this.read(holder);
	}

	async allowance(owner: Identity, spender: Identity): Promise<bigint> {
		return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
	}

	async approve(
		owner: Identity,
		spender: Identity,
		amount: bigint,
	): Promise<void> {
		assertAmount(amount);
		this.allowances.set(allowanceKey(owner, spender), amount);
	}

	async transfer(from: Identity, to: Identity, amount: bigint): Promise<void> {
		assertAmount(amount);
		this.move(from, to, amount);
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
		this.move(from, to, amount);
		this.allowances.set(allowanceKey(from, spender), allowed - amount);
	}

	private move(from: Identity, to: Identity, amount: bigint): void {
		const available = this.read(from);
		if (available < amount) {
			throw new LedgerError(
				`${from} holds ${available} ${this.asset}, needs ${amount}`,
				"INSUFFICIENT_BALANCE",
				{ asset: this.asset, holder: from },
			);
		}
		this.balances.set(from, available - amount);
		this.balances.set(to, this.read(to) + amount);
	}

	private read(holder: Identity): bigint {
		return this.balances.get(holder) ?? 0n;
	}
}

export class MemoryLedgerDirectory implements LedgerDirectory {
	private readonly ledgers = new Map<AssetId, MemoryAssetLedger>();

	constructor(assets: AssetId[] = []) {
		for (const asset of assets) {
			this.ledgers.set(asset, new MemoryAssetLedger(asset));
		}
	}

	ledgerFor(asset: AssetId): MemoryAssetLedger {
		const ledger = this.ledgers.get(asset);
		if (!ledger) {
			throw new LedgerError(`Unknown asset ${asset}`, "UNKNOWN_ASSET", {
				asset,
			});
		}
		return ledger;
	}
}

/**
 * A treasury whose reserve is a plain ledger balance.
 *
 * Only requesters on the allowlist may withdraw.
 */
export class LedgerTreasury implements Treasury {
	private readonly approved: Set<Identity>;

	constructor(
		readonly identity: Identity,
		private readonly ledgers: LedgerDirectory,
		approved: Iterable<Identity> = [],
	) {
		this.approved = new Set(approved);
	}

	async withdraw(
		requester: Identity,
		recipient: Identity,
		asset: AssetId,
		amount: bigint,
	): Promise<void> {
		if (!this.approved.has(requester)) {
			throw new LedgerError(
				`${requester} may not withdraw from treasury ${this.identity}`,
				"UNAUTHORIZED",
				{ requester },
			);
		}
		await this.ledgers.ledgerFor(asset).transfer(this.identity, recipient, amount);
	}
}

function allowanceKey(owner: Identity, spender: Identity): string {
	return `${owner}\u0000${spender}`;
}

function assertAmount(amount: bigint): void {
	if (amount < 0n) {
		throw new LedgerError(`Invalid amount ${amount}`, "INVALID_AMOUNT");
	}
}
