/**
 * Escrow Registry
 *
 * Creates one escrow per (owner, collateral asset, debt asset) triple and
 * certifies which escrow ids it created.
 */

import { nanoid } from "nanoid";

import { invalidState } from "../core/errors.js";
import { AssetId, EscrowId, Identity } from "../core/types.js";
import { LedgerDirectory } from "../ledger/types.js";
import { EscrowStore } from "../storage/types.js";
import { KeyedMutex } from "../utils/locks.js";
import { EscrowEngine } from "./escrow-engine.js";
import { EscrowSnapshot, NotificationSink } from "./types.js";

/**
 * What the Risk Gateway needs from a registry.
 */
export interface EscrowDirectory {
	/** Whether `id` names an escrow this registry created */
	isGenuine(id: EscrowId): Promise<boolean>;

	/**
	 * Run `fn` against the escrow `id`, persisting its state if `fn` succeeds.
	 *
	 * @throws EscrowError INVALID_STATE if the escrow does not exist
	 */
	withEscrow<T>(id: EscrowId, fn: (escrow: EscrowEngine) => Promise<T>): Promise<T>;
}

export interface EscrowRegistryOptions {
	store: EscrowStore;
	ledgers: LedgerDirectory;
	notifications?: NotificationSink;
	/** Id factory for new escrows */
	generateId?: () => EscrowId;
}

/**
 * @example
 * ```typescript
 * const registry = new EscrowRegistry({ store, ledgers });
 * const id = await registry.generate("alice", "gohm", "dai");
 * const requestId = await registry.withEscrow(id, (escrow) =>
 *   escrow.request("alice", terms),
 * );
 * ```
 */
export class EscrowRegistry implements EscrowDirectory {
	private readonly locks = new KeyedMutex();
	private readonly generateId: () => EscrowId;

	constructor(private readonly options: EscrowRegistryOptions) {
		this.generateId = options.generateId ?? (() => nanoid(16));
	}

	/**
	 * The escrow of `caller` for the asset pair, created on first call.
	 */
	async generate(
		caller: Identity,
		collateralAsset: AssetId,
		debtAsset: AssetId,
	): Promise<EscrowId> {
		const triple = JSON.stringify([caller, collateralAsset, debtAsset]);
		return this.locks.runExclusive(`generate:${triple}`, async () => {
			const existing = await this.options.store.findFor(
				caller,
				collateralAsset,
				debtAsset,
			);
			if (existing) {
				return existing.id;
			}
			// fail on unknown assets before anything is stored
			this.options.ledgers.ledgerFor(collateralAsset);
			this.options.ledgers.ledgerFor(debtAsset);

			const snapshot: EscrowSnapshot = {
				id: this.generateId(),
				owner: caller,
				collateralAsset,
				debtAsset,
				requests: [],
				loans: [],
			};
			await this.options.store.save(snapshot);
			return snapshot.id;
		});
	}

	async isGenuine(id: EscrowId): Promise<boolean> {
		return this.options.store.exists(id);
	}

	/**
	 * @throws EscrowError INVALID_STATE if the escrow does not exist
	 */
	async get(id: EscrowId): Promise<EscrowSnapshot> {
		const snapshot = await this.options.store.load(id);
		if (!snapshot) {
			throw invalidState(`Escrow ${id} does not exist`);
		}
		return snapshot;
	}

	async withEscrow<T>(
		id: EscrowId,
		fn: (escrow: EscrowEngine) => Promise<T>,
	): Promise<T> {
		return this.locks.runExclusive(`escrow:${id}`, async () => {
			const engine = new EscrowEngine(await this.get(id), {
				ledgers: this.options.ledgers,
				notifications: this.options.notifications,
			});
			const result = await fn(engine);
			await this.options.store.save(engine.snapshot());
			return result;
		});
	}
}
