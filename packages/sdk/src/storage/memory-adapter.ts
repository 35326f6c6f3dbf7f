/**
 * In-Memory Escrow Store
 *
 * For testing and development. Data is lost when the process exits.
 */

import { AssetId, EscrowId, Identity } from "../core/types.js";
import { EscrowSnapshot } from "../escrow/types.js";
import { EscrowStore, QueryOptions, QueryResult } from "./types.js";

/**
 * @example
 * ```typescript
 * const store = new MemoryEscrowStore();
 * await store.save(engine.snapshot());
 * const snapshot = await store.load(engine.id);
 * ```
 */
export class MemoryEscrowStore implements EscrowStore {
	private escrows: Map<EscrowId, EscrowSnapshot> = new Map();

	async save(snapshot: EscrowSnapshot): Promise<void> {
		// Deep clone to prevent external mutations
		this.escrows.set(snapshot.id, structuredClone(snapshot));
	}

	async load(id: EscrowId): Promise<EscrowSnapshot | null> {
		const snapshot = this.escrows.get(id);
		return snapshot ? structuredClone(snapshot) : null;
	}

	async exists(id: EscrowId): Promise<boolean> {
		return this.escrows.has(id);
	}

	async findFor(
		owner: Identity,
		collateralAsset: AssetId,
		debtAsset: AssetId,
	): Promise<EscrowSnapshot | null> {
		for (const snapshot of this.escrows.values()) {
			if (
				snapshot.owner === owner &&
				snapshot.collateralAsset === collateralAsset &&
				snapshot.debtAsset === debtAsset
			) {
				return structuredClone(snapshot);
			}
		}
		return null;
	}

	async query(
		options?: QueryOptions,
	): Promise<QueryResult<EscrowSnapshot>> {
		let escrows = Array.from(this.escrows.values());

		if (options?.owner !== undefined) {
			const owner = options.owner;
			escrows = escrows.filter((e) => e.owner === owner);
		}
		if (options?.collateralAsset !== undefined) {
			const asset = options.collateralAsset;
			escrows = escrows.filter((e) => e.collateralAsset === asset);
		}
		if (options?.debtAsset !== undefined) {
			const asset = options.debtAsset;
			escrows = escrows.filter((e) => e.debtAsset === asset);
		}

		// Get total before pagination
		const total = escrows.length;

		escrows.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

		const offset = options?.offset ?? 0;
		const limit = options?.limit ?? escrows.length;
		const items = escrows
			.slice(offset, offset + limit)
			.map((e) => structuredClone(e));

		return {
			items,
			total,
			hasMore: offset + items.length < total,
		};
	}

	/**
	 * Remove every escrow.
	 */
	clear(): void {
		this.escrows.clear();
	}

	size(): number {
		return this.escrows.size;
	}
}
