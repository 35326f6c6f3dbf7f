/**
 * Escrow Store Types
 *
 * Persistence for escrow snapshots. Hosts bring their own backend
 * (SQLite, Postgres, in-memory, etc.) by implementing EscrowStore.
 */

import { AssetId, EscrowId, Identity } from "../core/types.js";
import { EscrowSnapshot } from "../escrow/types.js";

/**
 * Query options for listing escrows.
 */
export interface QueryOptions {
	/** Filter by borrower */
	owner?: Identity;
	/** Filter by collateral asset */
	collateralAsset?: AssetId;
	/** Filter by debt asset */
	debtAsset?: AssetId;
	/** Maximum number of results */
	limit?: number;
	/** Number of results to skip */
	offset?: number;
}

/**
 * Query result with pagination info.
 */
export interface QueryResult<T> {
	/** The items matching the query */
	items: T[];
	/** Total count of matching items (before pagination) */
	total: number;
	/** Whether there are more items */
	hasMore: boolean;
}

/**
 * @example
 * ```typescript
 * class PostgresEscrowStore implements EscrowStore {
 *   constructor(private pool: Pool) {}
 *
 *   async save(snapshot: EscrowSnapshot): Promise<void> {
 *     await this.pool.query(
 *       'INSERT INTO escrows (id, data) VALUES ($1, $2) ON CONFLICT (id) DO UPDATE SET data = $2',
 *       [snapshot.id, encode(snapshot)]
 *     );
 *   }
 *
 *   // ... other methods
 * }
 * ```
 */
export interface EscrowStore {
	/**
	 * Create or replace an escrow.
	 */
	save(snapshot: EscrowSnapshot): Promise<void>;

	/**
	 * @returns The escrow if found, null otherwise
	 */
	load(id: EscrowId): Promise<EscrowSnapshot | null>;

	exists(id: EscrowId): Promise<boolean>;

	/**
	 * The escrow of `owner` for one asset pair, if one was generated.
	 */
	findFor(
		owner: Identity,
		collateralAsset: AssetId,
		debtAsset: AssetId,
	): Promise<EscrowSnapshot | null>;

	/**
	 * List escrows with pagination info, ordered by id.
	 */
	query(options?: QueryOptions): Promise<QueryResult<EscrowSnapshot>>;
}

/**
 * Error thrown by storage operations.
 */
export class StorageError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StorageError";
	}
}

export function isStorageError(err: unknown): err is StorageError {
	return err instanceof StorageError;
}
