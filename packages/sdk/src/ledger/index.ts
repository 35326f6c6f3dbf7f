/**
 * Ledger module - asset ledger and treasury capabilities
 *
 * Hosting environments implement AssetLedger and LedgerDirectory over their
 * own balance store; the in-memory implementations serve tests and embedders.
 */

export type {
	AssetLedger,
	LedgerDirectory,
	Treasury,
	LedgerErrorCode,
} from "./types.js";

export { LedgerError, isLedgerError } from "./types.js";

export {
	MemoryAssetLedger,
	MemoryLedgerDirectory,
	LedgerTreasury,
} from "./memory-ledger.js";
