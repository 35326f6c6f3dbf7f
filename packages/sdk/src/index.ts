/**
 * Pairloan SDK
 *
 * Peer-to-peer, fixed-duration, collateralized lending between two assets.
 *
 * @example
 * ```typescript
 * import {
 *   EscrowRegistry,
 *   MemoryEscrowStore,
 *   MemoryLedgerDirectory,
 *   RiskGateway,
 *   SCALE,
 * } from "@pairloan/sdk";
 *
 * const ledgers = new MemoryLedgerDirectory(["gohm", "dai"]);
 * const registry = new EscrowRegistry({ store: new MemoryEscrowStore(), ledgers });
 *
 * const escrowId = await registry.generate("alice", "gohm", "dai");
 * await ledgers.ledgerFor("gohm").approve("alice", escrowId, SCALE);
 * const requestId = await registry.withEscrow(escrowId, (escrow) =>
 *   escrow.request("alice", {
 *     amount: 2500n * SCALE,
 *     interest: 2n * 10n ** 16n,
 *     loanToCollateral: 2500n * SCALE,
 *     duration: 365 * 24 * 60 * 60,
 *   }),
 * );
 * ```
 */

// Core - types, errors and fixed-point math
export {
	// Types
	type Identity,
	type AssetId,
	type EscrowId,
	type Timestamp,
	type Seconds,
	type LoanTerms,
	type EscrowErrorCode,
	type PolicyViolationReason,
	// Errors
	EscrowError,
	unauthorized,
	invalidState,
	policyViolation,
	isEscrowError,
	// Math
	SCALE,
	SECONDS_PER_YEAR,
	collateralFor,
	interestFor,
	collateralReleased,
} from "./core/index.js";

// Contracts - lifecycle state machines
export {
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	LifecycleMachine,
	createState,
	createTransition,
} from "./contracts/index.js";

// Ledger - asset movement capabilities
export {
	type AssetLedger,
	type LedgerDirectory,
	type Treasury,
	type LedgerErrorCode,
	LedgerError,
	isLedgerError,
	MemoryAssetLedger,
	MemoryLedgerDirectory,
	LedgerTreasury,
} from "./ledger/index.js";

// Escrow - per-borrower loan book
export {
	type RequestState,
	type RequestAction,
	type LoanState,
	type LoanAction,
	type LoanRequest,
	type Loan,
	type LoanSlot,
	type EscrowSnapshot,
	type EscrowEventKind,
	type EscrowNotification,
	type NotificationSink,
	type EscrowEngineOptions,
	type EscrowDirectory,
	type EscrowRegistryOptions,
	REQUEST_LIFECYCLE,
	LOAN_LIFECYCLE,
	EscrowEngine,
	EscrowRegistry,
} from "./escrow/index.js";

// Gateway - policy-checked activation
export {
	type GatewayBounds,
	type GatewayRoles,
	type RiskGatewayConfig,
	RiskGateway,
	DEFAULT_BOUNDS,
} from "./gateway/index.js";

// Storage - escrow persistence
export {
	type QueryOptions,
	type QueryResult,
	type EscrowStore,
	StorageError,
	isStorageError,
	MemoryEscrowStore,
} from "./storage/index.js";

// Utils
export { Mutex, KeyedMutex } from "./utils/index.js";
