/**
 * Storage module - Pluggable escrow persistence
 *
 * Hosts bring their own persistence layer by implementing EscrowStore.
 */

// Types
export type { QueryOptions, QueryResult, EscrowStore } from "./types.js";

export { StorageError, isStorageError } from "./types.js";

// Reference implementations
export { MemoryEscrowStore } from "./memory-adapter.js";
