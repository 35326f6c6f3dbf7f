/**
 * Utility functions for the SDK
 */

export { Mutex, KeyedMutex } from "./locks.js";
