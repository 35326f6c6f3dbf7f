import type { Timestamp } from "@pairloan/sdk";

export const CLOCK = Symbol("CLOCK");

/**
 * Source of the current time in whole seconds.
 */
export interface Clock {
	now(): Timestamp;
}

export const systemClock: Clock = {
	now: () => Math.floor(Date.now() / 1000),
};
