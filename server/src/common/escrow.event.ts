import type { EscrowEventKind } from "@pairloan/sdk";

export const ESCROW_EVENT_PREFIX = "escrow";
export const ESCROW_EVENT_WILDCARD = `${ESCROW_EVENT_PREFIX}.*`;

export const escrowEventId = (kind: EscrowEventKind) =>
	`${ESCROW_EVENT_PREFIX}.${kind}`;

export type EscrowEvent = {
	eventId: string;
	escrowId: string;
	kind: EscrowEventKind;
	// request id for request events, loan id for loan events
	id: number;
	emittedAt: string; // ISO timestamp
};
