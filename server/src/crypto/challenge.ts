import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, randomBytes, utf8ToBytes } from "@noble/hashes/utils";
import { nanoid } from "nanoid";

export type ChallengePayload = {
	id: string;
	scope: "signup";
	origin: string;
	nonce: string;
	issuedAt: string; // ISO timestamp
};

/**
 * Hash a challenge the way clients sign it: sha256 over its JSON with keys
 * in a fixed order.
 */
export function hashSignupPayload(payload: ChallengePayload): string {
	const canonical = JSON.stringify([
		payload.id,
		payload.scope,
		payload.origin,
		payload.nonce,
		payload.issuedAt,
	]);
	return bytesToHex(sha256(utf8ToBytes(canonical)));
}

export function createSignupChallenge(origin: string, now = new Date()) {
	const payload: ChallengePayload = {
		id: nanoid(16),
		scope: "signup",
		origin,
		nonce: bytesToHex(randomBytes(16)),
		issuedAt: now.toISOString(),
	};
	return { id: payload.id, payload, hashHex: hashSignupPayload(payload) };
}

export function isChallengePayload(value: unknown): value is ChallengePayload {
	if (typeof value !== "object" || value === null) return false;
	const fields: Array<keyof ChallengePayload> = [
		"id",
		"scope",
		"origin",
		"nonce",
		"issuedAt",
	];
	return fields.every(
		(field) => field in value && typeof Reflect.get(value, field) === "string",
	);
}
