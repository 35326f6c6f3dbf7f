import { schnorr } from "@noble/secp256k1";
import { bytesToHex } from "@noble/hashes/utils";

export const OPERATOR_KEY = "11".repeat(32);
export const OVERSEER_KEY = "22".repeat(32);
export const ALICE_KEY = "33".repeat(32);
export const BOB_KEY = "44".repeat(32);
export const CAROL_KEY = "55".repeat(32);

export const publicKeyOf = (privateKeyHex: string) =>
	bytesToHex(schnorr.getPublicKey(privateKeyHex));
