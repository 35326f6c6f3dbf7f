import type { INestApplication } from "@nestjs/common";
import { schnorr } from "@noble/secp256k1";
import { bytesToHex } from "@noble/hashes/utils";
import request from "supertest";
import { ALICE_KEY, publicKeyOf } from "./keys";
import { createTestApp, FixedClock } from "./utils";

/**
 * signupAndGetJwt covers the happy path for the other suites; this one
 * asserts on the auth API itself.
 */
describe("Auth E2E (signup)", () => {
	let app: INestApplication;
	const publicKey = publicKeyOf(ALICE_KEY);

	beforeAll(async () => {
		app = await createTestApp(new FixedClock(1_700_000_000));
	});

	afterAll(async () => {
		await app.close();
	});

	async function requestChallenge(origin: string) {
		const res = await request(app.getHttpServer())
			.post("/api/v1/auth/signup/challenge")
			.set("Origin", origin)
			.send({ publicKey })
			.expect(201);
		return res.body;
	}

	it("should create challenge and verify signature to return a JWT", async () => {
		const challenge = await requestChallenge("http://localhost:test");
		expect(challenge.challenge.origin).toBe("http://localhost:test");
		expect(challenge.challenge.scope).toBe("signup");
		expect(challenge.hashToSignHex).toHaveLength(64);

		const signature = await schnorr.sign(challenge.hashToSignHex, ALICE_KEY);
		const verify = await request(app.getHttpServer())
			.post("/api/v1/auth/signup/verify")
			.set("Origin", "http://localhost:test")
			.send({
				publicKey,
				signature: bytesToHex(signature),
				challengeId: challenge.challengeId,
			})
			.expect(201);
		expect(verify.body.publicKey).toBe(publicKey);

		const me = await request(app.getHttpServer())
			.get("/api/v1/users/me")
			.set("Authorization", `Bearer ${verify.body.accessToken}`)
			.expect(200);
		expect(me.body.data).toEqual({
			userId: verify.body.userId,
			publicKey,
		});
	});

	it("should reject a signature presented from another origin", async () => {
		const challenge = await requestChallenge("http://localhost:test");
		const signature = await schnorr.sign(challenge.hashToSignHex, ALICE_KEY);

		const res = await request(app.getHttpServer())
			.post("/api/v1/auth/signup/verify")
			.set("Origin", "http://elsewhere:test")
			.send({
				publicKey,
				signature: bytesToHex(signature),
				challengeId: challenge.challengeId,
			})
			.expect(401);
		expect(res.body.message).toBe("Invalid challenge scope or origin");
	});

	it("should reject a signature by another key", async () => {
		const challenge = await requestChallenge("http://localhost:test");
		const signature = await schnorr.sign(
			challenge.hashToSignHex,
			"66".repeat(32),
		);

		const res = await request(app.getHttpServer())
			.post("/api/v1/auth/signup/verify")
			.set("Origin", "http://localhost:test")
			.send({
				publicKey,
				signature: bytesToHex(signature),
				challengeId: challenge.challengeId,
			})
			.expect(401);
		expect(res.body.message).toBe("Invalid signature");
	});

	it("should reject a malformed public key", async () => {
		await request(app.getHttpServer())
			.post("/api/v1/auth/signup/challenge")
			.send({ publicKey: "not-hex" })
			.expect(400);
	});

	it("should reject requests without a bearer token", async () => {
		const res = await request(app.getHttpServer())
			.get("/api/v1/users/me")
			.expect(401);
		expect(res.body).toEqual({
			statusCode: 401,
			error: "UnauthorizedException",
			message: "Missing bearer token",
		});
	});
});
