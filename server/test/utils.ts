import type { INestApplication } from "@nestjs/common";
import { ValidationPipe } from "@nestjs/common";
import { Test } from "@nestjs/testing";
import { schnorr } from "@noble/secp256k1";
import { bytesToHex } from "@noble/hashes/utils";
import request from "supertest";
import { AppModule } from "../src/app.module";
import { CLOCK, type Clock } from "../src/common/clock";
import { HttpExceptionFilter } from "../src/common/filters/http-exception.filter";
import { publicKeyOf } from "./keys";

export const ADMIN_AUTH = `Basic ${Buffer.from("admin:test-password").toString("base64")}`;

/**
 * A clock tests move by hand.
 */
export class FixedClock implements Clock {
	constructor(public current: number) {}

	now(): number {
		return this.current;
	}

	advance(seconds: number): void {
		this.current += seconds;
	}
}

/**
 * Boot the whole app on an in-memory database, as main.ts configures it.
 */
export async function createTestApp(clock: Clock): Promise<INestApplication> {
	const moduleRef = await Test.createTestingModule({
		imports: [AppModule],
	})
		.overrideProvider(CLOCK)
		.useValue(clock)
		.compile();

	const app = moduleRef.createNestApplication();
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new HttpExceptionFilter());
	await app.init();
	return app;
}

export type TestUser = {
	publicKey: string;
	accessToken: string;
};

/**
 * Sign up with a private key and return a bearer token for it.
 */
export async function signupAndGetJwt(
	app: INestApplication,
	privateKeyHex: string,
): Promise<TestUser> {
	const publicKey = publicKeyOf(privateKeyHex);
	const challenge = await request(app.getHttpServer())
		.post("/api/v1/auth/signup/challenge")
		.send({ publicKey })
		.expect(201);

	const signature = await schnorr.sign(
		challenge.body.hashToSignHex,
		privateKeyHex,
	);
	const verify = await request(app.getHttpServer())
		.post("/api/v1/auth/signup/verify")
		.send({
			publicKey,
			signature: bytesToHex(signature),
			challengeId: challenge.body.challengeId,
		})
		.expect(201);

	return { publicKey, accessToken: verify.body.accessToken };
}

export async function mint(
	app: INestApplication,
	asset: string,
	holder: string,
	amount: bigint,
): Promise<void> {
	await request(app.getHttpServer())
		.post(`/api/v1/admin/ledger/${asset}/mint`)
		.set("Authorization", ADMIN_AUTH)
		.send({ holder, amount: amount.toString() })
		.expect(200);
}

export async function approve(
	app: INestApplication,
	user: TestUser,
	asset: string,
	spender: string,
	amount: bigint,
): Promise<void> {
	await request(app.getHttpServer())
		.post(`/api/v1/ledger/${asset}/approve`)
		.set("Authorization", `Bearer ${user.accessToken}`)
		.send({ spender, amount: amount.toString() })
		.expect(200);
}

export async function balanceOf(
	app: INestApplication,
	asset: string,
	holder: string,
): Promise<bigint> {
	const res = await request(app.getHttpServer())
		.get(`/api/v1/ledger/${asset}/balances/${holder}`)
		.expect(200);
	return BigInt(res.body.data.balance);
}
