import type { INestApplication } from "@nestjs/common";
import request from "supertest";
import {
	ALICE_KEY,
	BOB_KEY,
	CAROL_KEY,
	OPERATOR_KEY,
	OVERSEER_KEY,
} from "./keys";
import {
	approve,
	balanceOf,
	createTestApp,
	FixedClock,
	mint,
	signupAndGetJwt,
	type TestUser,
} from "./utils";

const SCALE = 10n ** 18n;
const YEAR = 31_536_000;
const T0 = 1_700_000_000;

const TERMS = {
	amount: (2500n * SCALE).toString(),
	interest: (2n * 10n ** 16n).toString(),
	loanToCollateral: (2500n * SCALE).toString(),
	duration: YEAR,
};

describe("Escrow journeys E2E", () => {
	let app: INestApplication;
	let clock: FixedClock;
	let alice: TestUser;
	let bob: TestUser;
	let carol: TestUser;
	let operator: TestUser;
	let overseer: TestUser;
	let escrowId: string;

	const bearer = (user: TestUser) => `Bearer ${user.accessToken}`;

	async function requestLoan(terms = TERMS): Promise<number> {
		const res = await request(app.getHttpServer())
			.post(`/api/v1/escrows/${escrowId}/requests`)
			.set("Authorization", bearer(alice))
			.send(terms)
			.expect(201);
		return res.body.data.id;
	}

	async function getEscrow() {
		const res = await request(app.getHttpServer())
			.get(`/api/v1/escrows/${escrowId}`)
			.expect(200);
		return res.body.data;
	}

	beforeAll(async () => {
		clock = new FixedClock(T0);
		app = await createTestApp(clock);

		alice = await signupAndGetJwt(app, ALICE_KEY);
		bob = await signupAndGetJwt(app, BOB_KEY);
		carol = await signupAndGetJwt(app, CAROL_KEY);
		operator = await signupAndGetJwt(app, OPERATOR_KEY);
		overseer = await signupAndGetJwt(app, OVERSEER_KEY);

		await mint(app, "gohm", alice.publicKey, 10n * SCALE);
		await mint(app, "dai", "treasury", 10_000n * SCALE);

		const res = await request(app.getHttpServer())
			.post("/api/v1/escrows")
			.set("Authorization", bearer(alice))
			.send({})
			.expect(201);
		escrowId = res.body.data.escrowId;
	});

	afterAll(async () => {
		await app.close();
	});

	describe("escrow generation", () => {
		it("should return the same escrow for the same owner and pair", async () => {
			const res = await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.set("Authorization", bearer(alice))
				.send({ collateralAsset: "gohm", debtAsset: "dai" })
				.expect(201);
			expect(res.body.data.escrowId).toBe(escrowId);
		});

		it("should reject an unknown asset", async () => {
			const res = await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.set("Authorization", bearer(alice))
				.send({ collateralAsset: "wbtc" })
				.expect(422);
			expect(res.body.error).toBe("UNKNOWN_ASSET");
		});

		it("should list the caller's escrows", async () => {
			const res = await request(app.getHttpServer())
				.get("/api/v1/escrows/mine")
				.set("Authorization", bearer(alice))
				.expect(200);
			expect(res.body.meta).toEqual({ total: 1 });
			expect(res.body.data).toHaveLength(1);
			expect(res.body.data[0]).toMatchObject({
				id: escrowId,
				owner: alice.publicKey,
				collateralAsset: "gohm",
				debtAsset: "dai",
			});
		});

		it("should return 404 for an unknown escrow", async () => {
			await request(app.getHttpServer())
				.get("/api/v1/escrows/does-not-exist")
				.expect(404);
		});
	});

	describe("requests", () => {
		it("should fail without a collateral allowance", async () => {
			const res = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/requests`)
				.set("Authorization", bearer(alice))
				.send(TERMS)
				.expect(422);
			expect(res.body.error).toBe("INSUFFICIENT_ALLOWANCE");
			expect((await getEscrow()).requests).toEqual([]);
		});

		it("should reject amounts that are not base-unit strings", async () => {
			const res = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/requests`)
				.set("Authorization", bearer(alice))
				.send({ ...TERMS, amount: "1.5" })
				.expect(400);
			expect(res.body.message).toEqual([
				"amount must be a decimal string of base units",
			]);
		});

		it("should lock collateral, then refund it on rescind", async () => {
			await approve(app, alice, "gohm", escrowId, SCALE);
			const requestId = await requestLoan();
			expect(requestId).toBe(0);
			expect(await balanceOf(app, "gohm", alice.publicKey)).toBe(9n * SCALE);
			expect(await balanceOf(app, "gohm", escrowId)).toBe(SCALE);

			await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/requests/0/rescind`)
				.set("Authorization", bearer(bob))
				.expect(403);

			await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/requests/0/rescind`)
				.set("Authorization", bearer(alice))
				.expect(200);
			expect(await balanceOf(app, "gohm", alice.publicKey)).toBe(10n * SCALE);
			expect(await balanceOf(app, "gohm", escrowId)).toBe(0n);

			const res = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/requests/0/rescind`)
				.set("Authorization", bearer(alice))
				.expect(409);
			expect(res.body.error).toBe("INVALID_STATE");
			expect((await getEscrow()).requests[0].status).toBe("rescinded");
		});
	});

	describe("gateway lending", () => {
		it("should fund the gateway from the treasury", async () => {
			await request(app.getHttpServer())
				.post("/api/v1/gateway/fund")
				.set("Authorization", bearer(operator))
				.send({ amount: (5000n * SCALE).toString() })
				.expect(403);

			const res = await request(app.getHttpServer())
				.post("/api/v1/gateway/fund")
				.set("Authorization", bearer(overseer))
				.send({ amount: (5000n * SCALE).toString() })
				.expect(200);
			expect(res.body.data.available).toBe((5000n * SCALE).toString());
			expect(await balanceOf(app, "dai", "treasury")).toBe(5000n * SCALE);
		});

		it("should reject terms outside gateway bounds", async () => {
			await approve(app, alice, "gohm", escrowId, SCALE);
			const requestId = await requestLoan({
				...TERMS,
				interest: (10n ** 16n).toString(),
			});
			expect(requestId).toBe(1);

			const res = await request(app.getHttpServer())
				.post(`/api/v1/gateway/escrows/${escrowId}/requests/1/clear`)
				.set("Authorization", bearer(operator))
				.expect(400);
			expect(res.body).toEqual({
				statusCode: 400,
				error: "POLICY_VIOLATION",
				reason: "INTEREST_BELOW_MINIMUM",
				message: `Interest 10000000000000000 is below 20000000000000000`,
			});

			await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/requests/1/rescind`)
				.set("Authorization", bearer(alice))
				.expect(200);
		});

		it("should only let the operator clear", async () => {
			await approve(app, alice, "gohm", escrowId, SCALE);
			expect(await requestLoan()).toBe(2);

			const res = await request(app.getHttpServer())
				.post(`/api/v1/gateway/escrows/${escrowId}/requests/2/clear`)
				.set("Authorization", bearer(bob))
				.expect(403);
			expect(res.body.error).toBe("UNAUTHORIZED");
		});

		it("should clear an in-bounds request from gateway funds", async () => {
			const res = await request(app.getHttpServer())
				.post(`/api/v1/gateway/escrows/${escrowId}/requests/2/clear`)
				.set("Authorization", bearer(operator))
				.expect(201);
			expect(res.body.data).toEqual({ id: 0 });

			expect(await balanceOf(app, "dai", alice.publicKey)).toBe(2500n * SCALE);
			expect(await balanceOf(app, "dai", "gateway")).toBe(2500n * SCALE);

			const escrow = await getEscrow();
			expect(escrow.requests[2].status).toBe("cleared");
			expect(escrow.loans[0]).toEqual({
				id: 0,
				status: "open",
				amount: "2550000000000000000000",
				collateral: "1000000000000000000",
				expiry: T0 + YEAR,
				rollable: true,
				lender: "gateway",
				interest: "20000000000000000",
				loanToCollateral: "2500000000000000000000",
				duration: YEAR,
			});
		});

		it("should roll the loan, topping up collateral", async () => {
			await approve(app, alice, "gohm", escrowId, 2n * 10n ** 16n);

			const res = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/loans/0/roll`)
				.set("Authorization", bearer(alice))
				.expect(200);
			expect(res.body.data).toMatchObject({
				amount: "2601000000000000000000",
				collateral: "1020000000000000000",
				expiry: T0 + 2 * YEAR,
			});
			expect(await balanceOf(app, "gohm", alice.publicKey)).toBe(
				8n * SCALE - 2n * 10n ** 16n,
			);
		});

		it("should refuse to roll once the operator disables it", async () => {
			const toggled = await request(app.getHttpServer())
				.post(`/api/v1/gateway/escrows/${escrowId}/loans/0/toggle-roll`)
				.set("Authorization", bearer(operator))
				.expect(200);
			expect(toggled.body.data).toEqual({ rollable: false });

			const res = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/loans/0/roll`)
				.set("Authorization", bearer(alice))
				.expect(422);
			expect(res.body.error).toBe("NOT_ROLLABLE");
		});

		it("should release collateral in proportion to repayment", async () => {
			await mint(app, "dai", alice.publicKey, 101n * SCALE);
			await approve(app, alice, "dai", escrowId, 2601n * SCALE);

			const half = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/loans/0/repay`)
				.set("Authorization", bearer(alice))
				.send({ amount: (1300n * SCALE).toString() })
				.expect(200);
			// 1.02e18 * 1300 / 2601, truncated
			expect(half.body.data).toEqual({ released: "509803921568627450" });

			const rest = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/loans/0/repay`)
				.set("Authorization", bearer(alice))
				.send({ amount: (1301n * SCALE).toString() })
				.expect(200);
			expect(rest.body.data).toEqual({ released: "510196078431372550" });

			const escrow = await getEscrow();
			expect(escrow.loans[0]).toEqual({ id: 0, status: "repaid" });
			expect(await balanceOf(app, "gohm", alice.publicKey)).toBe(9n * SCALE);
			expect(await balanceOf(app, "dai", "gateway")).toBe(5101n * SCALE);
		});

		it("should return gateway funds to the treasury", async () => {
			const res = await request(app.getHttpServer())
				.post("/api/v1/gateway/defund")
				.set("Authorization", bearer(operator))
				.send({ asset: "dai", amount: (101n * SCALE).toString() })
				.expect(200);
			expect(res.body.data.available).toBe((5000n * SCALE).toString());
			expect(await balanceOf(app, "dai", "treasury")).toBe(5101n * SCALE);
		});
	});

	describe("direct lending and default", () => {
		let requestId: number;

		beforeAll(async () => {
			await mint(app, "dai", bob.publicKey, 2500n * SCALE);
			await approve(app, alice, "gohm", escrowId, SCALE);
			requestId = await requestLoan();
		});

		it("should let any lender clear from their own balance", async () => {
			await approve(app, bob, "dai", escrowId, 2500n * SCALE);
			const res = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/requests/${requestId}/clear`)
				.set("Authorization", bearer(bob))
				.expect(201);
			expect(res.body.data).toEqual({ id: 1 });
			expect(await balanceOf(app, "dai", bob.publicKey)).toBe(0n);
		});

		it("should hand the loan to an approved new lender", async () => {
			await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/loans/1/transfer`)
				.set("Authorization", bearer(carol))
				.expect(403);

			const approved = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/loans/1/approve-transfer`)
				.set("Authorization", bearer(bob))
				.send({ to: carol.publicKey })
				.expect(200);
			expect(approved.body.data.pendingLender).toBe(carol.publicKey);

			const res = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/loans/1/transfer`)
				.set("Authorization", bearer(carol))
				.expect(200);
			expect(res.body.data.lender).toBe(carol.publicKey);
			expect(res.body.data.pendingLender).toBeUndefined();
		});

		it("should not seize collateral before expiry", async () => {
			clock.current = T0 + YEAR;
			const res = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/loans/1/default`)
				.expect(422);
			expect(res.body.error).toBe("NO_DEFAULT");
		});

		it("should refuse repayment after expiry", async () => {
			clock.current = T0 + YEAR + 1;
			const res = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/loans/1/repay`)
				.set("Authorization", bearer(alice))
				.send({ amount: "1" })
				.expect(422);
			expect(res.body.error).toBe("DEFAULT");
		});

		it("should send the collateral to the lender on default", async () => {
			const res = await request(app.getHttpServer())
				.post(`/api/v1/escrows/${escrowId}/loans/1/default`)
				.expect(200);
			expect(res.body.data).toEqual({ seized: SCALE.toString() });
			expect(await balanceOf(app, "gohm", carol.publicKey)).toBe(SCALE);
			expect(await balanceOf(app, "gohm", escrowId)).toBe(0n);

			const loan = await request(app.getHttpServer())
				.get(`/api/v1/escrows/${escrowId}/loans/1`)
				.expect(200);
			expect(loan.body.data).toEqual({ id: 1, status: "defaulted" });
		});
	});

	describe("gateway roles", () => {
		it("should hand the operator role over in two steps", async () => {
			await request(app.getHttpServer())
				.post("/api/v1/gateway/operator/accept")
				.set("Authorization", bearer(carol))
				.expect(403);

			await request(app.getHttpServer())
				.post("/api/v1/gateway/operator/propose")
				.set("Authorization", bearer(operator))
				.send({ next: carol.publicKey })
				.expect(200);

			const res = await request(app.getHttpServer())
				.post("/api/v1/gateway/operator/accept")
				.set("Authorization", bearer(carol))
				.expect(200);
			expect(res.body.data.operator).toBe(carol.publicKey);
			expect(res.body.data.pendingOperator).toBeUndefined();
			expect(res.body.data.overseer).toBe(overseer.publicKey);
		});
	});

	describe("admin", () => {
		it("should require basic auth to mint", async () => {
			await request(app.getHttpServer())
				.post("/api/v1/admin/ledger/dai/mint")
				.send({ holder: bob.publicKey, amount: "1" })
				.expect(401);
		});
	});
});
