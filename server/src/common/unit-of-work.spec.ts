import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import type { DataSource } from "typeorm";
import { createTestDataSource } from "../../test/data-source";
import type { EscrowEvent } from "./escrow.event";
import { UnitOfWork } from "./unit-of-work";

const SCALE = 10n ** 18n;

describe("UnitOfWork", () => {
	let dataSource: DataSource;
	let events: EventEmitter2;
	let unitOfWork: UnitOfWork;
	let received: EscrowEvent[];

	beforeEach(async () => {
		dataSource = await createTestDataSource();
		events = new EventEmitter2({ wildcard: true });
		received = [];
		events.on("escrow.*", (event: EscrowEvent) => received.push(event));
		unitOfWork = new UnitOfWork(
			dataSource,
			events,
			{ now: () => 1_700_000_000 },
			new ConfigService({ COLLATERAL_ASSET: "gohm", DEBT_ASSET: "dai" }),
		);
	});

	afterEach(async () => {
		await dataSource.destroy();
	});

	async function escrowWithCollateral(): Promise<string> {
		return unitOfWork.run(async ({ ledgers, registry }) => {
			const escrowId = await registry.generate("alice", "gohm", "dai");
			await ledgers.ledgerFor("gohm").mint("alice", SCALE);
			await ledgers.ledgerFor("gohm").approve("alice", escrowId, SCALE);
			return escrowId;
		});
	}

	const terms = {
		amount: 2500n * SCALE,
		interest: 2n * 10n ** 16n,
		loanToCollateral: 2500n * SCALE,
		duration: 31_536_000,
	};

	it("should commit and then emit escrow events", async () => {
		const escrowId = await escrowWithCollateral();
		const requestId = await unitOfWork.run(({ registry }) =>
			registry.withEscrow(escrowId, (escrow) => escrow.request("alice", terms)),
		);

		expect(requestId).toBe(0);
		expect(received).toHaveLength(1);
		expect(received[0]).toMatchObject({
			escrowId,
			kind: "requested",
			id: 0,
		});
		const balance = await unitOfWork.run(({ ledgers }) =>
			ledgers.ledgerFor("gohm").balanceOf(escrowId),
		);
		expect(balance).toBe(SCALE);
	});

	it("should roll back everything and emit nothing when the work fails", async () => {
		const escrowId = await escrowWithCollateral();

		await expect(
			unitOfWork.run(async ({ registry, ledgers }) => {
				await registry.withEscrow(escrowId, (escrow) =>
					escrow.request("alice", terms),
				);
				await ledgers.ledgerFor("dai").transfer("nobody", "alice", 1n);
			}),
		).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });

		expect(received).toEqual([]);
		const [balance, snapshot] = await unitOfWork.run(
			async ({ ledgers, registry }) => [
				await ledgers.ledgerFor("gohm").balanceOf("alice"),
				await registry.get(escrowId),
			] as const,
		);
		expect(balance).toBe(SCALE);
		expect(snapshot.requests).toEqual([]);
	});

	it("should run units one at a time", async () => {
		const order: string[] = [];
		const slow = unitOfWork.run(async () => {
			order.push("slow:start");
			await new Promise((resolve) => setTimeout(resolve, 10));
			order.push("slow:end");
		});
		const fast = unitOfWork.run(async () => {
			order.push("fast");
		});
		await Promise.all([slow, fast]);
		expect(order).toEqual(["slow:start", "slow:end", "fast"]);
	});
});
