import type { DataSource } from "typeorm";
import { createTestDataSource } from "../../test/data-source";
import { TypeOrmLedgerDirectory } from "./typeorm-asset-ledger";

describe("TypeOrmAssetLedger", () => {
	let dataSource: DataSource;
	let ledgers: TypeOrmLedgerDirectory;

	beforeEach(async () => {
		dataSource = await createTestDataSource();
		ledgers = new TypeOrmLedgerDirectory(dataSource.manager, ["gohm", "dai"]);
		await ledgers.ledgerFor("dai").mint("alice", 100n);
	});

	afterEach(async () => {
		await dataSource.destroy();
	});

	it("should keep balances per asset", async () => {
		expect(await ledgers.ledgerFor("dai").balanceOf("alice")).toBe(100n);
		expect(await ledgers.ledgerFor("gohm").balanceOf("alice")).toBe(0n);
	});

	it("should move funds between holders", async () => {
		const dai = ledgers.ledgerFor("dai");
		await dai.transfer("alice", "bob", 40n);
		expect(await dai.balanceOf("alice")).toBe(60n);
		expect(await dai.balanceOf("bob")).toBe(40n);
	});

	it("should store amounts beyond 64-bit integers", async () => {
		const huge = 2n ** 100n;
		await ledgers.ledgerFor("gohm").mint("whale", huge);
		const reread = new TypeOrmLedgerDirectory(dataSource.manager, ["gohm"]);
		expect(await reread.ledgerFor("gohm").balanceOf("whale")).toBe(huge);
	});

	it("should reject overdrafts", async () => {
		await expect(
			ledgers.ledgerFor("dai").transfer("alice", "bob", 101n),
		).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });
	});

	it("should spend and reduce allowances", async () => {
		const dai = ledgers.ledgerFor("dai");
		await dai.approve("alice", "escrow", 50n);
		await dai.transferFrom("escrow", "alice", "bob", 30n);

		expect(await dai.allowance("alice", "escrow")).toBe(20n);
		expect(await dai.balanceOf("bob")).toBe(30n);
		await expect(
			dai.transferFrom("escrow", "alice", "bob", 21n),
		).rejects.toMatchObject({ code: "INSUFFICIENT_ALLOWANCE" });
	});

	it("should replace rather than add to an allowance", async () => {
		const dai = ledgers.ledgerFor("dai");
		await dai.approve("alice", "escrow", 50n);
		await dai.approve("alice", "escrow", 5n);
		expect(await dai.allowance("alice", "escrow")).toBe(5n);
	});

	it("should reject negative amounts", async () => {
		await expect(
			ledgers.ledgerFor("dai").approve("alice", "escrow", -1n),
		).rejects.toMatchObject({ code: "INVALID_AMOUNT" });
	});

	it("should reject unknown assets", () => {
		expect(() => ledgers.ledgerFor("wbtc")).toThrow("Unknown asset wbtc");
	});
});
