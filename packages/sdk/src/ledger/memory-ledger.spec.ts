import {
	LedgerTreasury,
	MemoryAssetLedger,
	MemoryLedgerDirectory,
} from "./memory-ledger";

describe("MemoryAssetLedger", () => {
	let dai: MemoryAssetLedger;

	beforeEach(() => {
		dai = new MemoryAssetLedger("dai");
		dai.mint("alice", 100n);
	});

	it("moves balances", async () => {
		await dai.transfer("alice", "bob", 40n);
		expect(await dai.balanceOf("alice")).toBe(60n);
		expect(await dai.balanceOf("bob")).toBe(40n);
	});

	it("rejects transfers above the balance", async () => {
		await expect(dai.transfer("alice", "bob", 101n)).rejects.toMatchObject({
			code: "INSUFFICIENT_BALANCE",
			details: { asset: "dai", holder: "alice" },
		});
		expect(await dai.balanceOf("alice")).toBe(100n);
	});

	it("rejects negative amounts", async () => {
		await expect(dai.transfer("alice", "bob", -1n)).rejects.toMatchObject({
			code: "INVALID_AMOUNT",
		});
	});

	it("spends allowances", async () => {
		await dai.approve("alice", "escrow", 50n);
		await dai.transferFrom("escrow", "alice", "bob", 30n);
		expect(await dai.balanceOf("bob")).toBe(30n);
		expect(await dai.allowance("alice", "escrow")).toBe(20n);
	});

	it("rejects spending above the allowance", async () => {
		await dai.approve("alice", "escrow", 10n);
		await expect(
			dai.transferFrom("escrow", "alice", "bob", 11n),
		).rejects.toMatchObject({ code: "INSUFFICIENT_ALLOWANCE" });
		expect(await dai.allowance("alice", "escrow")).toBe(10n);
	});

	it("keeps the allowance when the balance is short", async () => {
		await dai.approve("alice", "escrow", 500n);
		await expect(
			dai.transferFrom("escrow", "alice", "bob", 200n),
		).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });
		expect(await dai.allowance("alice", "escrow")).toBe(500n);
	});

	it("replaces allowances on approve", async () => {
		await dai.approve("alice", "escrow", 50n);
		await dai.approve("alice", "escrow", 5n);
		expect(await dai.allowance("alice", "escrow")).toBe(5n);
	});
});

describe("MemoryLedgerDirectory", () => {
	it("returns the same ledger for an asset", () => {
		const ledgers = new MemoryLedgerDirectory(["gohm", "dai"]);
		expect(ledgers.ledgerFor("dai")).toBe(ledgers.ledgerFor("dai"));
		expect(ledgers.ledgerFor("gohm").asset).toBe("gohm");
	});

	it("rejects unknown assets", () => {
		const ledgers = new MemoryLedgerDirectory(["dai"]);
		expect(() => ledgers.ledgerFor("usdc")).toThrow(
			expect.objectContaining({ code: "UNKNOWN_ASSET" }),
		);
	});
});

describe("LedgerTreasury", () => {
	const ledgers = new MemoryLedgerDirectory(["dai"]);
	const treasury = new LedgerTreasury("treasury", ledgers, ["gateway"]);
	ledgers.ledgerFor("dai").mint("treasury", 1000n);

	it("pays approved requesters", async () => {
		await treasury.withdraw("gateway", "gateway", "dai", 300n);
		expect(await ledgers.ledgerFor("dai").balanceOf("gateway")).toBe(300n);
		expect(await ledgers.ledgerFor("dai").balanceOf("treasury")).toBe(700n);
	});

	it("refuses everyone else", async () => {
		await expect(
			treasury.withdraw("mallory", "mallory", "dai", 1n),
		).rejects.toMatchObject({ code: "UNAUTHORIZED" });
	});
});
