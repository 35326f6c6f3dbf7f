import { Injectable, Logger } from "@nestjs/common";
import type { AssetId, Identity } from "@pairloan/sdk";
import { UnitOfWork } from "../common/unit-of-work";
import type { AllowanceOutDto, BalanceOutDto } from "./dto/ledger.dto";

@Injectable()
export class LedgerService {
	private readonly logger = new Logger(LedgerService.name);

	constructor(private readonly unitOfWork: UnitOfWork) {}

	async balanceOf(asset: AssetId, holder: Identity): Promise<BalanceOutDto> {
		const balance = await this.unitOfWork.run(({ ledgers }) =>
			ledgers.ledgerFor(asset).balanceOf(holder),
		);
		return { asset, holder, balance: balance.toString() };
	}

	async allowance(
		asset: AssetId,
		owner: Identity,
		spender: Identity,
	): Promise<AllowanceOutDto> {
		const allowance = await this.unitOfWork.run(({ ledgers }) =>
			ledgers.ledgerFor(asset).allowance(owner, spender),
		);
		return { asset, owner, spender, allowance: allowance.toString() };
	}

	async approve(
		caller: Identity,
		asset: AssetId,
		spender: Identity,
		amount: bigint,
	): Promise<AllowanceOutDto> {
		await this.unitOfWork.run(({ ledgers }) =>
			ledgers.ledgerFor(asset).approve(caller, spender, amount),
		);
		return { asset, owner: caller, spender, allowance: amount.toString() };
	}

	async mint(
		asset: AssetId,
		holder: Identity,
		amount: bigint,
	): Promise<BalanceOutDto> {
		const balance = await this.unitOfWork.run(async ({ ledgers }) => {
			const ledger = ledgers.ledgerFor(asset);
			await ledger.mint(holder, amount);
			return ledger.balanceOf(holder);
		});
		this.logger.log(`Minted ${amount} ${asset} to ${holder}`);
		return { asset, holder, balance: balance.toString() };
	}
}
