import { Injectable, Logger, NotFoundException } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { EscrowId, Identity, LoanTerms } from "@pairloan/sdk";
import { UnitOfWork } from "../common/unit-of-work";
import {
	type EscrowDto,
	type LoanDto,
	toEscrowDto,
	toLoanDto,
} from "./dto/escrow.dto";

export type EscrowPage = {
	items: EscrowDto[];
	total: number;
	nextOffset?: number;
};

/**
 * Borrower- and lender-facing escrow operations. Each call is one unit
 * of work: the escrow and the ledgers it touches commit together or not
 * at all.
 */
@Injectable()
export class EscrowsService {
	private readonly logger = new Logger(EscrowsService.name);
	private readonly collateralAsset: string;
	private readonly debtAsset: string;

	constructor(
		private readonly unitOfWork: UnitOfWork,
		config: ConfigService,
	) {
		this.collateralAsset = config.getOrThrow<string>("COLLATERAL_ASSET");
		this.debtAsset = config.getOrThrow<string>("DEBT_ASSET");
	}

	async generate(
		caller: Identity,
		collateralAsset = this.collateralAsset,
		debtAsset = this.debtAsset,
	): Promise<EscrowId> {
		const escrowId = await this.unitOfWork.run(({ registry }) =>
			registry.generate(caller, collateralAsset, debtAsset),
		);
		this.logger.log(`Escrow ${escrowId} for ${caller}`);
		return escrowId;
	}

	async getOne(escrowId: EscrowId): Promise<EscrowDto> {
		const snapshot = await this.unitOfWork.run(({ store }) =>
			store.load(escrowId),
		);
		if (!snapshot) {
			throw new NotFoundException(`Escrow ${escrowId} not found`);
		}
		return toEscrowDto(snapshot);
	}

	async getLoan(escrowId: EscrowId, loanId: number): Promise<LoanDto> {
		const escrow = await this.getOne(escrowId);
		const loan = escrow.loans.at(loanId);
		if (loanId < 0 || !loan) {
			throw new NotFoundException(`Loan ${loanId} not found`);
		}
		return loan;
	}

	async getByOwner(
		owner: Identity,
		limit: number,
		offset: number,
	): Promise<EscrowPage> {
		const page = await this.unitOfWork.run(({ store }) =>
			store.query({ owner, limit, offset }),
		);
		return {
			items: page.items.map(toEscrowDto),
			total: page.total,
			nextOffset: page.hasMore ? offset + page.items.length : undefined,
		};
	}

	async request(
		caller: Identity,
		escrowId: EscrowId,
		terms: LoanTerms,
	): Promise<number> {
		const requestId = await this.unitOfWork.run(({ registry }) =>
			registry.withEscrow(escrowId, (escrow) => escrow.request(caller, terms)),
		);
		this.logger.log(`Request ${escrowId}/${requestId} by ${caller}`);
		return requestId;
	}

	async rescind(
		caller: Identity,
		escrowId: EscrowId,
		requestId: number,
	): Promise<void> {
		await this.unitOfWork.run(({ registry }) =>
			registry.withEscrow(escrowId, (escrow) =>
				escrow.rescind(caller, requestId),
			),
		);
	}

	/**
	 * Lend directly from the caller's balance, outside gateway policy.
	 */
	async clear(
		caller: Identity,
		escrowId: EscrowId,
		requestId: number,
	): Promise<number> {
		const loanId = await this.unitOfWork.run(({ registry, now }) =>
			registry.withEscrow(escrowId, (escrow) =>
				escrow.clear(caller, requestId, now),
			),
		);
		this.logger.log(`Loan ${escrowId}/${loanId} cleared by ${caller}`);
		return loanId;
	}

	async repay(
		caller: Identity,
		escrowId: EscrowId,
		loanId: number,
		amount: bigint,
	): Promise<bigint> {
		return this.unitOfWork.run(({ registry, now }) =>
			registry.withEscrow(escrowId, (escrow) =>
				escrow.repay(caller, loanId, amount, now),
			),
		);
	}

	async roll(
		caller: Identity,
		escrowId: EscrowId,
		loanId: number,
	): Promise<LoanDto> {
		const loan = await this.unitOfWork.run(({ registry, now }) =>
			registry.withEscrow(escrowId, (escrow) =>
				escrow.roll(caller, loanId, now),
			),
		);
		return toLoanDto({ status: "open", loan }, loanId);
	}

	async toggleRoll(
		caller: Identity,
		escrowId: EscrowId,
		loanId: number,
	): Promise<boolean> {
		return this.unitOfWork.run(({ registry }) =>
			registry.withEscrow(escrowId, (escrow) =>
				escrow.toggleRoll(caller, loanId),
			),
		);
	}

	async defaulted(escrowId: EscrowId, loanId: number): Promise<bigint> {
		const seized = await this.unitOfWork.run(({ registry, now }) =>
			registry.withEscrow(escrowId, (escrow) => escrow.defaulted(loanId, now)),
		);
		this.logger.warn(`Loan ${escrowId}/${loanId} defaulted, ${seized} seized`);
		return seized;
	}

	async approveTransfer(
		caller: Identity,
		escrowId: EscrowId,
		loanId: number,
		to: Identity,
	): Promise<void> {
		await this.unitOfWork.run(({ registry }) =>
			registry.withEscrow(escrowId, (escrow) =>
				escrow.approveTransfer(caller, loanId, to),
			),
		);
	}

	async transferOwnership(
		caller: Identity,
		escrowId: EscrowId,
		loanId: number,
	): Promise<void> {
		await this.unitOfWork.run(({ registry }) =>
			registry.withEscrow(escrowId, (escrow) =>
				escrow.transferOwnership(caller, loanId),
			),
		);
	}
}
