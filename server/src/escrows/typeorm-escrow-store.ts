/**
 * TypeORM Escrow Store
 *
 * Implements the SDK's EscrowStore over the escrows, loan_requests and
 * loans tables. Bound to an EntityManager so saves join the caller's
 * transaction.
 */

import type { EntityManager, FindOptionsWhere } from "typeorm";
import {
	type AssetId,
	type EscrowId,
	type EscrowSnapshot,
	type EscrowStore,
	type Identity,
	type LoanRequest,
	type LoanSlot,
	type QueryOptions,
	type QueryResult,
	StorageError,
} from "@pairloan/sdk";
import { EscrowRecord } from "./escrow.entity";
import { LoanRecord } from "./loan.entity";
import { LoanRequestRecord } from "./loan-request.entity";

export class TypeOrmEscrowStore implements EscrowStore {
	constructor(private readonly manager: EntityManager) {}

	async save(snapshot: EscrowSnapshot): Promise<void> {
		const escrow =
			(await this.manager.findOne(EscrowRecord, {
				where: { externalId: snapshot.id },
			})) ??
			this.manager.create(EscrowRecord, {
				externalId: snapshot.id,
				owner: snapshot.owner,
				collateralAsset: snapshot.collateralAsset,
				debtAsset: snapshot.debtAsset,
			});
		await this.manager.save(escrow);

		const requests = await this.manager.find(LoanRequestRecord, {
			where: { escrowId: snapshot.id },
		});
		const requestsByIndex = new Map(requests.map((r) => [r.index, r]));
		const requestRows = snapshot.requests.map((request, index) =>
			Object.assign(
				requestsByIndex.get(index) ??
					this.manager.create(LoanRequestRecord, {
						escrowId: snapshot.id,
						index,
					}),
				{
					amount: request.amount,
					interest: request.interest,
					loanToCollateral: request.loanToCollateral,
					duration: request.duration,
					status: request.status,
				},
			),
		);
		await this.manager.save(requestRows);

		const loans = await this.manager.find(LoanRecord, {
			where: { escrowId: snapshot.id },
		});
		const loansByIndex = new Map(loans.map((l) => [l.index, l]));
		const loanRows = snapshot.loans.map((slot, index) =>
			Object.assign(
				loansByIndex.get(index) ??
					this.manager.create(LoanRecord, { escrowId: snapshot.id, index }),
				toLoanColumns(slot),
			),
		);
		await this.manager.save(loanRows);
	}

	async load(id: EscrowId): Promise<EscrowSnapshot | null> {
		const escrow = await this.manager.findOne(EscrowRecord, {
			where: { externalId: id },
		});
		return escrow ? this.toSnapshot(escrow) : null;
	}

	async exists(id: EscrowId): Promise<boolean> {
		return this.manager.exists(EscrowRecord, { where: { externalId: id } });
	}

	async findFor(
		owner: Identity,
		collateralAsset: AssetId,
		debtAsset: AssetId,
	): Promise<EscrowSnapshot | null> {
		const escrow = await this.manager.findOne(EscrowRecord, {
			where: { owner, collateralAsset, debtAsset },
		});
		return escrow ? this.toSnapshot(escrow) : null;
	}

	async query(options?: QueryOptions): Promise<QueryResult<EscrowSnapshot>> {
		const where: FindOptionsWhere<EscrowRecord> = {};
		if (options?.owner !== undefined) where.owner = options.owner;
		if (options?.collateralAsset !== undefined)
			where.collateralAsset = options.collateralAsset;
		if (options?.debtAsset !== undefined) where.debtAsset = options.debtAsset;

		const offset = options?.offset ?? 0;
		const [rows, total] = await this.manager.findAndCount(EscrowRecord, {
			where,
			order: { externalId: "ASC" },
			skip: offset,
			take: options?.limit,
		});
		const items = await Promise.all(rows.map((row) => this.toSnapshot(row)));
		return { items, total, hasMore: offset + items.length < total };
	}

	private async toSnapshot(escrow: EscrowRecord): Promise<EscrowSnapshot> {
		const [requests, loans] = await Promise.all([
			this.manager.find(LoanRequestRecord, {
				where: { escrowId: escrow.externalId },
				order: { index: "ASC" },
			}),
			this.manager.find(LoanRecord, {
				where: { escrowId: escrow.externalId },
				order: { index: "ASC" },
			}),
		]);
		return {
			id: escrow.externalId,
			owner: escrow.owner,
			collateralAsset: escrow.collateralAsset,
			debtAsset: escrow.debtAsset,
			requests: requests.map(
				(row): LoanRequest => ({
					amount: row.amount,
					interest: row.interest,
					loanToCollateral: row.loanToCollateral,
					duration: row.duration,
					status: row.status,
				}),
			),
			loans: loans.map(toLoanSlot),
		};
	}
}

type LoanColumns = Pick<
	LoanRecord,
	| "status"
	| "requestAmount"
	| "requestInterest"
	| "requestLoanToCollateral"
	| "requestDuration"
	| "amount"
	| "collateral"
	| "expiry"
	| "rollable"
	| "lender"
	| "pendingLender"
>;

function toLoanColumns(slot: LoanSlot): LoanColumns {
	if (slot.status !== "open") {
		return {
			status: slot.status,
			requestAmount: null,
			requestInterest: null,
			requestLoanToCollateral: null,
			requestDuration: null,
			amount: null,
			collateral: null,
			expiry: null,
			rollable: null,
			lender: null,
			pendingLender: null,
		};
	}
	const { loan } = slot;
	return {
		status: "open",
		requestAmount: loan.request.amount,
		requestInterest: loan.request.interest,
		requestLoanToCollateral: loan.request.loanToCollateral,
		requestDuration: loan.request.duration,
		amount: loan.amount,
		collateral: loan.collateral,
		expiry: loan.expiry,
		rollable: loan.rollable,
		lender: loan.lender,
		pendingLender: loan.pendingLender ?? null,
	};
}

function toLoanSlot(row: LoanRecord): LoanSlot {
	if (row.status !== "open") {
		return { status: row.status };
	}
	const field = <T>(value: T | null, name: string): T => {
		if (value === null) {
			throw new StorageError(
				`Open loan ${row.escrowId}/${row.index} has no ${name}`,
				"CORRUPT_LOAN",
				{ escrowId: row.escrowId, index: row.index },
			);
		}
		return value;
	};
	return {
		status: "open",
		loan: {
			request: {
				amount: field(row.requestAmount, "requestAmount"),
				interest: field(row.requestInterest, "requestInterest"),
				loanToCollateral: field(
					row.requestLoanToCollateral,
					"requestLoanToCollateral",
				),
				duration: field(row.requestDuration, "requestDuration"),
			},
			amount: field(row.amount, "amount"),
			collateral: field(row.collateral, "collateral"),
			expiry: field(row.expiry, "expiry"),
			rollable: field(row.rollable, "rollable"),
			lender: field(row.lender, "lender"),
			...(row.pendingLender === null ? {} : { pendingLender: row.pendingLender }),
		},
	};
}
