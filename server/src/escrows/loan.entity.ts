import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	Unique,
	UpdateDateColumn,
} from "typeorm";
import type { LoanState } from "@pairloan/sdk";
import { bigintTransformer } from "../common/bigint.transformer";

export const LOAN_STATUS = ["open", "repaid", "defaulted"] as const;

/**
 * One loan slot. Terms and balances are cleared once the loan is repaid
 * or defaulted.
 */
@Entity("loans")
@Unique("uq_loans_escrow_index", ["escrowId", "index"])
export class LoanRecord {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index()
	@Column({ type: "text" })
	escrowId!: string;

	/** Loan id within its escrow */
	@Column({ type: "integer" })
	index!: number;

	@Column({ type: "text" })
	status!: LoanState;

	@Column({ type: "text", nullable: true, transformer: bigintTransformer })
	requestAmount!: bigint | null;

	@Column({ type: "text", nullable: true, transformer: bigintTransformer })
	requestInterest!: bigint | null;

	@Column({ type: "text", nullable: true, transformer: bigintTransformer })
	requestLoanToCollateral!: bigint | null;

	@Column({ type: "integer", nullable: true })
	requestDuration!: number | null;

	@Column({ type: "text", nullable: true, transformer: bigintTransformer })
	amount!: bigint | null;

	@Column({ type: "text", nullable: true, transformer: bigintTransformer })
	collateral!: bigint | null;

	@Column({ type: "integer", nullable: true })
	expiry!: number | null;

	@Column({ type: "boolean", nullable: true })
	rollable!: boolean | null;

	@Index()
	@Column({ type: "text", nullable: true })
	lender!: string | null;

	@Column({ type: "text", nullable: true })
	pendingLender!: string | null;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
