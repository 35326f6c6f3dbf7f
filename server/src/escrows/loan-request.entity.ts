import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	Unique,
	UpdateDateColumn,
} from "typeorm";
import type { RequestState } from "@pairloan/sdk";
import { bigintTransformer } from "../common/bigint.transformer";

export const REQUEST_STATUS = ["active", "rescinded", "cleared"] as const;

@Entity("loan_requests")
@Unique("uq_loan_requests_escrow_index", ["escrowId", "index"])
export class LoanRequestRecord {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index()
	@Column({ type: "text" })
	escrowId!: string;

	/** Request id within its escrow */
	@Column({ type: "integer" })
	index!: number;

	@Column({ type: "text", transformer: bigintTransformer })
	amount!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	interest!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	loanToCollateral!: bigint;

	@Column({ type: "integer" })
	duration!: number;

	@Column({ type: "text", default: "active" })
	status!: RequestState;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
