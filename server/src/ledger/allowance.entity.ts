import {
	Column,
	Entity,
	PrimaryGeneratedColumn,
	Unique,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../common/bigint.transformer";

@Entity("ledger_allowances")
@Unique("uq_ledger_allowances_asset_owner_spender", ["asset", "owner", "spender"])
export class Allowance {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	asset!: string;

	@Column({ type: "text" })
	owner!: string;

	@Column({ type: "text" })
	spender!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	amount!: bigint;

	@UpdateDateColumn()
	updatedAt!: Date;
}
