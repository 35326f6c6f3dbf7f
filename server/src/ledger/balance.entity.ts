import {
	Column,
	Entity,
	PrimaryGeneratedColumn,
	Unique,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../common/bigint.transformer";

@Entity("ledger_balances")
@Unique("uq_ledger_balances_asset_holder", ["asset", "holder"])
export class Balance {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	asset!: string;

	@Column({ type: "text" })
	holder!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	amount!: bigint;

	@UpdateDateColumn()
	updatedAt!: Date;
}
