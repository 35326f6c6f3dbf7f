import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	Unique,
	UpdateDateColumn,
} from "typeorm";

@Entity("escrows")
@Unique("uq_escrows_owner_pair", ["owner", "collateralAsset", "debtAsset"])
export class EscrowRecord {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	owner!: string;

	@Column({ type: "text" })
	collateralAsset!: string;

	@Column({ type: "text" })
	debtAsset!: string;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
