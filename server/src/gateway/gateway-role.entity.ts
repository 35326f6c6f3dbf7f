import { Column, Entity, PrimaryColumn, UpdateDateColumn } from "typeorm";

/**
 * Current and proposed holders of a gateway's roles.
 */
@Entity("gateway_roles")
export class GatewayRoleRecord {
	@PrimaryColumn({ type: "text" })
	gatewayId!: string;

	@Column({ type: "text" })
	operator!: string;

	@Column({ type: "text" })
	overseer!: string;

	@Column({ type: "text", nullable: true })
	pendingOperator!: string | null;

	@Column({ type: "text", nullable: true })
	pendingOverseer!: string | null;

	@UpdateDateColumn()
	updatedAt!: Date;
}
