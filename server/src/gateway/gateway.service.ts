import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
	type AssetId,
	type EscrowId,
	type GatewayBounds,
	type GatewayRoles,
	type Identity,
	LedgerTreasury,
	RiskGateway,
} from "@pairloan/sdk";
import { UnitOfWork, type UnitOfWorkContext } from "../common/unit-of-work";
import type { GatewayInfoDto } from "./dto/gateway.dto";
import { GatewayRoleRecord } from "./gateway-role.entity";

/**
 * Runs the risk gateway against the database. Roles live in
 * `gateway_roles`, seeded from configuration on first use.
 */
@Injectable()
export class GatewayService {
	private readonly logger = new Logger(GatewayService.name);
	private readonly identity: Identity;
	private readonly treasuryId: Identity;
	private readonly collateralAsset: AssetId;
	private readonly debtAsset: AssetId;
	private readonly bounds: GatewayBounds;
	private readonly seedRoles: GatewayRoles;

	constructor(
		private readonly unitOfWork: UnitOfWork,
		config: ConfigService,
	) {
		this.identity = config.getOrThrow<string>("GATEWAY_ID");
		this.treasuryId = config.getOrThrow<string>("TREASURY_ID");
		this.collateralAsset = config.getOrThrow<string>("COLLATERAL_ASSET");
		this.debtAsset = config.getOrThrow<string>("DEBT_ASSET");
		this.bounds = {
			minimumInterest: BigInt(
				config.getOrThrow<string>("GATEWAY_MINIMUM_INTEREST"),
			),
			maxLoanToCollateral: BigInt(
				config.getOrThrow<string>("GATEWAY_MAX_LOAN_TO_COLLATERAL"),
			),
			maxDuration: config.getOrThrow<number>("GATEWAY_MAX_DURATION"),
		};
		this.seedRoles = {
			operator: config.getOrThrow<string>("GATEWAY_OPERATOR"),
			overseer: config.getOrThrow<string>("GATEWAY_OVERSEER"),
		};
	}

	async info(): Promise<GatewayInfoDto> {
		return this.withGateway(async (gateway, { ledgers }) => {
			const roles = gateway.roles();
			const available = await ledgers
				.ledgerFor(this.debtAsset)
				.balanceOf(this.identity);
			return {
				identity: this.identity,
				collateralAsset: this.collateralAsset,
				debtAsset: this.debtAsset,
				operator: roles.operator,
				overseer: roles.overseer,
				pendingOperator: roles.pendingOperator,
				pendingOverseer: roles.pendingOverseer,
				bounds: {
					minimumInterest: gateway.bounds.minimumInterest.toString(),
					maxLoanToCollateral: gateway.bounds.maxLoanToCollateral.toString(),
					maxDuration: gateway.bounds.maxDuration,
				},
				available: available.toString(),
			};
		});
	}

	async clear(
		caller: Identity,
		escrowId: EscrowId,
		requestId: number,
	): Promise<number> {
		const loanId = await this.withGateway((gateway, { now }) =>
			gateway.clear(caller, escrowId, requestId, now),
		);
		this.logger.log(`Gateway cleared ${escrowId}/${requestId} as loan ${loanId}`);
		return loanId;
	}

	async toggleRoll(
		caller: Identity,
		escrowId: EscrowId,
		loanId: number,
	): Promise<boolean> {
		return this.withGateway((gateway) =>
			gateway.toggleRoll(caller, escrowId, loanId),
		);
	}

	async fund(caller: Identity, amount: bigint): Promise<void> {
		await this.withGateway((gateway) => gateway.fund(caller, amount));
		this.logger.log(`Gateway funded with ${amount} ${this.debtAsset}`);
	}

	async defund(caller: Identity, asset: AssetId, amount: bigint): Promise<void> {
		await this.withGateway((gateway) => gateway.defund(caller, asset, amount));
		this.logger.log(`Gateway defunded ${amount} ${asset}`);
	}

	async proposeOperator(caller: Identity, next: Identity): Promise<void> {
		await this.withGateway(async (gateway) =>
			gateway.proposeOperator(caller, next),
		);
	}

	async acceptOperator(caller: Identity): Promise<void> {
		await this.withGateway(async (gateway) => gateway.acceptOperator(caller));
		this.logger.log(`Gateway operator is now ${caller}`);
	}

	async proposeOverseer(caller: Identity, next: Identity): Promise<void> {
		await this.withGateway(async (gateway) =>
			gateway.proposeOverseer(caller, next),
		);
	}

	async acceptOverseer(caller: Identity): Promise<void> {
		await this.withGateway(async (gateway) => gateway.acceptOverseer(caller));
		this.logger.log(`Gateway overseer is now ${caller}`);
	}

	/**
	 * Load the gateway, run `fn`, and persist its roles in the same unit.
	 */
	private withGateway<T>(
		fn: (gateway: RiskGateway, ctx: UnitOfWorkContext) => Promise<T>,
	): Promise<T> {
		return this.unitOfWork.run(async (ctx) => {
			const record =
				(await ctx.manager.findOneBy(GatewayRoleRecord, {
					gatewayId: this.identity,
				})) ??
				ctx.manager.create(GatewayRoleRecord, {
					gatewayId: this.identity,
					operator: this.seedRoles.operator,
					overseer: this.seedRoles.overseer,
					pendingOperator: null,
					pendingOverseer: null,
				});

			const gateway = new RiskGateway({
				identity: this.identity,
				roles: {
					operator: record.operator,
					overseer: record.overseer,
					...(record.pendingOperator === null
						? {}
						: { pendingOperator: record.pendingOperator }),
					...(record.pendingOverseer === null
						? {}
						: { pendingOverseer: record.pendingOverseer }),
				},
				collateralAsset: this.collateralAsset,
				debtAsset: this.debtAsset,
				bounds: this.bounds,
				directory: ctx.registry,
				ledgers: ctx.ledgers,
				treasury: new LedgerTreasury(this.treasuryId, ctx.ledgers, [
					this.identity,
				]),
			});

			const result = await fn(gateway, ctx);

			const roles = gateway.roles();
			record.operator = roles.operator;
			record.overseer = roles.overseer;
			record.pendingOperator = roles.pendingOperator ?? null;
			record.pendingOverseer = roles.pendingOverseer ?? null;
			await ctx.manager.save(record);
			return result;
		});
	}
}
