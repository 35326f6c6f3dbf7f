import {
	Body,
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	ParseIntPipe,
	Post,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBadRequestResponse,
	ApiBearerAuth,
	ApiBody,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { AuthGuard } from "../auth/auth.guard";
import { UserFromJwt } from "../auth/user.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { CreatedIdDto, RollableDto } from "../escrows/dto/escrow.dto";
import { User } from "../users/user.entity";
import {
	DefundInDto,
	FundInDto,
	GatewayInfoDto,
	ProposeRoleInDto,
} from "./dto/gateway.dto";
import { GatewayService } from "./gateway.service";

@ApiTags("2 - Gateway")
@ApiExtraModels(ApiEnvelopeShellDto, CreatedIdDto, GatewayInfoDto, RollableDto)
@Controller("api/v1/gateway")
export class GatewayController {
	constructor(private readonly gateway: GatewayService) {}

	@Get("info")
	@ApiOkResponse({ schema: getSchemaPathForDto(GatewayInfoDto) })
	@ApiOperation({ summary: "Roles, bounds and lendable balance" })
	async info(): Promise<ApiEnvelope<GatewayInfoDto>> {
		return envelope(await this.gateway.info());
	}

	@Post("escrows/:escrowId/requests/:requestId/clear")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiCreatedResponse({
		description: "The new loan id",
		schema: getSchemaPathForDto(CreatedIdDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiForbiddenResponse({ description: "Caller is not the operator" })
	@ApiBadRequestResponse({ description: "Terms outside gateway bounds" })
	@ApiOperation({ summary: "Lend from the gateway to an in-bounds request" })
	async clear(
		@Param("escrowId") escrowId: string,
		@Param("requestId", ParseIntPipe) requestId: number,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<CreatedIdDto>> {
		const id = await this.gateway.clear(user.publicKey, escrowId, requestId);
		return envelope({ id });
	}

	@Post("escrows/:escrowId/loans/:loanId/toggle-roll")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOkResponse({ schema: getSchemaPathForDto(RollableDto) })
	@ApiForbiddenResponse({ description: "Caller is not the operator" })
	@ApiOperation({ summary: "Allow or forbid rolling a gateway loan" })
	async toggleRoll(
		@Param("escrowId") escrowId: string,
		@Param("loanId", ParseIntPipe) loanId: number,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<RollableDto>> {
		const rollable = await this.gateway.toggleRoll(
			user.publicKey,
			escrowId,
			loanId,
		);
		return envelope({ rollable });
	}

	@Post("fund")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: FundInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GatewayInfoDto) })
	@ApiForbiddenResponse({ description: "Caller is not the overseer" })
	@ApiOperation({ summary: "Draw debt asset from the treasury" })
	async fund(
		@Body() dto: FundInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<GatewayInfoDto>> {
		await this.gateway.fund(user.publicKey, BigInt(dto.amount));
		return envelope(await this.gateway.info());
	}

	@Post("defund")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: DefundInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GatewayInfoDto) })
	@ApiForbiddenResponse({ description: "Caller holds neither role" })
	@ApiOperation({ summary: "Return funds to the treasury" })
	async defund(
		@Body() dto: DefundInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<GatewayInfoDto>> {
		await this.gateway.defund(user.publicKey, dto.asset, BigInt(dto.amount));
		return envelope(await this.gateway.info());
	}

	@Post("operator/propose")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: ProposeRoleInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GatewayInfoDto) })
	@ApiOperation({ summary: "Name the next operator" })
	async proposeOperator(
		@Body() dto: ProposeRoleInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<GatewayInfoDto>> {
		await this.gateway.proposeOperator(user.publicKey, dto.next);
		return envelope(await this.gateway.info());
	}

	@Post("operator/accept")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOkResponse({ schema: getSchemaPathForDto(GatewayInfoDto) })
	@ApiOperation({ summary: "Take over as the proposed operator" })
	async acceptOperator(
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<GatewayInfoDto>> {
		await this.gateway.acceptOperator(user.publicKey);
		return envelope(await this.gateway.info());
	}

	@Post("overseer/propose")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: ProposeRoleInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GatewayInfoDto) })
	@ApiOperation({ summary: "Name the next overseer" })
	async proposeOverseer(
		@Body() dto: ProposeRoleInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<GatewayInfoDto>> {
		await this.gateway.proposeOverseer(user.publicKey, dto.next);
		return envelope(await this.gateway.info());
	}

	@Post("overseer/accept")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOkResponse({ schema: getSchemaPathForDto(GatewayInfoDto) })
	@ApiOperation({ summary: "Take over as the proposed overseer" })
	async acceptOverseer(
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<GatewayInfoDto>> {
		await this.gateway.acceptOverseer(user.publicKey);
		return envelope(await this.gateway.info());
	}
}
