import {
	Body,
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	Post,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBearerAuth,
	ApiBody,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { AuthGuard } from "../auth/auth.guard";
import { UserFromJwt } from "../auth/user.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { User } from "../users/user.entity";
import {
	AllowanceOutDto,
	ApproveInDto,
	BalanceOutDto,
	MintInDto,
} from "./dto/ledger.dto";
import { LedgerService } from "./ledger.service";

@ApiTags("3 - Ledger")
@ApiExtraModels(ApiEnvelopeShellDto, AllowanceOutDto, BalanceOutDto)
@Controller("api/v1/ledger")
export class LedgerController {
	constructor(private readonly ledger: LedgerService) {}

	@Get(":asset/balances/:holder")
	@ApiOkResponse({ schema: getSchemaPathForDto(BalanceOutDto) })
	@ApiUnprocessableEntityResponse({ description: "Unknown asset" })
	@ApiOperation({ summary: "Balance of one identity" })
	async balance(
		@Param("asset") asset: string,
		@Param("holder") holder: string,
	): Promise<ApiEnvelope<BalanceOutDto>> {
		return envelope(await this.ledger.balanceOf(asset, holder));
	}

	@Get(":asset/allowances/:owner/:spender")
	@ApiOkResponse({ schema: getSchemaPathForDto(AllowanceOutDto) })
	@ApiOperation({ summary: "What a spender may move of an owner's balance" })
	async allowance(
		@Param("asset") asset: string,
		@Param("owner") owner: string,
		@Param("spender") spender: string,
	): Promise<ApiEnvelope<AllowanceOutDto>> {
		return envelope(await this.ledger.allowance(asset, owner, spender));
	}

	@Post(":asset/approve")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: ApproveInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(AllowanceOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiOperation({ summary: "Allow a spender to move the caller's funds" })
	async approve(
		@Param("asset") asset: string,
		@Body() dto: ApproveInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<AllowanceOutDto>> {
		return envelope(
			await this.ledger.approve(
				user.publicKey,
				asset,
				dto.spender,
				BigInt(dto.amount),
			),
		);
	}
}

@ApiTags("Admin")
@ApiExtraModels(ApiEnvelopeShellDto, BalanceOutDto)
@Controller("api/v1/admin/ledger")
export class LedgerAdminController {
	constructor(private readonly ledger: LedgerService) {}

	@Post(":asset/mint")
	@HttpCode(HttpStatus.OK)
	@ApiBasicAuth()
	@ApiBody({ type: MintInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(BalanceOutDto) })
	@ApiOperation({ summary: "Credit an identity (development funding)" })
	async mint(
		@Param("asset") asset: string,
		@Body() dto: MintInDto,
	): Promise<ApiEnvelope<BalanceOutDto>> {
		return envelope(
			await this.ledger.mint(asset, dto.holder, BigInt(dto.amount)),
		);
	}
}
