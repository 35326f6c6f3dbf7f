import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	ParseIntPipe,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { map, type Observable } from "rxjs";
import { AuthGuard } from "../auth/auth.guard";
import { UserFromJwt } from "../auth/user.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	type ApiPaginatedEnvelope,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import type { EscrowEvent } from "../common/escrow.event";
import {
	ServerSentEventsService,
	type SseEvent,
} from "../common/server-sent-events.service";
import { User } from "../users/user.entity";
import {
	CreatedIdDto,
	EscrowDto,
	GeneratedEscrowDto,
	LoanDto,
	LoanRequestDto,
	RepaidDto,
	RollableDto,
	SeizedDto,
} from "./dto/escrow.dto";
import { GenerateEscrowInDto } from "./dto/generate-escrow.dto";
import {
	ApproveTransferInDto,
	RepayInDto,
	RequestLoanInDto,
} from "./dto/loan-terms.dto";
import { EscrowsService } from "./escrows.service";

@ApiTags("1 - Escrows")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	CreatedIdDto,
	EscrowDto,
	GeneratedEscrowDto,
	LoanDto,
	LoanRequestDto,
	RepaidDto,
	RollableDto,
	SeizedDto,
)
@Controller("api/v1/escrows")
export class EscrowsController {
	constructor(
		private readonly escrowsService: EscrowsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Post("")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: GenerateEscrowInDto })
	@ApiCreatedResponse({
		description: "The caller's escrow for the asset pair",
		schema: getSchemaPathForDto(GeneratedEscrowDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiUnprocessableEntityResponse({ description: "Unknown asset" })
	@ApiOperation({
		summary: "Get or create the caller's escrow for an asset pair",
	})
	async generate(
		@Body() dto: GenerateEscrowInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<GeneratedEscrowDto>> {
		const escrowId = await this.escrowsService.generate(
			user.publicKey,
			dto.collateralAsset,
			dto.debtAsset,
		);
		return envelope({ escrowId });
	}

	@Get("mine")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1–100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "offset",
		required: false,
		schema: { type: "integer", minimum: 0, example: 0 },
	})
	@ApiOkResponse({
		description: "A page of the caller's escrows",
		schema: getSchemaPathForPaginatedDto(EscrowDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiOperation({ summary: "Escrows owned by the caller" })
	async getMine(
		@UserFromJwt() user: User,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("offset", new DefaultValuePipe(0), ParseIntPipe) offset: number,
	): Promise<ApiPaginatedEnvelope<EscrowDto[]>> {
		const { items, total, nextOffset } = await this.escrowsService.getByOwner(
			user.publicKey,
			Math.min(Math.max(limit, 1), 100),
			Math.max(offset, 0),
		);
		return paginatedEnvelope(items, { total, nextOffset });
	}

	@Sse("events")
	@ApiQuery({ name: "escrowId", required: false })
	@ApiOperation({ summary: "Subscribe to escrow events" })
	events(@Query("escrowId") escrowId?: string): Observable<SseEvent<EscrowEvent>> {
		return this.sseService.escrowEvents(escrowId).pipe(
			map((event) => ({
				data: event,
			})),
		);
	}

	@Get(":escrowId")
	@ApiParam({ name: "escrowId" })
	@ApiOkResponse({ schema: getSchemaPathForDto(EscrowDto) })
	@ApiNotFoundResponse({ description: "Escrow not found" })
	@ApiOperation({ summary: "One escrow with its requests and loans" })
	async getOne(
		@Param("escrowId") escrowId: string,
	): Promise<ApiEnvelope<EscrowDto>> {
		return envelope(await this.escrowsService.getOne(escrowId));
	}

	@Get(":escrowId/loans/:loanId")
	@ApiOkResponse({ schema: getSchemaPathForDto(LoanDto) })
	@ApiNotFoundResponse({ description: "Escrow or loan not found" })
	@ApiOperation({ summary: "One loan slot" })
	async getLoan(
		@Param("escrowId") escrowId: string,
		@Param("loanId", ParseIntPipe) loanId: number,
	): Promise<ApiEnvelope<LoanDto>> {
		return envelope(await this.escrowsService.getLoan(escrowId, loanId));
	}

	@Post(":escrowId/requests")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: RequestLoanInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(CreatedIdDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiUnprocessableEntityResponse({
		description: "Collateral not approved or balance too low",
	})
	@ApiOperation({
		summary: "Offer terms, locking the collateral they require",
	})
	async request(
		@Param("escrowId") escrowId: string,
		@Body() dto: RequestLoanInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<CreatedIdDto>> {
		const id = await this.escrowsService.request(user.publicKey, escrowId, {
			amount: BigInt(dto.amount),
			interest: BigInt(dto.interest),
			loanToCollateral: BigInt(dto.loanToCollateral),
			duration: dto.duration,
		});
		return envelope({ id });
	}

	@Post(":escrowId/requests/:requestId/rescind")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiForbiddenResponse({ description: "Caller is not the escrow owner" })
	@ApiConflictResponse({ description: "Request is not active" })
	@ApiOperation({ summary: "Withdraw an active request and its collateral" })
	async rescind(
		@Param("escrowId") escrowId: string,
		@Param("requestId", ParseIntPipe) requestId: number,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<CreatedIdDto>> {
		await this.escrowsService.rescind(user.publicKey, escrowId, requestId);
		return envelope({ id: requestId });
	}

	@Post(":escrowId/requests/:requestId/clear")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiCreatedResponse({
		description: "The new loan id",
		schema: getSchemaPathForDto(CreatedIdDto),
	})
	@ApiConflictResponse({ description: "Request is not active" })
	@ApiOperation({
		summary: "Lend from the caller's balance, without gateway policy",
	})
	async clear(
		@Param("escrowId") escrowId: string,
		@Param("requestId", ParseIntPipe) requestId: number,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<CreatedIdDto>> {
		const id = await this.escrowsService.clear(
			user.publicKey,
			escrowId,
			requestId,
		);
		return envelope({ id });
	}

	@Post(":escrowId/loans/:loanId/repay")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: RepayInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(RepaidDto) })
	@ApiUnprocessableEntityResponse({ description: "Loan is in default" })
	@ApiOperation({ summary: "Repay part or all of a loan" })
	async repay(
		@Param("escrowId") escrowId: string,
		@Param("loanId", ParseIntPipe) loanId: number,
		@Body() dto: RepayInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<RepaidDto>> {
		const released = await this.escrowsService.repay(
			user.publicKey,
			escrowId,
			loanId,
			BigInt(dto.amount),
		);
		return envelope({ released: released.toString() });
	}

	@Post(":escrowId/loans/:loanId/roll")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOkResponse({ schema: getSchemaPathForDto(LoanDto) })
	@ApiUnprocessableEntityResponse({
		description: "Loan is in default or not rollable",
	})
	@ApiOperation({ summary: "Extend a loan by its original terms" })
	async roll(
		@Param("escrowId") escrowId: string,
		@Param("loanId", ParseIntPipe) loanId: number,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<LoanDto>> {
		return envelope(
			await this.escrowsService.roll(user.publicKey, escrowId, loanId),
		);
	}

	@Post(":escrowId/loans/:loanId/toggle-roll")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOkResponse({ schema: getSchemaPathForDto(RollableDto) })
	@ApiForbiddenResponse({ description: "Caller is not the lender" })
	@ApiOperation({ summary: "Allow or forbid rolling a loan" })
	async toggleRoll(
		@Param("escrowId") escrowId: string,
		@Param("loanId", ParseIntPipe) loanId: number,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<RollableDto>> {
		const rollable = await this.escrowsService.toggleRoll(
			user.publicKey,
			escrowId,
			loanId,
		);
		return envelope({ rollable });
	}

	@Post(":escrowId/loans/:loanId/default")
	@HttpCode(HttpStatus.OK)
	@ApiOkResponse({ schema: getSchemaPathForDto(SeizedDto) })
	@ApiUnprocessableEntityResponse({ description: "Loan is not yet expired" })
	@ApiOperation({
		summary: "Send an expired loan's collateral to its lender; anyone may call",
	})
	async defaulted(
		@Param("escrowId") escrowId: string,
		@Param("loanId", ParseIntPipe) loanId: number,
	): Promise<ApiEnvelope<SeizedDto>> {
		const seized = await this.escrowsService.defaulted(escrowId, loanId);
		return envelope({ seized: seized.toString() });
	}

	@Post(":escrowId/loans/:loanId/approve-transfer")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: ApproveTransferInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(LoanDto) })
	@ApiForbiddenResponse({ description: "Caller is not the lender" })
	@ApiOperation({ summary: "Name who may take the loan over" })
	async approveTransfer(
		@Param("escrowId") escrowId: string,
		@Param("loanId", ParseIntPipe) loanId: number,
		@Body() dto: ApproveTransferInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<LoanDto>> {
		await this.escrowsService.approveTransfer(
			user.publicKey,
			escrowId,
			loanId,
			dto.to,
		);
		return envelope(await this.escrowsService.getLoan(escrowId, loanId));
	}

	@Post(":escrowId/loans/:loanId/transfer")
	@HttpCode(HttpStatus.OK)
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOkResponse({ schema: getSchemaPathForDto(LoanDto) })
	@ApiForbiddenResponse({ description: "Caller is not the approved lender" })
	@ApiOperation({ summary: "Take over a loan as its approved new lender" })
	async transferOwnership(
		@Param("escrowId") escrowId: string,
		@Param("loanId", ParseIntPipe) loanId: number,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<LoanDto>> {
		await this.escrowsService.transferOwnership(
			user.publicKey,
			escrowId,
			loanId,
		);
		return envelope(await this.escrowsService.getLoan(escrowId, loanId));
	}
}
