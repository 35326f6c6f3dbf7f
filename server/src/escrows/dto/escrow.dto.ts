import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import type {
	EscrowSnapshot,
	LoanRequest,
	LoanSlot,
	LoanState,
	RequestState,
} from "@pairloan/sdk";
import { REQUEST_STATUS } from "../loan-request.entity";
import { LOAN_STATUS } from "../loan.entity";

export class LoanRequestDto {
	@ApiProperty({ description: "Request id within its escrow", example: 0 })
	id!: number;

	@ApiProperty({ example: "1000000000000000000000" })
	amount!: string;

	@ApiProperty({ example: "20000000000000000" })
	interest!: string;

	@ApiProperty({ example: "2500000000000000000000" })
	loanToCollateral!: string;

	@ApiProperty({ example: 31536000 })
	duration!: number;

	@ApiProperty({ enum: [...REQUEST_STATUS] })
	status!: RequestState;
}

export class LoanDto {
	@ApiProperty({ description: "Loan id within its escrow", example: 0 })
	id!: number;

	@ApiProperty({ enum: [...LOAN_STATUS] })
	status!: LoanState;

	@ApiPropertyOptional({ description: "Outstanding debt" })
	amount?: string;

	@ApiPropertyOptional({ description: "Collateral currently pledged" })
	collateral?: string;

	@ApiPropertyOptional({ description: "Unix seconds; in default after this" })
	expiry?: number;

	@ApiPropertyOptional()
	rollable?: boolean;

	@ApiPropertyOptional()
	lender?: string;

	@ApiPropertyOptional()
	pendingLender?: string;

	@ApiPropertyOptional({ description: "Request the loan was cleared from" })
	interest?: string;

	@ApiPropertyOptional()
	loanToCollateral?: string;

	@ApiPropertyOptional()
	duration?: number;
}

export class EscrowDto {
	@ApiProperty({ description: "Escrow id, also its ledger identity" })
	id!: string;

	@ApiProperty({ description: "Borrower public key" })
	owner!: string;

	@ApiProperty({ example: "gohm" })
	collateralAsset!: string;

	@ApiProperty({ example: "dai" })
	debtAsset!: string;

	@ApiProperty({ type: [LoanRequestDto] })
	requests!: LoanRequestDto[];

	@ApiProperty({ type: [LoanDto] })
	loans!: LoanDto[];
}

export class CreatedIdDto {
	@ApiProperty({ example: 0 })
	id!: number;
}

export class GeneratedEscrowDto {
	@ApiProperty()
	escrowId!: string;
}

export class RepaidDto {
	@ApiProperty({ description: "Collateral released to the borrower" })
	released!: string;
}

export class SeizedDto {
	@ApiProperty({ description: "Collateral transferred to the lender" })
	seized!: string;
}

export class RollableDto {
	@ApiProperty()
	rollable!: boolean;
}

export function toLoanRequestDto(request: LoanRequest, id: number): LoanRequestDto {
	return {
		id,
		amount: request.amount.toString(),
		interest: request.interest.toString(),
		loanToCollateral: request.loanToCollateral.toString(),
		duration: request.duration,
		status: request.status,
	};
}

export function toLoanDto(slot: LoanSlot, id: number): LoanDto {
	if (slot.status !== "open") {
		return { id, status: slot.status };
	}
	const { loan } = slot;
	return {
		id,
		status: "open",
		amount: loan.amount.toString(),
		collateral: loan.collateral.toString(),
		expiry: loan.expiry,
		rollable: loan.rollable,
		lender: loan.lender,
		pendingLender: loan.pendingLender,
		interest: loan.request.interest.toString(),
		loanToCollateral: loan.request.loanToCollateral.toString(),
		duration: loan.request.duration,
	};
}

export function toEscrowDto(snapshot: EscrowSnapshot): EscrowDto {
	return {
		id: snapshot.id,
		owner: snapshot.owner,
		collateralAsset: snapshot.collateralAsset,
		debtAsset: snapshot.debtAsset,
		requests: snapshot.requests.map(toLoanRequestDto),
		loans: snapshot.loans.map(toLoanDto),
	};
}
