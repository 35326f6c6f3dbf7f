import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsNotEmpty, IsString, Min } from "class-validator";
import { IsUnits } from "../../common/dto/units";

export class RequestLoanInDto {
	@IsUnits("Requested debt, in debt-asset base units", "1000000000000000000000")
	amount!: string;

	@IsUnits("Annual rate scaled by 1e18 (1e18 is 100%)", "20000000000000000")
	interest!: string;

	@IsUnits(
		"Debt units lent per collateral unit, scaled by 1e18",
		"2500000000000000000000",
	)
	loanToCollateral!: string;

	@ApiProperty({ description: "Loan tenor in seconds", example: 31536000 })
	@IsInt()
	@Min(0)
	duration!: number;
}

export class RepayInDto {
	@IsUnits("Debt to repay; must not exceed the outstanding amount")
	amount!: string;
}

export class ApproveTransferInDto {
	@ApiProperty({ description: "Identity allowed to take the loan over" })
	@IsString()
	@IsNotEmpty()
	to!: string;
}
