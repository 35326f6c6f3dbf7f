import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsString } from "class-validator";
import { IsUnits } from "../../common/dto/units";

export class ApproveInDto {
	@ApiProperty({
		description: "Identity allowed to move the caller's funds, e.g. an escrow id",
	})
	@IsString()
	@IsNotEmpty()
	spender!: string;

	@IsUnits("Allowance; replaces the previous one")
	amount!: string;
}

export class MintInDto {
	@ApiProperty({ description: "Identity to credit" })
	@IsString()
	@IsNotEmpty()
	holder!: string;

	@IsUnits("Amount to credit")
	amount!: string;
}

export class BalanceOutDto {
	@ApiProperty({ example: "dai" })
	asset!: string;

	@ApiProperty()
	holder!: string;

	@ApiProperty({ example: "2500000000000000000000" })
	balance!: string;
}

export class AllowanceOutDto {
	@ApiProperty({ example: "dai" })
	asset!: string;

	@ApiProperty()
	owner!: string;

	@ApiProperty()
	spender!: string;

	@ApiProperty({ example: "2500000000000000000000" })
	allowance!: string;
}
