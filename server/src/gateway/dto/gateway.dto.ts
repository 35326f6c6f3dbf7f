import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsNotEmpty, IsString } from "class-validator";
import { IsUnits } from "../../common/dto/units";

export class FundInDto {
	@IsUnits("Debt asset to draw from the treasury")
	amount!: string;
}

export class DefundInDto {
	@ApiProperty({ example: "dai" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@IsUnits("Amount to return to the treasury")
	amount!: string;
}

export class ProposeRoleInDto {
	@ApiProperty({ description: "Public key of the proposed holder" })
	@IsString()
	@IsNotEmpty()
	next!: string;
}

export class GatewayBoundsDto {
	@ApiProperty({ example: "20000000000000000" })
	minimumInterest!: string;

	@ApiProperty({ example: "2500000000000000000000" })
	maxLoanToCollateral!: string;

	@ApiProperty({ example: 31536000 })
	maxDuration!: number;
}

export class GatewayInfoDto {
	@ApiProperty({ description: "The gateway's ledger identity" })
	identity!: string;

	@ApiProperty({ example: "gohm" })
	collateralAsset!: string;

	@ApiProperty({ example: "dai" })
	debtAsset!: string;

	@ApiProperty()
	operator!: string;

	@ApiProperty()
	overseer!: string;

	@ApiPropertyOptional()
	pendingOperator?: string;

	@ApiPropertyOptional()
	pendingOverseer?: string;

	@ApiProperty({ type: GatewayBoundsDto })
	bounds!: GatewayBoundsDto;

	@ApiProperty({ description: "Debt asset the gateway can lend" })
	available!: string;
}
