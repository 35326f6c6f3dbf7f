import { ApiPropertyOptional } from "@nestjs/swagger";
import { IsNotEmpty, IsOptional, IsString } from "class-validator";

export class GenerateEscrowInDto {
	@ApiPropertyOptional({
		description: "Collateral asset; defaults to the configured one",
		example: "gohm",
	})
	@IsOptional()
	@IsString()
	@IsNotEmpty()
	collateralAsset?: string;

	@ApiPropertyOptional({
		description: "Debt asset; defaults to the configured one",
		example: "dai",
	})
	@IsOptional()
	@IsString()
	@IsNotEmpty()
	debtAsset?: string;
}
