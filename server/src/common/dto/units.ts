import { applyDecorators } from "@nestjs/common";
import { ApiProperty } from "@nestjs/swagger";
import { IsString, Matches } from "class-validator";

/**
 * A non-negative integer amount of base units, as a decimal string.
 */
export function IsUnits(description: string, example = "1000000000000000000") {
	return applyDecorators(
		ApiProperty({ type: "string", description, example }),
		IsString(),
		Matches(/^\d+$/, {
			message: "$property must be a decimal string of base units",
		}),
	);
}
