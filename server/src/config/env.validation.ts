import { plainToInstance } from "class-transformer";
import {
	IsEnum,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Matches,
	Max,
	Min,
	validateSync,
} from "class-validator";

export enum Environment {
	Development = "development",
	Production = "production",
	Test = "test",
}

const HEX_PUBKEY = /^[0-9a-f]{64}$/i;
const UNITS = /^\d+$/;

export class EnvironmentVariables {
	@IsEnum(Environment)
	NODE_ENV: Environment = Environment.Development;

	@IsInt()
	@Min(0)
	@Max(65535)
	PORT: number = 3000;

	@IsString()
	SQLITE_DB_PATH = "pairloan.sqlite";

	@IsString()
	@IsNotEmpty()
	JWT_SECRET!: string;

	@IsOptional()
	@IsString()
	AUTH_CHALLENGE_ORIGIN?: string;

	@IsString()
	@IsNotEmpty()
	COLLATERAL_ASSET = "gohm";

	@IsString()
	@IsNotEmpty()
	DEBT_ASSET = "dai";

	@IsString()
	@IsNotEmpty()
	GATEWAY_ID = "gateway";

	@Matches(HEX_PUBKEY, { message: "GATEWAY_OPERATOR must be an x-only public key" })
	GATEWAY_OPERATOR!: string;

	@Matches(HEX_PUBKEY, { message: "GATEWAY_OVERSEER must be an x-only public key" })
	GATEWAY_OVERSEER!: string;

	@Matches(UNITS)
	GATEWAY_MINIMUM_INTEREST = "20000000000000000";

	@Matches(UNITS)
	GATEWAY_MAX_LOAN_TO_COLLATERAL = "2500000000000000000000";

	@IsInt()
	@Min(0)
	GATEWAY_MAX_DURATION: number = 365 * 24 * 60 * 60;

	@IsString()
	@IsNotEmpty()
	TREASURY_ID = "treasury";

	@IsString()
	@IsNotEmpty()
	ADMIN_BASIC_USER!: string;

	@IsString()
	@IsNotEmpty()
	ADMIN_BASIC_PASS!: string;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
	const validated = plainToInstance(EnvironmentVariables, config, {
		enableImplicitConversion: true,
	});
	const errors = validateSync(validated, { skipMissingProperties: false });
	if (errors.length > 0) {
		throw new Error(
			`Invalid environment: ${errors
				.map((e) => Object.values(e.constraints ?? {}).join(", "))
				.join("; ")}`,
		);
	}
	return validated;
}
