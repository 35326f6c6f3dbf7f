import { Controller, Get } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ApiOkResponse, ApiOperation, ApiTags } from "@nestjs/swagger";
import { DataSource } from "typeorm";

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	constructor(
		private readonly configService: ConfigService,
		private readonly dataSource: DataSource,
	) {}

	@Get()
	@ApiOperation({ summary: "Liveness and database status" })
	@ApiOkResponse({
		schema: {
			type: "object",
			properties: {
				status: { type: "string", example: "ok" },
				database: { type: "string", example: "up" },
				collateralAsset: { type: "string", example: "gohm" },
				debtAsset: { type: "string", example: "dai" },
				uptime: { type: "number", example: 12345 },
				environment: { type: "string", example: "production" },
			},
		},
	})
	healthCheck() {
		return {
			status: "ok",
			database: this.dataSource.isInitialized ? "up" : "down",
			collateralAsset: this.configService.get<string>("COLLATERAL_ASSET"),
			debtAsset: this.configService.get<string>("DEBT_ASSET"),
			uptime: process.uptime(),
			environment: this.configService.get<string>("NODE_ENV", "development"),
		};
	}
}
