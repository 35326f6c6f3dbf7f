import {
	type MiddlewareConsumer,
	Module,
	type NestModule,
	RequestMethod,
} from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { EventEmitterModule } from "@nestjs/event-emitter";
import { TypeOrmModule } from "@nestjs/typeorm";

import { AuthModule } from "./auth/auth.module";
import { BasicAuthMiddleware } from "./basic-auth.middleware";
import { CommonModule } from "./common/common.module";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { Environment, validate } from "./config/env.validation";
import { EscrowsModule } from "./escrows/escrows.module";
import { GatewayModule } from "./gateway/gateway.module";
import { HealthModule } from "./health.module";
import { LedgerAdminController } from "./ledger/ledger.controller";
import { LedgerModule } from "./ledger/ledger.module";
import { UsersModule } from "./users/users.module";

@Module({
	imports: [
		ConfigModule.forRoot({ isGlobal: true, validate }),
		EventEmitterModule.forRoot({ wildcard: true, delimiter: "." }),
		TypeOrmModule.forRootAsync({
			inject: [ConfigService],
			useFactory: (config: ConfigService) => ({
				type: "better-sqlite3",
				database:
					config.get<Environment>("NODE_ENV") === Environment.Test
						? ":memory:"
						: config.getOrThrow<string>("SQLITE_DB_PATH"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		CommonModule,
		AuthModule,
		UsersModule,
		LedgerModule,
		EscrowsModule,
		GatewayModule,
		HealthModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer.apply(BasicAuthMiddleware).forRoutes(LedgerAdminController);

		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
