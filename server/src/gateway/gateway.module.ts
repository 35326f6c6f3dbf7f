import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { AuthModule } from "../auth/auth.module";
import { GatewayController } from "./gateway.controller";
import { GatewayRoleRecord } from "./gateway-role.entity";
import { GatewayService } from "./gateway.service";

@Module({
	imports: [TypeOrmModule.forFeature([GatewayRoleRecord]), AuthModule],
	providers: [GatewayService],
	controllers: [GatewayController],
	exports: [GatewayService],
})
export class GatewayModule {}
