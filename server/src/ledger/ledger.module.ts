import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { AuthModule } from "../auth/auth.module";
import { Allowance } from "./allowance.entity";
import { Balance } from "./balance.entity";
import { LedgerAdminController, LedgerController } from "./ledger.controller";
import { LedgerService } from "./ledger.service";

@Module({
	imports: [TypeOrmModule.forFeature([Balance, Allowance]), AuthModule],
	providers: [LedgerService],
	controllers: [LedgerController, LedgerAdminController],
	exports: [LedgerService],
})
export class LedgerModule {}
