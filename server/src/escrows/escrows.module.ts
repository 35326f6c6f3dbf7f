import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { AuthModule } from "../auth/auth.module";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { EscrowRecord } from "./escrow.entity";
import { EscrowsController } from "./escrows.controller";
import { EscrowsService } from "./escrows.service";
import { LoanRecord } from "./loan.entity";
import { LoanRequestRecord } from "./loan-request.entity";

@Module({
	imports: [
		TypeOrmModule.forFeature([EscrowRecord, LoanRequestRecord, LoanRecord]),
		AuthModule,
	],
	providers: [EscrowsService, ServerSentEventsService],
	controllers: [EscrowsController],
	exports: [EscrowsService],
})
export class EscrowsModule {}
