import { Global, Module } from "@nestjs/common";
import { CLOCK, systemClock } from "./clock";
import { UnitOfWork } from "./unit-of-work";

@Global()
@Module({
	providers: [{ provide: CLOCK, useValue: systemClock }, UnitOfWork],
	exports: [CLOCK, UnitOfWork],
})
export class CommonModule {}
