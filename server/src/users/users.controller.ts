import { Controller, Get, UseGuards } from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { AuthGuard } from "../auth/auth.guard";
import { UserFromJwt } from "../auth/user.decorator";
import { type ApiEnvelope, envelope } from "../common/dto/envelopes";
import { User } from "./user.entity";

@ApiTags("Users")
@Controller("api/v1/users")
export class UsersController {
	@Get("me")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOkResponse({
		schema: {
			type: "object",
			properties: {
				data: {
					type: "object",
					properties: {
						userId: { type: "string" },
						publicKey: { type: "string" },
					},
				},
			},
		},
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiOperation({ summary: "The authenticated user" })
	me(
		@UserFromJwt() user: User,
	): ApiEnvelope<{ userId: string; publicKey: string }> {
		return envelope({ userId: user.id, publicKey: user.publicKey });
	}
}
