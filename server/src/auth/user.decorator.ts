import {
	createParamDecorator,
	type ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { User } from "../users/user.entity";
import type { AuthenticatedRequest } from "./auth.guard";

/**
 * The user AuthGuard resolved for this request.
 */
export const UserFromJwt = createParamDecorator(
	(_: unknown, context: ExecutionContext): User => {
		const { user } = context
			.switchToHttp()
			.getRequest<AuthenticatedRequest>();
		if (!user) {
			throw new UnauthorizedException("Missing user");
		}
		return user;
	},
);
