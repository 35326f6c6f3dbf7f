import {
	type ArgumentsHost,
	Catch,
	type ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import {
	type EscrowErrorCode,
	isEscrowError,
	isLedgerError,
	isStorageError,
} from "@pairloan/sdk";
import { toError } from "../errors";

const ESCROW_ERROR_STATUS: Record<EscrowErrorCode, HttpStatus> = {
	UNAUTHORIZED: HttpStatus.FORBIDDEN,
	INVALID_STATE: HttpStatus.CONFLICT,
	DEFAULT: HttpStatus.UNPROCESSABLE_ENTITY,
	NO_DEFAULT: HttpStatus.UNPROCESSABLE_ENTITY,
	NOT_ROLLABLE: HttpStatus.UNPROCESSABLE_ENTITY,
	POLICY_VIOLATION: HttpStatus.BAD_REQUEST,
};

export type ErrorBody = {
	statusCode: number;
	error: string;
	message: string | string[];
	reason?: string;
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const res = host.switchToHttp().getResponse<Response>();
		const body = this.toBody(exception);
		res.status(body.statusCode).json(body);
	}

	toBody(exception: unknown): ErrorBody {
		if (exception instanceof HttpException) {
			const response = exception.getResponse();
			const message =
				typeof response === "object" && "message" in response
					? toMessage(response.message, exception.message)
					: exception.message;
			return {
				statusCode: exception.getStatus(),
				error: exception.name,
				message,
			};
		}
		if (isEscrowError(exception)) {
			return {
				statusCode: ESCROW_ERROR_STATUS[exception.code],
				error: exception.code,
				message: exception.message,
				...(exception.reason ? { reason: exception.reason } : {}),
			};
		}
		if (isLedgerError(exception)) {
			return {
				statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
				error: exception.code,
				message: exception.message,
			};
		}

		const error = toError(exception);
		if (isStorageError(error)) {
			this.logger.error(`Storage failure: ${error.message}`, error.stack);
		} else {
			this.logger.error(`Unhandled error: ${error.message}`, error.stack);
		}
		return {
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			error: "INTERNAL_SERVER_ERROR",
			message: "Internal server error",
		};
	}
}

function toMessage(value: unknown, fallback: string): string | string[] {
	if (typeof value === "string") return value;
	if (Array.isArray(value) && value.every((v) => typeof v === "string")) {
		return value;
	}
	return fallback;
}
