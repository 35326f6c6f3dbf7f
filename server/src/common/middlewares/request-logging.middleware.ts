import { Injectable, Logger, type NestMiddleware } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";
import { nanoid } from "nanoid";

@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware {
	private readonly logger = new Logger("HTTP");

	use(req: Request, res: Response, next: NextFunction) {
		const started = process.hrtime.bigint();
		const requestId = req.header("x-request-id") ?? nanoid(12);
		res.setHeader("x-request-id", requestId);

		res.on("finish", () => {
			const ms = Number(process.hrtime.bigint() - started) / 1e6;
			this.logger.log(
				`${req.method} ${req.originalUrl} ${res.statusCode} ${ms.toFixed(1)}ms [${requestId}]`,
			);
		});
		next();
	}
}
