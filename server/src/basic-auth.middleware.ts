import { Injectable, type NestMiddleware } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { NextFunction, Request, Response } from "express";
import { timingSafeEqual as equalBuffers } from "node:crypto";

@Injectable()
export class BasicAuthMiddleware implements NestMiddleware {
	constructor(private readonly config: ConfigService) {}

	use(req: Request, res: Response, next: NextFunction) {
		const header = req.header("authorization");
		if (!header || !header.startsWith("Basic ")) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Restricted"');
			return res.status(401).send("Authentication required");
		}

		const decoded = Buffer.from(
			header.slice("Basic ".length).trim(),
			"base64",
		).toString("utf8");

		const sep = decoded.indexOf(":");
		const username = sep >= 0 ? decoded.slice(0, sep) : "";
		const password = sep >= 0 ? decoded.slice(sep + 1) : "";

		const expectedUser = this.config.getOrThrow<string>("ADMIN_BASIC_USER");
		const expectedPass = this.config.getOrThrow<string>("ADMIN_BASIC_PASS");

		const ok =
			timingSafeEqual(username, expectedUser) &&
			timingSafeEqual(password, expectedPass);
		if (!ok) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Restricted"');
			return res.status(401).send("Unauthorized");
		}

		return next();
	}
}

function timingSafeEqual(a: string, b: string): boolean {
	const ab = Buffer.from(a);
	const bb = Buffer.from(b);
	if (ab.length !== bb.length) {
		// compare anyway so a length mismatch costs the same
		equalBuffers(ab, ab);
		return false;
	}
	return equalBuffers(ab, bb);
}
