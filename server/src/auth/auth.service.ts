import {
	BadRequestException,
	Injectable,
	InternalServerErrorException,
	UnauthorizedException,
	Logger,
} from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { InjectRepository } from "@nestjs/typeorm";
import { schnorr } from "@noble/secp256k1";
import type { Repository } from "typeorm";
import {
	createSignupChallenge,
	hashSignupPayload,
	isChallengePayload,
} from "../crypto/challenge";
import { toError } from "../common/errors";
import { User } from "../users/user.entity";

const CHALLENGE_TTL_MS = 5 * 60 * 1000; // 5 minutes

@Injectable()
export class AuthService {
	private readonly logger = new Logger(AuthService.name);

	constructor(
		@InjectRepository(User) private readonly users: Repository<User>,
		private readonly jwt: JwtService,
	) {}

	async createSignupChallenge(publicKeyRaw: string, origin: string) {
		const publicKey = publicKeyRaw.toLowerCase();
		const now = new Date();

		let user = await this.users.findOne({ where: { publicKey } });
		if (!user) {
			user = this.users.create({ publicKey });
		}

		const { id, payload, hashHex } = createSignupChallenge(origin, now);
		const expiresAt = new Date(now.getTime() + CHALLENGE_TTL_MS);
		user.pendingChallenge = JSON.stringify(payload);
		user.challengeId = id;
		user.challengeExpiresAt = expiresAt;

		try {
			await this.users.save(user);
		} catch (e) {
			this.logger.error("Failed to save user", toError(e).stack);
			throw new InternalServerErrorException("Failed to save user");
		}
		return {
			challenge: payload,
			challengeId: id,
			hashToSignHex: hashHex,
			expiresAt: expiresAt.toISOString(),
		};
	}

	async verifySignup(
		publicKeyRaw: string,
		signatureHex: string,
		challengeId: string,
		origin: string,
	) {
		const publicKey = publicKeyRaw.toLowerCase();
		const user = await this.users.findOne({ where: { publicKey } });
		if (!user || !user.pendingChallenge || !user.challengeId) {
			throw new UnauthorizedException("No pending challenge");
		}
		if (user.challengeId !== challengeId) {
			throw new UnauthorizedException("Challenge mismatch");
		}
		if (!user.challengeExpiresAt || user.challengeExpiresAt < new Date()) {
			throw new UnauthorizedException("Challenge expired");
		}

		let payload: unknown;
		try {
			payload = JSON.parse(user.pendingChallenge);
		} catch (cause) {
			throw new InternalServerErrorException("Corrupted challenge", { cause });
		}
		if (
			!isChallengePayload(payload) ||
			payload.origin !== origin ||
			payload.scope !== "signup"
		) {
			throw new UnauthorizedException("Invalid challenge scope or origin");
		}

		const hashHex = hashSignupPayload(payload);
		let ok = false;
		try {
			ok = await schnorr.verify(signatureHex, hashHex, publicKey);
		} catch (cause) {
			throw new BadRequestException("Invalid signature input", { cause });
		}
		if (!ok) {
			throw new UnauthorizedException("Invalid signature");
		}

		user.pendingChallenge = null;
		user.challengeId = null;
		user.challengeExpiresAt = null;
		user.lastLoginAt = new Date();

		this.logger.debug(`User logged in ${publicKey}`);
		try {
			await this.users.save(user);
		} catch (e) {
			this.logger.error("Failed to save user", toError(e).stack);
			throw new InternalServerErrorException("Failed to save user");
		}

		const accessToken = await this.jwt.signAsync({
			sub: user.id,
		});
		return {
			accessToken,
			userId: user.id,
			publicKey: user.publicKey,
		};
	}

	/**
	 * Resolve the user a bearer token was issued to.
	 */
	async getSession(token: string): Promise<User> {
		let sub: unknown;
		try {
			const decoded = await this.jwt.verifyAsync<{ sub: string }>(token);
			sub = decoded.sub;
		} catch (e) {
			this.logger.debug(`Invalid token: ${toError(e).message}`);
			throw new UnauthorizedException("Invalid token");
		}
		if (typeof sub !== "string") {
			throw new UnauthorizedException("Invalid token");
		}
		const user = await this.users.findOne({ where: { id: sub } });
		if (!user) {
			throw new UnauthorizedException("Session not found");
		}
		return user;
	}
}
