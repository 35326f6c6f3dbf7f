import { IsString, Length, Matches } from "class-validator";
import { ApiProperty } from "@nestjs/swagger";
const HEX = /^[0-9a-f]+$/i;

export class VerifySignupDto {
	@ApiProperty({ type: "string", description: "x-only public key, hex" })
	@IsString()
	@Matches(HEX, { message: "publicKey must be hex" })
	@Length(64, 64, { message: "publicKey must be 64 (x-only) hex chars" })
	publicKey!: string;

	@ApiProperty({
		type: "string",
		description: "Schnorr signature over hashToSignHex, hex",
	})
	@IsString()
	@Matches(HEX, { message: "signature must be hex" })
	@Length(128, 128, { message: "signature must be 128 hex chars" })
	signature!: string;

	@ApiProperty({ type: "string", description: "Challenge id from /challenge" })
	@IsString()
	challengeId!: string;
}
