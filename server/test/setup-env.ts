import "reflect-metadata";
import { OPERATOR_KEY, OVERSEER_KEY, publicKeyOf } from "./keys";

process.env.NODE_ENV = "test";
process.env.JWT_SECRET = "test-secret";
process.env.ADMIN_BASIC_USER = "admin";
process.env.ADMIN_BASIC_PASS = "test-password";
process.env.AUTH_CHALLENGE_ORIGIN = "https://api.local";
process.env.COLLATERAL_ASSET = "gohm";
process.env.DEBT_ASSET = "dai";
process.env.GATEWAY_ID = "gateway";
process.env.TREASURY_ID = "treasury";
process.env.GATEWAY_OPERATOR = publicKeyOf(OPERATOR_KEY);
process.env.GATEWAY_OVERSEER = publicKeyOf(OVERSEER_KEY);
