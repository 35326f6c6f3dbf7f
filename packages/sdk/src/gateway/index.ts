/**
 * Gateway module - policy-checked loan activation
 */

export {
	RiskGateway,
	DEFAULT_BOUNDS,
	type GatewayBounds,
	type GatewayRoles,
	type RiskGatewayConfig,
} from "./risk-gateway.js";
