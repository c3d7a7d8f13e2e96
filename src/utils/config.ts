import type { ConfigService } from "@nestjs/config";
import {
	GATEWAY_ENV_KEYS,
	type GatewayConfig,
	GatewayConfigSchema,
} from "../schemas/config.schemas.js";

/**
 * Read SQLGATE_* settings from the ConfigService and validate them with Zod
 * (fail-fast on invalid config).
 */
export function readGatewayConfig(configService: ConfigService): GatewayConfig {
	const raw: Record<string, unknown> = {};
	for (const [field, envKey] of Object.entries(GATEWAY_ENV_KEYS)) {
		const value = configService.get<unknown>(envKey);
		if (value !== undefined && value !== "") {
			raw[field] = value;
		}
	}
	return GatewayConfigSchema.parse(raw);
}
