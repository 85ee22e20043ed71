export * from "./core/result.ts";
export * from "./config/config.ts";
export * from "./logger.ts";

import { ClientConfigSchema, resolveEnvConfig } from "./config/config.ts";
import { Logger, type LogLevel } from "./logger.ts";

/**
 * Component logger at the given level, or at LOG_LEVEL when it names a
 * valid level ("info" otherwise).
 */
export const createLogger = (component: string, level?: LogLevel): Logger => {
	if (level !== undefined) {
		return Logger.create("coordinator-probe", component, level);
	}
	const parsed = ClientConfigSchema.shape.logLevel.safeParse(resolveEnvConfig().logLevel);
	return Logger.create("coordinator-probe", component, parsed.success ? parsed.data : "info");
};
