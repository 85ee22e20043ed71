import { z } from "zod";
import { ConfigError } from "../core/result.ts";
import { LOG_LEVELS } from "../logger.ts";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8080;
export const DEFAULT_MAX_RESPONSE_BYTES = 1024;
// Largest delay setTimeout honours; longer ones fire immediately
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const ClientConfigSchema = z.object({
	host: z.string().trim().min(1, "Host must not be empty"),
	port: z.number().int().min(1, "Port must be between 1 and 65535").max(65535, "Port must be between 1 and 65535"),
	// 0 disables the timeout
	timeoutMs: z
		.number()
		.int()
		.min(0, "Timeout must not be negative")
		.max(MAX_TIMEOUT_MS, `Timeout must not exceed ${MAX_TIMEOUT_MS}ms`),
	maxResponseBytes: z.number().int().min(1, "Max response bytes must be at least 1"),
	logLevel: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)),
});

export type ClientConfig = z.output<typeof ClientConfigSchema>;
export type RawClientConfig = z.input<typeof ClientConfigSchema>;

type Env = Record<string, string | undefined>;

const readNumber = (raw: string | undefined, fallback: number): number => {
	if (raw === undefined || raw.trim().length === 0) {
		return fallback;
	}
	// NaN is left for the schema to reject
	return Number(raw.trim());
};

/**
 * Defaults overlaid with COORDINATOR_* environment variables. Not validated.
 */
export const resolveEnvConfig = (env: Env = process.env): RawClientConfig => ({
	host: env.COORDINATOR_HOST?.trim() || DEFAULT_HOST,
	port: readNumber(env.COORDINATOR_PORT, DEFAULT_PORT),
	timeoutMs: readNumber(env.COORDINATOR_TIMEOUT_MS, 0),
	maxResponseBytes: readNumber(env.COORDINATOR_MAX_RESPONSE_BYTES, DEFAULT_MAX_RESPONSE_BYTES),
	logLevel: env.LOG_LEVEL?.trim() || "info",
});

export const ConfigValidator = {
	validate(config: unknown): { isValid: true; config: ClientConfig } | { isValid: false; errors: string[] } {
		const parsed = ClientConfigSchema.safeParse(config);
		if (parsed.success) {
			return { isValid: true, config: parsed.data };
		}
		return {
			isValid: false,
			errors: parsed.error.issues.map((issue) => {
				const path = issue.path.join(".");
				return path ? `${path}: ${issue.message}` : issue.message;
			}),
		};
	},
};

/**
 * Resolves the client configuration: explicit overrides win over the
 * environment, which wins over the defaults. Throws ConfigError listing
 * every invalid field.
 */
export const loadClientConfig = (
	overrides: Partial<RawClientConfig> = {},
	env: Env = process.env,
): ClientConfig => {
	const defined = Object.fromEntries(
		Object.entries(overrides).filter(([, value]) => value !== undefined),
	);
	const result = ConfigValidator.validate({ ...resolveEnvConfig(env), ...defined });
	if (!result.isValid) {
		throw new ConfigError(result.errors);
	}
	return result.config;
};
