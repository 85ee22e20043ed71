/**
 * Lightweight Result used by every public async API.
 * `data` is present on success and `error` on failure.
 */
export type Result<T, E = Error> =
	| { success: true; data: T; error?: undefined }
	| { success: false; data?: undefined; error: E };

export const ResultUtils = {
	ok<T>(data: T): Result<T, never> {
		return { success: true, data };
	},

	err<E = Error>(error: E): Result<never, E> {
		return { success: false, error };
	},

	async wrap<T>(promise: Promise<T>): Promise<Result<T>> {
		try {
			const data = await promise;
			return ResultUtils.ok(data);
		} catch (error) {
			return ResultUtils.err(toError(error));
		}
	},
};

export const toError = (value: unknown): Error =>
	value instanceof Error ? value : new Error(String(value));

/**
 * Domain-specific errors
 */
export class DomainError extends Error {
	public readonly code: string;
	public readonly details?: Record<string, unknown> | undefined;

	constructor(message: string, code: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "DomainError";
		this.code = code;
		this.details = details;
	}
}

export class ValidationError extends DomainError {
	constructor(message: string, field?: string) {
		super(message, "VALIDATION_ERROR", field === undefined ? undefined : { field });
		this.name = "ValidationError";
	}
}

export class ConfigError extends DomainError {
	public readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid configuration: ${issues.join("; ")}`, "CONFIG_ERROR", { issues });
		this.name = "ConfigError";
		this.issues = issues;
	}
}

/**
 * Socket-level failure. `code` carries the errno name reported by Node
 * (ECONNREFUSED, ECONNRESET, ...) when there is one.
 */
export class ConnectionError extends DomainError {
	constructor(message: string, code: string, details?: Record<string, unknown>, cause?: unknown) {
		super(message, code, details, { cause });
		this.name = "ConnectionError";
	}

	static fromSocketError(error: Error, address: string): ConnectionError {
		const errno = "code" in error && typeof error.code === "string" ? error.code : "CONNECTION_ERROR";
		return new ConnectionError(`Connection error: ${error.message}`, errno, { address }, error);
	}
}

export class RequestTimeoutError extends DomainError {
	constructor(timeoutMs: number, address: string) {
		super(`Request timeout after ${timeoutMs}ms`, "REQUEST_TIMEOUT", { timeoutMs, address });
		this.name = "RequestTimeoutError";
	}
}
