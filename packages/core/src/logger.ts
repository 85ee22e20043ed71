// Structured console logger
export interface LogEntry {
	timestamp: string;
	level: LogLevel;
	message: string;
	service: string;
	component?: string;
	error?: {
		name: string;
		message: string;
		stack?: string;
		code?: string;
	};
	metadata?: Record<string, unknown>;
	duration?: number;
	correlationId?: string;
	clientId?: string;
}

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export class Logger {
	private level: LogLevel = "info";
	private service: string;
	private component?: string;

	constructor(level: LogLevel = "info", service: string = "coordinator-probe", component?: string) {
		this.level = level;
		this.service = service;
		if (component !== undefined) {
			this.component = component;
		}
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
	}

	private createLogEntry(
		level: LogLevel,
		message: string,
		metadata?: Record<string, unknown>,
	): LogEntry {
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			message,
			service: this.service,
		};

		if (this.component !== undefined) {
			entry.component = this.component;
		}

		if (metadata) {
			const { duration, correlationId, clientId, ...rest } = metadata;
			if (typeof duration === "number") entry.duration = duration;
			if (typeof correlationId === "string") entry.correlationId = correlationId;
			if (typeof clientId === "string") entry.clientId = clientId;
			if (Object.keys(rest).length > 0) {
				entry.metadata = rest;
			}
		}

		return entry;
	}

	formatLogEntry(entry: LogEntry): string {
		const baseFields = [
			entry.timestamp,
			entry.level.toUpperCase(),
			entry.service,
			entry.component || "unknown",
		]
			.filter(Boolean)
			.join(" | ");

		let message = `[${baseFields}] ${entry.message}`;

		const contextFields: string[] = [];
		if (entry.clientId) contextFields.push(`client=${entry.clientId}`);
		if (entry.correlationId) contextFields.push(`corr=${entry.correlationId}`);
		if (entry.duration !== undefined) contextFields.push(`duration=${entry.duration}ms`);

		if (contextFields.length > 0) {
			message += ` [${contextFields.join(", ")}]`;
		}

		if (entry.error || entry.metadata) {
			const structured = {
				...(entry.error && { error: entry.error }),
				...(entry.metadata && { meta: entry.metadata }),
			};
			message += ` ${JSON.stringify(structured)}`;
		}

		return message;
	}

	private log(level: LogLevel, message: string, metadata?: Record<string, unknown>, error?: LogEntry["error"]): void {
		if (!this.shouldLog(level)) return;

		const entry = this.createLogEntry(level, message, metadata);
		if (error) {
			entry.error = error;
		}
		const formattedMessage = this.formatLogEntry(entry);

		switch (level) {
			case "debug":
				console.debug(formattedMessage);
				break;
			case "info":
				console.info(formattedMessage);
				break;
			case "warn":
				console.warn(formattedMessage);
				break;
			case "error":
				console.error(formattedMessage);
				break;
		}
	}

	debug(message: string, metadata?: Record<string, unknown>): void {
		this.log("debug", message, metadata);
	}

	info(message: string, metadata?: Record<string, unknown>): void {
		this.log("info", message, metadata);
	}

	warn(message: string, metadata?: Record<string, unknown>): void {
		this.log("warn", message, metadata);
	}

	error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
		let errorData: LogEntry["error"];

		if (error instanceof Error) {
			const code = "code" in error ? error.code : undefined;
			errorData = {
				name: error.name,
				message: error.message,
				...(error.stack !== undefined && { stack: error.stack }),
				...((typeof code === "string" || typeof code === "number") && { code: String(code) }),
			};
		} else if (error !== undefined) {
			errorData = { name: "Error", message: String(error) };
		}

		this.log("error", message, metadata, errorData);
	}

	// Performance logging
	startTimer(operation: string, metadata?: Record<string, unknown>): () => void {
		const startTime = Date.now();
		const correlationId = this.generateCorrelationId();

		this.debug(`Starting operation: ${operation}`, {
			...metadata,
			correlationId,
		});

		return () => {
			const duration = Date.now() - startTime;
			this.debug(`Completed operation: ${operation}`, {
				...metadata,
				correlationId,
				duration,
			});
		};
	}

	private generateCorrelationId(): string {
		return Math.random().toString(36).substring(2, 15);
	}

	static create(service: string, component?: string, level: LogLevel = "info"): Logger {
		return new Logger(level, service, component);
	}
}

export const logger = Logger.create("coordinator-probe");
