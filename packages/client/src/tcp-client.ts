import { createConnection, type Socket } from "node:net";
import {
    ConnectionError,
    RequestTimeoutError,
    ResultUtils,
    createLogger,
    loadClientConfig,
    toError,
    type ClientConfig,
    type Logger,
    type RawClientConfig,
    type Result,
} from "@coordinator-probe/core";
import {
    classifyResponse,
    serializeEnvelope,
    type ClassifiedResponse,
    type RequestEnvelope,
} from "@coordinator-probe/protocol";

export type ConnectFn = (options: { host: string; port: number }, connectionListener?: () => void) => Socket;

export interface ExchangeResult {
    /** First bytes the peer sent, capped at maxResponseBytes. */
    raw: Buffer;
    response: ClassifiedResponse;
    bytesSent: number;
}

export interface CoordinatorTcpClientDeps {
    logger?: Logger;
    connect?: ConnectFn;
}

type Outcome = { raw: Buffer } | { error: Error };

/**
 * One-shot client for the checkpoint coordinator: connect, write the whole
 * payload once, read once, close. No retries, no framing.
 */
export class CoordinatorTcpClient {
    private readonly config: ClientConfig;
    private readonly logger: Logger;
    private readonly connect: ConnectFn;

    constructor(options: Partial<RawClientConfig> = {}, deps: CoordinatorTcpClientDeps = {}) {
        this.config = loadClientConfig(options);
        this.logger = deps.logger ?? createLogger("tcp-client", this.config.logLevel);
        this.connect = deps.connect ?? createConnection;
    }

    get address(): string {
        return `${this.config.host}:${String(this.config.port)}`;
    }

    getConfig(): ClientConfig {
        return { ...this.config };
    }

    async send(envelope: RequestEnvelope): Promise<Result<ExchangeResult>> {
        let payload: Buffer;
        try {
            payload = serializeEnvelope(envelope);
        } catch (error) {
            this.logger.error("Refusing to send invalid envelope", error, { clientId: envelope.id });
            return ResultUtils.err(toError(error));
        }
        return this.sendRaw(payload, envelope.id);
    }

    async sendRaw(payload: Uint8Array, clientId?: string): Promise<Result<ExchangeResult>> {
        const context = clientId === undefined ? {} : { clientId };
        this.logger.info(`Connecting to ${this.address}`, context);

        const stopTimer = this.logger.startTimer("exchange", context);
        const outcome = await ResultUtils.wrap(this.exchange(payload));
        stopTimer();

        if (!outcome.success) {
            this.logger.error(`Exchange with ${this.address} failed`, outcome.error, context);
            return outcome;
        }

        const response = classifyResponse(outcome.data);
        this.logger.info(`Server responded with: ${response.text}`, { ...context, kind: response.kind });
        return ResultUtils.ok({ raw: outcome.data, response, bytesSent: payload.byteLength });
    }

    private exchange(payload: Uint8Array): Promise<Buffer> {
        const { host, port, timeoutMs, maxResponseBytes } = this.config;
        const address = this.address;

        return new Promise((resolve, reject) => {
            let settled = false;
            let timer: NodeJS.Timeout | undefined;

            const socket = this.connect({ host, port }, () => {
                this.logger.debug(`Connected to ${address}`);
                socket.write(payload);
            });

            // Every path, success or failure, releases the socket here.
            const finish = (outcome: Outcome): void => {
                if (settled) return;
                settled = true;
                if (timer !== undefined) {
                    clearTimeout(timer);
                }
                socket.destroy();
                if ("error" in outcome) {
                    reject(outcome.error);
                } else {
                    resolve(outcome.raw);
                }
            };

            if (timeoutMs > 0) {
                timer = setTimeout(() => {
                    finish({ error: new RequestTimeoutError(timeoutMs, address) });
                }, timeoutMs);
            }

            socket.once("data", (chunk: Buffer) => {
                finish({ raw: Buffer.from(chunk.subarray(0, maxResponseBytes)) });
            });

            socket.on("error", (error: Error) => {
                finish({ error: ConnectionError.fromSocketError(error, address) });
            });

            // Peer closed without replying
            socket.once("end", () => {
                finish({ raw: Buffer.alloc(0) });
            });
            socket.once("close", () => {
                finish({ raw: Buffer.alloc(0) });
            });
        });
    }
}
