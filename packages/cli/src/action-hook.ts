import type { Stats } from "node:fs";
import { lstat, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CoordinatorTcpClient, type ConnectFn, type ExchangeResult } from "@coordinator-probe/client";
import {
    ConfigError,
    DEFAULT_HOST,
    DEFAULT_PORT,
    DomainError,
    ResultUtils,
    createLogger,
    toError,
    type Logger,
    type Result,
} from "@coordinator-probe/core";
import { buildHookEnvelope, type HookEnvelope } from "@coordinator-probe/protocol";

/** Set by CRIU when it runs this program as an action script. */
export const ACTION_ENV = "CRTOOLS_SCRIPT_ACTION";
export const IMAGE_DIR_ENV = "CRTOOLS_IMAGE_DIR";
export const HOOK_CONFIG_FILE = "criu-coordinator.json";
export const GLOBAL_CONFIG_DIR = "/etc/criu";
export const STREAMER_CAPTURE_SOCKET = "streamer-capture.sock";

// Every other action CRIU reports is acknowledged without contacting the coordinator.
const ForwardedActionSchema = z.enum(["pre-dump", "post-dump", "pre-restore"]);

const HookConfigSchema = z.object({
    id: z.string({ required_error: "ID missing in config file" }).min(1, "ID missing in config file"),
    dependencies: z.string().default(""),
    address: z.string().trim().min(1).default(DEFAULT_HOST),
    port: z
        .union([z.number(), z.string().trim().regex(/^\d+$/, "Port must be a number").transform(Number)])
        .default(DEFAULT_PORT),
});
export type HookConfig = z.output<typeof HookConfigSchema>;

export interface ActionHookOptions {
    env?: NodeJS.ProcessEnv;
    /** Searched when the image directory has no config file. */
    globalConfigDir?: string;
    logger?: Logger;
    connect?: ConnectFn;
}

export type ActionHookOutcome =
    | { status: "skipped"; action: string }
    | { status: "sent"; envelope: HookEnvelope; exchange: ExchangeResult };

const errnoOf = (error: unknown): string | undefined =>
    error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;

const isFile = async (file: string): Promise<boolean> => {
    try {
        return (await stat(file)).isFile();
    } catch (error) {
        if (errnoOf(error) === "ENOENT") return false;
        throw error;
    }
};

/**
 * Reads criu-coordinator.json from the image directory, falling back to
 * the shared one in `globalConfigDir`.
 */
export const loadHookConfig = async (imageDir: string, globalConfigDir: string = GLOBAL_CONFIG_DIR): Promise<HookConfig> => {
    const candidates = [path.join(imageDir, HOOK_CONFIG_FILE), path.join(globalConfigDir, HOOK_CONFIG_FILE)];
    let file: string | undefined;
    for (const candidate of candidates) {
        if (await isFile(candidate)) {
            file = candidate;
            break;
        }
    }
    if (file === undefined) {
        throw new ConfigError([`Could not find ${HOOK_CONFIG_FILE} in ${imageDir} or ${globalConfigDir}`]);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(file, "utf8"));
    } catch (error) {
        throw new ConfigError([`${file} is not valid JSON: ${toError(error).message}`]);
    }

    const parsed = HookConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) =>
                issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
            ),
        );
    }
    return parsed.data;
};

const checkCaptureSocket = async (imageDir: string): Promise<void> => {
    let entry: Stats;
    try {
        entry = await lstat(path.join(imageDir, STREAMER_CAPTURE_SOCKET));
    } catch (error) {
        if (errnoOf(error) === "ENOENT") return;
        throw error;
    }
    if (!entry.isSocket()) {
        throw new DomainError(`${STREAMER_CAPTURE_SOCKET} exists but is not a Unix socket`, "SOCKET_ERROR");
    }
};

const forwardAction = async (action: string, options: ActionHookOptions): Promise<ActionHookOutcome> => {
    const env = options.env ?? process.env;
    const logger = options.logger ?? createLogger("action-hook");

    const imageDir = env[IMAGE_DIR_ENV];
    if (imageDir === undefined || imageDir.length === 0) {
        throw new ConfigError([`${IMAGE_DIR_ENV} is not set`]);
    }
    const config = await loadHookConfig(imageDir, options.globalConfigDir);

    const forwarded = ForwardedActionSchema.safeParse(action);
    if (!forwarded.success) {
        logger.debug(`Nothing to do for action ${action}`, { clientId: config.id });
        return { status: "skipped", action };
    }
    if (forwarded.data === "pre-dump") {
        await checkCaptureSocket(imageDir);
    }

    const envelope = buildHookEnvelope(config.id, forwarded.data, config.dependencies.split(":"));
    const client = new CoordinatorTcpClient(
        { host: config.address, port: config.port },
        { logger, connect: options.connect },
    );
    const result = await client.send(envelope);
    if (!result.success) {
        throw result.error;
    }
    return { status: "sent", envelope, exchange: result.data };
};

/**
 * Handles one CRIU action-script invocation: loads the container's
 * coordinator config and forwards pre-dump, post-dump and pre-restore.
 */
export const runActionHook = (action: string, options: ActionHookOptions = {}): Promise<Result<ActionHookOutcome>> =>
    ResultUtils.wrap(forwardAction(action, options));
