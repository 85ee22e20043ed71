import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { z } from "zod";
import { CoordinatorTcpClient } from "@coordinator-probe/client";
import { ValidationError, createLogger, toError, type RawClientConfig } from "@coordinator-probe/core";
import {
    HookActionSchema,
    SMOKE_ENVELOPE,
    buildAddDependenciesEnvelope,
    buildHookEnvelope,
    formatBytes,
    meshDependencies,
    parseDependenciesMap,
    type DependenciesMap,
    type RequestEnvelope,
} from "@coordinator-probe/protocol";
import { ACTION_ENV, runActionHook } from "./action-hook.ts";

const logger = createLogger("cli");

const GlobalOptionsSchema = z.object({
    host: z.string().optional(),
    port: z.number().optional(),
    timeout: z.number().optional(),
    maxBytes: z.number().optional(),
});

const AddDependenciesOptionsSchema = z.object({
    depsFile: z.string().optional(),
    components: z.string().optional(),
});

const HookOptionsSchema = z.object({
    id: z.string(),
    action: HookActionSchema,
    deps: z.string(),
});

const parseInteger = (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError("Not an integer.");
    }
    return parsed;
};

const toClientOptions = (command: Command): Partial<RawClientConfig> => {
    const globals = GlobalOptionsSchema.parse(command.optsWithGlobals());
    return {
        host: globals.host,
        port: globals.port,
        timeoutMs: globals.timeout,
        maxResponseBytes: globals.maxBytes,
    };
};

const readDependenciesFile = async (path: string): Promise<DependenciesMap> => {
    const contents = await readFile(path, "utf8");
    let parsed: unknown;
    try {
        parsed = JSON.parse(contents);
    } catch (error) {
        throw new ValidationError(`${path} is not valid JSON: ${toError(error).message}`, "depsFile");
    }
    return parseDependenciesMap(parsed);
};

/**
 * Sends one envelope and prints the raw reply. A failed exchange is thrown
 * so main() can turn it into a non-zero exit code.
 */
const sendAndPrint = async (envelope: RequestEnvelope, command: Command): Promise<void> => {
    const client = new CoordinatorTcpClient(toClientOptions(command));
    const result = await client.send(envelope);
    if (!result.success) {
        throw result.error;
    }
    console.log(`Received ${formatBytes(result.data.raw)}`);
};

export function createProgram(): Command {
    const program = new Command();

    program
        .name("coordinator-probe")
        .description("Send one request to a checkpoint coordinator and print its reply")
        .version("0.1.0")
        .option("--host <host>", "Coordinator address (default: 127.0.0.1)")
        .option("--port <port>", "Coordinator port (default: 8080)", parseInteger)
        .option("--timeout <ms>", "Give up after this many milliseconds (default: no timeout)", parseInteger)
        .option("--max-bytes <n>", "Largest reply to read (default: 1024)", parseInteger)
        .exitOverride()
        .configureOutput({
            writeOut: (text) => console.log(text.trimEnd()),
            writeErr: (text) => console.error(text.trimEnd()),
        });

    program
        .command("add-dependencies", { isDefault: true })
        .description("Register a dependencies map (the c1/c2/c3 mesh unless told otherwise)")
        .option("--deps-file <path>", "JSON file mapping each component to its dependencies")
        .option("--components <list>", "Comma-separated components to link with each other")
        .action(async (_options: unknown, command: Command) => {
            const options = AddDependenciesOptionsSchema.parse(command.opts());
            if (options.depsFile !== undefined && options.components !== undefined) {
                throw new ValidationError("Use either --deps-file or --components, not both");
            }

            let envelope: RequestEnvelope = SMOKE_ENVELOPE;
            if (options.depsFile !== undefined) {
                envelope = buildAddDependenciesEnvelope(await readDependenciesFile(options.depsFile));
            } else if (options.components !== undefined) {
                envelope = buildAddDependenciesEnvelope(meshDependencies(options.components.split(",")));
            }
            await sendAndPrint(envelope, command);
        });

    program
        .command("hook")
        .description("Send a checkpoint/restore hook action for one container")
        .requiredOption("--id <id>", "Client ID")
        .requiredOption("--action <action>", `One of: ${HookActionSchema.options.join(", ")}`)
        .option("--deps <list>", "Colon-separated dependency IDs", "")
        .action(async (_options: unknown, command: Command) => {
            const parsed = HookOptionsSchema.safeParse(command.opts());
            if (!parsed.success) {
                throw new ValidationError(`Unknown action. Expected one of: ${HookActionSchema.options.join(", ")}`, "action");
            }
            const { id, action, deps } = parsed.data;
            await sendAndPrint(buildHookEnvelope(id, action, deps.split(":")), command);
        });

    return program;
}

/**
 * Entry point. Under CRIU (CRTOOLS_SCRIPT_ACTION set) the arguments are
 * ignored and the action hook runs instead of the command line.
 */
export async function main(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Promise<void> {
    const action = env[ACTION_ENV];
    if (action !== undefined) {
        const outcome = await runActionHook(action, { env });
        if (!outcome.success) {
            logger.error(`Action hook ${action} failed`, outcome.error);
            console.error(`Error: ${outcome.error.message}`);
            process.exitCode = 1;
        }
        return;
    }

    const program = createProgram();
    try {
        await program.parseAsync(argv, { from: "user" });
    } catch (error) {
        if (error instanceof CommanderError) {
            // commander already printed help, version or the usage error
            if (error.exitCode !== 0) {
                process.exitCode = error.exitCode;
            }
            return;
        }
        const failure = toError(error);
        logger.error("Command failed", failure);
        console.error(`Error: ${failure.message}`);
        process.exitCode = 1;
    }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    main().catch((error) => {
        console.error("CLI error:", error);
        process.exit(1);
    });
}
