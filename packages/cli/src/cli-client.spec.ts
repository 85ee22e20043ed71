import { describe, it, beforeEach, afterEach, mock } from "node:test";
import assert from "node:assert";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { createProgram, main } from "./cli-client.ts";
import {
    getAvailablePort,
    startCoordinatorStandIn,
    type CoordinatorStandIn,
} from "../../../test-utils/coordinator-stand-in.ts";

type CallRecorder = { mock: { readonly calls: ReadonlyArray<{ arguments: readonly unknown[] }> } };

const linesOf = (fn: CallRecorder): string[] =>
    fn.mock.calls.map((call) => String(call.arguments[0]));

describe("coordinator-probe CLI", () => {
    let standIn: CoordinatorStandIn | undefined;
    let log: CallRecorder;
    let error: CallRecorder;

    beforeEach(() => {
        log = mock.method(console, "log", () => {});
        error = mock.method(console, "error", () => {});
        mock.method(console, "info", () => {});
        mock.method(console, "debug", () => {});
    });

    afterEach(async () => {
        mock.restoreAll();
        process.exitCode = undefined;
        await standIn?.stop();
        standIn = undefined;
    });

    const receivedJson = (): unknown => JSON.parse(standIn?.connections[0]?.payload.toString("utf8") ?? "null");

    it("should expose the add-dependencies and hook commands", () => {
        const program = createProgram();

        assert.strictEqual(program.name(), "coordinator-probe");
        assert.deepStrictEqual(program.commands.map((command) => command.name()), ["add-dependencies", "hook"]);
    });

    it("should send the kubescr mesh by default and print the reply", async () => {
        standIn = await startCoordinatorStandIn({ kind: "reply", message: "ACK" });

        await main(["--port", String(standIn.port)]);

        assert.strictEqual(process.exitCode, undefined);
        assert.deepStrictEqual(linesOf(log), ["Received b'ACK'"]);
        assert.deepStrictEqual(receivedJson(), {
            id: "kubescr",
            action: "add_dependencies",
            dependencies: { c1: ["c2", "c3"], c2: ["c1", "c3"], c3: ["c1", "c2"] },
        });
    });

    it("should build a mesh from --components", async () => {
        standIn = await startCoordinatorStandIn({ kind: "reply", message: "ACK" });

        await main(["add-dependencies", "--components", "api,db", "--port", String(standIn.port)]);

        assert.deepStrictEqual(receivedJson(), {
            id: "kubescr",
            action: "add_dependencies",
            dependencies: { api: ["db"], db: ["api"] },
        });
    });

    it("should no longer accept --id for add-dependencies", async () => {
        await main(["add-dependencies", "--id", "operator"]);

        assert.strictEqual(process.exitCode, 1);
        assert.ok(linesOf(error).some((line) => line.startsWith("error: unknown option '--id'")));
        assert.deepStrictEqual(linesOf(log), []);
    });

    it("should print replies that are not UTF-8 without losing bytes", async () => {
        standIn = await startCoordinatorStandIn({ kind: "reply", message: Buffer.from([0xff, 0xfe, 0x41]) });

        await main(["--port", String(standIn.port)]);

        assert.strictEqual(process.exitCode, undefined);
        assert.deepStrictEqual(linesOf(log), ["Received b'\\xff\\xfeA'"]);
    });

    it("should send the map from --deps-file", async () => {
        standIn = await startCoordinatorStandIn({ kind: "reply", message: "ACK" });
        const dir = await mkdtemp(path.join(tmpdir(), "coordinator-probe-"));
        const file = path.join(dir, "deps.json");
        await writeFile(file, JSON.stringify({ web: ["db"], db: [] }));

        try {
            await main(["add-dependencies", "--deps-file", file, "--port", String(standIn.port)]);
        } finally {
            await rm(dir, { recursive: true, force: true });
        }

        assert.deepStrictEqual(receivedJson(), {
            id: "kubescr",
            action: "add_dependencies",
            dependencies: { web: ["db"], db: [] },
        });
    });

    it("should send hook actions with colon-separated dependencies", async () => {
        standIn = await startCoordinatorStandIn({ kind: "reply", message: "timeout" });

        await main(["hook", "--id", "web", "--action", "pre-dump", "--deps", "db:cache", "--port", String(standIn.port)]);

        assert.deepStrictEqual(receivedJson(), { id: "web", action: "pre-dump", dependencies: "db:cache" });
        assert.deepStrictEqual(linesOf(log), ["Received b'timeout'"]);
        assert.strictEqual(process.exitCode, undefined);
    });

    it("should exit with 1 when the coordinator is unreachable", async () => {
        const port = await getAvailablePort();

        await main(["--port", String(port)]);

        assert.strictEqual(process.exitCode, 1);
        assert.ok(linesOf(error).includes(`Error: Connection error: connect ECONNREFUSED 127.0.0.1:${port}`));
        assert.deepStrictEqual(linesOf(log), []);
    });

    it("should reject --deps-file together with --components", async () => {
        await main(["add-dependencies", "--deps-file", "deps.json", "--components", "a,b"]);

        assert.strictEqual(process.exitCode, 1);
        assert.ok(linesOf(error).includes("Error: Use either --deps-file or --components, not both"));
    });

    it("should reject an unknown hook action", async () => {
        await main(["hook", "--id", "web", "--action", "snapshot"]);

        assert.strictEqual(process.exitCode, 1);
        assert.ok(linesOf(error).some((line) => line.startsWith("Error: Unknown action. Expected one of: pre-dump, ")));
    });

    it("should reject a non-numeric port", async () => {
        await main(["--port", "http"]);

        assert.strictEqual(process.exitCode, 1);
        assert.deepStrictEqual(linesOf(log), []);
    });
});
