import { describe, it } from "node:test";
import assert from "node:assert";
import { classifyResponse, formatBytes } from "./responses.ts";

describe("classifyResponse", () => {
	it("should recognise the coordinator replies", () => {
		assert.deepStrictEqual(classifyResponse(Buffer.from("ACK")), { kind: "ack", text: "ACK" });
		assert.deepStrictEqual(classifyResponse(Buffer.from("timeout\n")), { kind: "timeout", text: "timeout" });
		assert.strictEqual(classifyResponse(Buffer.from("not connected")).kind, "not-connected");
		assert.strictEqual(classifyResponse(Buffer.from("checkpoint is already created")).kind, "checkpoint-exists");
		assert.strictEqual(classifyResponse(Buffer.from("client already connected")).kind, "already-connected");
	});

	it("should mark an empty reply", () => {
		assert.deepStrictEqual(classifyResponse(new Uint8Array(0)), { kind: "empty", text: "" });
	});

	it("should keep unknown text as is", () => {
		assert.deepStrictEqual(classifyResponse(Buffer.from("{\"ok\":true}")), { kind: "unknown", text: "{\"ok\":true}" });
	});
});

describe("formatBytes", () => {
	it("should keep printable ASCII as is", () => {
		assert.strictEqual(formatBytes(Buffer.from("ACK")), "b'ACK'");
	});

	it("should escape bytes that are not valid UTF-8", () => {
		assert.strictEqual(formatBytes(Uint8Array.from([0xff, 0xfe, 0x41])), "b'\\xff\\xfeA'");
	});

	it("should escape quotes, backslashes and control characters", () => {
		assert.strictEqual(formatBytes(Buffer.from("it's\\ok\r\n\t\u0000")), "b'it\\'s\\\\ok\\r\\n\\t\\x00'");
	});

	it("should render an empty reply", () => {
		assert.strictEqual(formatBytes(new Uint8Array(0)), "b''");
	});
});
