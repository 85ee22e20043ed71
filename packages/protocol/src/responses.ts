export const MESSAGE_ACK = "ACK";
export const MESSAGE_TIMEOUT = "timeout";
export const MESSAGE_NOT_CONNECTED = "not connected";
export const MESSAGE_CHECKPOINT_EXISTS = "checkpoint is already created";
export const MESSAGE_ALREADY_CONNECTED = "client already connected";

export type ResponseKind =
	| "ack"
	| "timeout"
	| "not-connected"
	| "checkpoint-exists"
	| "already-connected"
	| "empty"
	| "unknown";

export interface ClassifiedResponse {
	kind: ResponseKind;
	text: string;
}

const KNOWN_MESSAGES: ReadonlyMap<string, ResponseKind> = new Map<string, ResponseKind>([
	[MESSAGE_ACK, "ack"],
	[MESSAGE_TIMEOUT, "timeout"],
	[MESSAGE_NOT_CONNECTED, "not-connected"],
	[MESSAGE_CHECKPOINT_EXISTS, "checkpoint-exists"],
	[MESSAGE_ALREADY_CONNECTED, "already-connected"],
]);

// Informational only: callers never reject a reply because of its kind.
export const classifyResponse = (raw: Uint8Array): ClassifiedResponse => {
	const text = Buffer.from(raw).toString("utf8").trim();
	if (text.length === 0) {
		return { kind: "empty", text };
	}
	return { kind: KNOWN_MESSAGES.get(text) ?? "unknown", text };
};

const ESCAPES: ReadonlyMap<number, string> = new Map<number, string>([
	[0x09, "\\t"],
	[0x0a, "\\n"],
	[0x0d, "\\r"],
	[0x27, "\\'"],
	[0x5c, "\\\\"],
]);

/**
 * Byte-literal rendering of a reply, e.g. `b'ACK\n'`. Printable ASCII is
 * kept and every other byte becomes `\xNN`, so no byte is lost.
 */
export const formatBytes = (raw: Uint8Array): string => {
	let body = "";
	for (const byte of raw) {
		const escaped = ESCAPES.get(byte);
		if (escaped !== undefined) {
			body += escaped;
		} else if (byte >= 0x20 && byte < 0x7f) {
			body += String.fromCharCode(byte);
		} else {
			body += `\\x${byte.toString(16).padStart(2, "0")}`;
		}
	}
	return `b'${body}'`;
};
