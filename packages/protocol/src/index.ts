export * from "./envelope.ts";
export * from "./responses.ts";
