export * from "./tcp-client.ts";
