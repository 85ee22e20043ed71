import { createServer, type Server, type Socket } from "node:net";

export type StandInBehaviour =
    | { kind: "echo" }
    | { kind: "reply"; message: string | Buffer }
    | { kind: "close" }
    | { kind: "silent" }
    // writes `first`, then `rest` after delayMs if the client is still there
    | { kind: "trickle"; first: string; rest: string; delayMs: number }
    | { kind: "reset" };

export type ReceivedConnection = {
    payload: Buffer;
    closed: Promise<void>;
};

export type CoordinatorStandIn = {
    port: number;
    connections: ReceivedConnection[];
    stop: () => Promise<void>;
};

export const getAvailablePort = async (): Promise<number> =>
    new Promise((resolve, reject) => {
        const server = createServer();
        server.on("error", reject);
        server.listen(0, "127.0.0.1", () => {
            const address = server.address();
            if (address && typeof address === "object") {
                const port = address.port;
                server.close(() => resolve(port));
            } else {
                server.close(() => reject(new Error("Failed to resolve ephemeral port")));
            }
        });
    });

/**
 * In-process coordinator: reacts to the first chunk of every connection
 * according to `behaviour` and records what it was sent.
 */
export const startCoordinatorStandIn = async (behaviour: StandInBehaviour): Promise<CoordinatorStandIn> => {
    const connections: ReceivedConnection[] = [];
    const sockets = new Set<Socket>();

    const server: Server = createServer((socket) => {
        sockets.add(socket);
        const chunks: Buffer[] = [];
        const connection: ReceivedConnection = {
            payload: Buffer.alloc(0),
            closed: new Promise((resolve) => {
                socket.on("close", () => {
                    sockets.delete(socket);
                    connection.payload = Buffer.concat(chunks);
                    resolve();
                });
            }),
        };
        connections.push(connection);

        socket.on("error", () => {
            socket.destroy();
        });
        socket.on("data", (chunk: Buffer) => {
            const first = chunks.length === 0;
            chunks.push(chunk);
            connection.payload = Buffer.concat(chunks);
            if (!first) return;
            switch (behaviour.kind) {
                case "echo":
                    socket.write(chunk);
                    break;
                case "reply":
                    socket.write(behaviour.message);
                    break;
                case "close":
                    socket.end();
                    break;
                case "silent":
                    break;
                case "trickle": {
                    socket.write(behaviour.first);
                    const { rest, delayMs } = behaviour;
                    setTimeout(() => {
                        if (!socket.destroyed) {
                            socket.write(rest);
                        }
                    }, delayMs);
                    break;
                }
                case "reset":
                    socket.resetAndDestroy();
                    break;
            }
        });
    });

    const port = await new Promise<number>((resolve, reject) => {
        server.on("error", reject);
        server.listen(0, "127.0.0.1", () => {
            const address = server.address();
            if (address && typeof address === "object") {
                resolve(address.port);
            } else {
                reject(new Error("Failed to resolve stand-in port"));
            }
        });
    });

    return {
        port,
        connections,
        stop: async () => {
            for (const socket of sockets) {
                socket.destroy();
            }
            await new Promise<void>((resolve) => server.close(() => resolve()));
        },
    };
};
