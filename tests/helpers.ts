/**
 * Shared test infrastructure: raw TCP peers on 127.0.0.1 and polling helpers.
 */

import dns from "node:dns";
import * as net from "node:net";
import type { TestContext } from "node:test";

export function wait(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

/** Poll until `check` passes or the timeout elapses. */
export async function waitFor(check: () => boolean, timeoutMs: number = 2000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!check()) {
        if (Date.now() > deadline) {
            throw new Error(`Condition not met within ${timeoutMs}ms`);
        }
        await wait(5);
    }
}

function portOf(server: net.Server): number {
    const address = server.address();
    if (!address || typeof address === "string") {
        throw new Error("Server is not listening on TCP");
    }
    return address.port;
}

/** A bare TCP server that hands out the accepted sockets. */
export interface RawPeer {
    port: number;
    /** Resolves with the next accepted socket. */
    accept(): Promise<net.Socket>;
    close(): Promise<void>;
}

export async function startRawPeer(): Promise<RawPeer> {
    const queued: net.Socket[] = [];
    const waiters: Array<(socket: net.Socket) => void> = [];
    const all: net.Socket[] = [];

    const server = net.createServer((socket) => {
        all.push(socket);
        const waiter = waiters.shift();
        if (waiter) {
            waiter(socket);
        } else {
            queued.push(socket);
        }
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));

    return {
        port: portOf(server),
        accept: () => {
            const socket = queued.shift();
            if (socket) return Promise.resolve(socket);
            return new Promise<net.Socket>((resolve) => waiters.push(resolve));
        },
        close: async () => {
            for (const socket of all) socket.destroy();
            await new Promise<void>((resolve) => server.close(() => resolve()));
        },
    };
}

/** A port nothing is listening on (bound, then released). */
export async function unusedPort(): Promise<number> {
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const port = portOf(server);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    return port;
}

/** Accumulate everything a socket receives as text. */
export function collect(socket: net.Socket): () => string {
    const chunks: Buffer[] = [];
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    return () => Buffer.concat(chunks).toString("utf-8");
}

/** Host name for dials that should stay pending under `holdLookups`. */
export const STALLED_HOST = "stalled.invalid";

/**
 * Make every DNS lookup in the current test hang, so a dial by host name
 * never leaves the connecting phase. Restored when the test ends.
 */
export function holdLookups(t: TestContext): void {
    t.mock.method(dns, "lookup", () => {});
}
