import * as net from "node:net";
import { ClosedError, ConnectError, ReadError, StateError, WriteError } from "./errors.js";

/** Default dial timeout: 10 s */
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/** Pause the socket once this many chunks are waiting for read(). */
const MAX_QUEUED_CHUNKS = 16;

export interface DialOptions {
    host: string;
    port: number;
    /** Give up after this many ms. 0 disables the timeout. Default: 10000. */
    timeoutMs?: number;
    /** Abort an in-flight dial. */
    signal?: AbortSignal;
}

interface PendingRead {
    resolve: (chunk: Buffer | null) => void;
    reject: (err: Error) => void;
}

export function formatAddress(host: string, port: number): string {
    return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}

/**
 * A Connection owns one TCP socket and exposes it as a pull-based byte
 * source plus a callback-free write path.
 *
 * - `read()` returns the next chunk, `null` at end-of-stream.
 * - `write()` resolves once the bytes are handed to the OS.
 * - `close()` destroys the socket and fails anything still pending.
 *
 * The read side and the write side share nothing but the socket, so one
 * reader and one writer can use the connection at the same time.
 */
export class Connection {
    readonly address: string;
    private readonly socket: net.Socket;
    private readonly chunks: Buffer[] = [];
    private pendingRead: PendingRead | null = null;
    private paused = false;
    private ended = false;
    private failure: ReadError | null = null;
    private closedLocally = false;

    constructor(socket: net.Socket, address?: string) {
        this.socket = socket;
        this.address =
            address ?? formatAddress(socket.remoteAddress ?? "unknown", socket.remotePort ?? 0);

        socket.on("data", (chunk: Buffer) => this.handleData(chunk));

        socket.on("end", () => {
            this.ended = true;
            this.settleRead(null);
        });

        socket.on("error", (err) => {
            if (this.closedLocally) return;
            this.failure = new ReadError(`Connection to ${this.address} failed: ${err.message}`, {
                cause: err,
            });
            this.failRead(this.failure);
        });

        socket.on("close", () => {
            this.ended = true;
            if (this.closedLocally) return;
            if (this.failure) {
                this.failRead(this.failure);
            } else {
                this.settleRead(null);
            }
        });
    }

    /**
     * Dial a TCP address. Resolves once the connection is established.
     * Rejects with ConnectError on refusal, DNS failure, timeout or abort.
     */
    static connect(options: DialOptions): Promise<Connection> {
        const address = formatAddress(options.host, options.port);
        const timeoutMs = options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
        const signal = options.signal;

        return new Promise<Connection>((resolve, reject) => {
            if (signal?.aborted) {
                reject(new ConnectError(address, "aborted"));
                return;
            }

            let settled = false;
            let timer: ReturnType<typeof setTimeout> | null = null;
            const socket = net.connect({ host: options.host, port: options.port });

            const cleanup = () => {
                if (timer) clearTimeout(timer);
                socket.removeListener("error", onError);
                signal?.removeEventListener("abort", onAbort);
            };

            const fail = (reason: string, cause?: Error) => {
                if (settled) return;
                settled = true;
                cleanup();
                socket.destroy();
                reject(new ConnectError(address, reason, { cause }));
            };

            const onError = (err: Error) => fail(err.message, err);
            const onAbort = () => fail("aborted");

            socket.once("error", onError);
            signal?.addEventListener("abort", onAbort, { once: true });
            if (timeoutMs > 0) {
                timer = setTimeout(() => fail(`timed out after ${timeoutMs}ms`), timeoutMs);
            }

            socket.once("connect", () => {
                if (settled) return;
                settled = true;
                cleanup();
                resolve(new Connection(socket, address));
            });
        });
    }

    /** Whether the socket is still usable. Never blocks. */
    isOpen(): boolean {
        return !this.closedLocally && !this.socket.destroyed;
    }

    /**
     * Read the next chunk in arrival order.
     *
     * Resolves with `null` on clean end-of-stream. Rejects with ReadError on
     * socket failure and ClosedError once `close()` has been called. Only one
     * read may be pending at a time; a second one rejects with StateError.
     */
    read(): Promise<Buffer | null> {
        if (this.closedLocally) {
            return Promise.reject(new ClosedError("Connection is closed"));
        }

        const chunk = this.chunks.shift();
        if (chunk !== undefined) {
            if (this.paused && this.chunks.length < MAX_QUEUED_CHUNKS / 2) {
                this.paused = false;
                this.socket.resume();
            }
            return Promise.resolve(chunk);
        }

        if (this.failure) return Promise.reject(this.failure);
        if (this.ended) return Promise.resolve(null);

        if (this.pendingRead) {
            return Promise.reject(new StateError("reading", "Another read is already pending"));
        }

        return new Promise<Buffer | null>((resolve, reject) => {
            this.pendingRead = { resolve, reject };
        });
    }

    /**
     * Write bytes with a single socket write.
     *
     * Resolves once the bytes are handed to the OS (not once the peer has
     * them). Rejects with ClosedError if the connection is no longer
     * writable, WriteError if the socket reports a failure.
     */
    write(data: Buffer): Promise<void> {
        if (!this.isOpen() || !this.socket.writable) {
            return Promise.reject(new ClosedError("Connection is closed"));
        }

        return new Promise<void>((resolve, reject) => {
            this.socket.write(data, (err) => {
                if (!err) {
                    resolve();
                } else if (this.closedLocally) {
                    reject(new ClosedError("Connection closed during write"));
                } else {
                    reject(new WriteError(`Write to ${this.address} failed: ${err.message}`, {
                        cause: err,
                    }));
                }
            });
        });
    }

    /** Destroy the socket. Idempotent; fails a pending read with ClosedError. */
    close(): void {
        if (this.closedLocally) return;
        this.closedLocally = true;
        this.chunks.length = 0;
        if (!this.socket.destroyed) {
            this.socket.destroy();
        }
        this.failRead(new ClosedError("Connection is closed"));
    }

    private handleData(chunk: Buffer): void {
        if (this.pendingRead) {
            this.settleRead(chunk);
            return;
        }

        this.chunks.push(chunk);
        if (!this.paused && this.chunks.length >= MAX_QUEUED_CHUNKS) {
            this.paused = true;
            this.socket.pause();
        }
    }

    private settleRead(chunk: Buffer | null): void {
        const pending = this.pendingRead;
        if (!pending) return;
        this.pendingRead = null;
        pending.resolve(chunk);
    }

    private failRead(err: Error): void {
        const pending = this.pendingRead;
        if (!pending) return;
        this.pendingRead = null;
        pending.reject(err);
    }
}
