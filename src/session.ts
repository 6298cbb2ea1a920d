import { EventEmitter } from "node:events";
import { Connection, DEFAULT_CONNECT_TIMEOUT_MS, formatAddress } from "./connection.js";
import { ClosedError, StateError } from "./errors.js";
import { DEFAULT_MAX_LINE_LENGTH } from "./framing.js";
import { LineReader } from "./line-reader.js";
import { LineWriter } from "./line-writer.js";
import { createLogger, type Logger } from "./logger.js";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 1300;

export type SessionState = "disconnected" | "connecting" | "connected" | "closing" | "closed";

export interface SessionOptions {
    /** Remote host. Default: "127.0.0.1". */
    host?: string;
    /** Remote port. Default: 1300. */
    port?: number;
    /** Dial timeout in ms, 0 for none. Default: 10000. */
    connectTimeoutMs?: number;
    /** Longest accepted inbound line in bytes. Default: 1 MiB. */
    maxLineLength?: number;
    logger?: Logger;
}

/**
 * A Session is the lifecycle of one TCP connection together with its
 * reader and writer. It is the only thing callers talk to.
 *
 * disconnected → connecting → connected → closing → closed
 *
 * `closed` is terminal: every operation afterwards fails with ClosedError.
 *
 * Events:
 * - "message" (line: string) — a line arrived, in wire order
 * - "state" (state: SessionState, previous: SessionState) — lifecycle change
 * - "end" (err: Error | null) — the session reached `closed`; fired once
 */
export class Session extends EventEmitter {
    private readonly host: string;
    private readonly port: number;
    private readonly connectTimeoutMs: number;
    private readonly maxLineLength: number;
    private readonly log: Logger;

    private _state: SessionState = "disconnected";
    private connection: Connection | null = null;
    private reader: LineReader | null = null;
    private writer: LineWriter | null = null;
    private dialAbort: AbortController | null = null;
    private endError: Error | null = null;
    private closing: Promise<void> | null = null;

    constructor(options: SessionOptions = {}) {
        super();
        this.host = options.host ?? DEFAULT_HOST;
        this.port = options.port ?? DEFAULT_PORT;
        this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
        this.maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
        this.log = options.logger ?? createLogger("session");
    }

    /**
     * Wrap an already-established connection (the accepting side of a
     * server). The session starts in `connected` with its reader running.
     */
    static fromConnection(connection: Connection, options: Omit<SessionOptions, "host" | "port"> = {}): Session {
        const session = new Session(options);
        session.attach(connection);
        return session;
    }

    get state(): SessionState {
        return this._state;
    }

    /** Remote address as "host:port". */
    get address(): string {
        return this.connection?.address ?? formatAddress(this.host, this.port);
    }

    /** Dial the remote address. May be retried after a ConnectError. */
    async open(): Promise<void> {
        if (this._state === "closing" || this._state === "closed") {
            throw new ClosedError();
        }
        if (this._state !== "disconnected") {
            throw new StateError(this._state, `Cannot open a session that is ${this._state}`);
        }

        this.setState("connecting");
        const abort = new AbortController();
        this.dialAbort = abort;

        let connection: Connection;
        try {
            connection = await Connection.connect({
                host: this.host,
                port: this.port,
                timeoutMs: this.connectTimeoutMs,
                signal: abort.signal,
            });
        } catch (err) {
            this.dialAbort = null;
            if (this.state !== "connecting") {
                throw new ClosedError("Session closed while connecting");
            }
            this.log.debug({ err, address: this.address }, "connect failed");
            this.setState("disconnected");
            throw err;
        }

        this.dialAbort = null;
        if (this.state !== "connecting") {
            // close() won the race against a dial that had already succeeded
            connection.close();
            throw new ClosedError("Session closed while connecting");
        }
        this.attach(connection);
    }

    /**
     * Send one line. Resolves once the OS has the bytes.
     * Rejects with ClosedError once the session is closing or closed.
     */
    async send(line: string): Promise<void> {
        if (this._state === "closing" || this._state === "closed") {
            throw new ClosedError();
        }
        if (this._state !== "connected" || !this.writer) {
            throw new StateError(this._state, "Session is not connected");
        }
        await this.writer.send(line);
    }

    /**
     * Close the session. Idempotent: every call returns the same promise,
     * which resolves once the reader has stopped and the socket is released.
     */
    close(): Promise<void> {
        if (!this.closing) {
            this.closing = this.shutdown();
        }
        return this.closing;
    }

    private attach(connection: Connection): void {
        this.connection = connection;
        this.writer = new LineWriter(connection);
        this.reader = new LineReader(connection, { maxLineLength: this.maxLineLength });
        this.setState("connected");
        this.log.debug({ address: connection.address }, "connected");

        this.reader.start(
            (line) => this.emit("message", line),
            (err) => this.handleReaderEnd(err),
        );
    }

    private handleReaderEnd(err: Error | null): void {
        this.endError = err;
        if (err) {
            this.log.warn({ err, address: this.address }, "read loop failed");
        }
        if (this._state === "connected") {
            this.close().catch((closeErr: unknown) => {
                this.log.error({ err: closeErr }, "close after read loop end failed");
            });
        }
    }

    private async shutdown(): Promise<void> {
        const previous = this._state;

        if (previous === "disconnected" || previous === "connecting") {
            this.setState("closed");
            this.dialAbort?.abort();
            this.dialAbort = null;
            this.emit("end", null);
            return;
        }

        this.setState("closing");
        this.writer?.close();
        this.reader?.stop();
        this.connection?.close();

        if (this.reader) await this.reader.finished;

        this.setState("closed");
        this.log.debug({ address: this.address, err: this.endError }, "closed");
        this.emit("end", this.endError);
    }

    private setState(next: SessionState): void {
        const previous = this._state;
        if (previous === next) return;
        this._state = next;
        this.emit("state", next, previous);
    }
}
