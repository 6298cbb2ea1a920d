import { EventEmitter } from "node:events";
import * as net from "node:net";
import { Connection } from "./connection.js";
import { StateError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { DEFAULT_HOST, DEFAULT_PORT, Session } from "./session.js";

export interface LineServerOptions {
    /** Listen host. Default: "127.0.0.1". */
    host?: string;
    /** Listen port, 0 for any free port. Default: 1300. */
    port?: number;
    /** Longest accepted inbound line in bytes. Default: 1 MiB. */
    maxLineLength?: number;
    logger?: Logger;
}

/**
 * Accepting side of the line protocol. Every TCP connection becomes a
 * Session that is already `connected`; the server keeps track of live
 * sessions so it can fan a line out to all of them and tear them down on
 * stop.
 *
 * Events:
 * - "session" (session: Session) — a peer connected
 * - "error" (err: Error) — listener error after start
 */
export class LineServer extends EventEmitter {
    private readonly host: string;
    private readonly port: number;
    private readonly maxLineLength: number | undefined;
    private readonly log: Logger;

    private server: net.Server | null = null;
    private sessions: Set<Session> = new Set();

    constructor(options: LineServerOptions = {}) {
        super();
        this.host = options.host ?? DEFAULT_HOST;
        this.port = options.port ?? DEFAULT_PORT;
        this.maxLineLength = options.maxLineLength;
        this.log = options.logger ?? createLogger("server");
    }

    /** Start listening. */
    async start(): Promise<void> {
        if (this.server) {
            throw new StateError("listening", "Server already started");
        }

        await new Promise<void>((resolve, reject) => {
            const server = net.createServer((socket) => {
                this.handleConnection(socket);
            });

            const onStartError = (err: Error) => reject(err);
            server.once("error", onStartError);

            server.listen(this.port, this.host, () => {
                server.removeListener("error", onStartError);
                server.on("error", (err) => this.emit("error", err));
                this.server = server;
                resolve();
            });
        });

        this.log.info({ address: this.address }, "listening");
    }

    /** Close every live session, then the listener. Idempotent. */
    async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;
        this.server = null;

        // Snapshot: closing a session removes it from the set
        const closing = Array.from(this.sessions, (session) => session.close());
        this.sessions.clear();
        await Promise.all(closing);

        await new Promise<void>((resolve) => {
            server.close(() => resolve());
        });
        this.log.info("stopped");
    }

    /** The address the server is listening on. */
    get address(): net.AddressInfo | null {
        const address = this.server?.address();
        return address && typeof address === "object" ? address : null;
    }

    /** Number of live sessions. */
    get sessionCount(): number {
        return this.sessions.size;
    }

    /**
     * Send a line to every live session.
     * Returns how many sessions accepted it; failures are logged.
     */
    async broadcast(line: string): Promise<number> {
        const targets = Array.from(this.sessions);
        const results = await Promise.allSettled(targets.map((session) => session.send(line)));

        let delivered = 0;
        results.forEach((result, i) => {
            if (result.status === "fulfilled") {
                delivered++;
            } else {
                this.log.warn({ err: result.reason, address: targets[i]?.address }, "broadcast failed");
            }
        });
        return delivered;
    }

    private handleConnection(socket: net.Socket): void {
        if (!this.server) {
            // Accepted while stopping
            socket.destroy();
            return;
        }

        const session = Session.fromConnection(new Connection(socket), {
            maxLineLength: this.maxLineLength,
            logger: this.log,
        });

        this.sessions.add(session);
        session.once("end", () => {
            this.sessions.delete(session);
        });

        this.log.debug({ address: session.address }, "accepted");
        this.emit("session", session);
    }
}
