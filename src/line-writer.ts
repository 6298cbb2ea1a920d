import { type Connection } from "./connection.js";
import { ClosedError } from "./errors.js";
import { encodeLine } from "./framing.js";

/**
 * Send path of a connection.
 *
 * Every `send()` encodes the whole line into one buffer and performs one
 * socket write. The stream keeps writes in call order and never splits a
 * buffer between two writes, so lines from concurrent callers cannot
 * interleave and no extra queue is needed.
 */
export class LineWriter {
    private readonly connection: Connection;
    private accepting = true;

    constructor(connection: Connection) {
        this.connection = connection;
    }

    /**
     * Send one line, appending "\n" if absent.
     *
     * Resolves once the OS has the bytes. Rejects with FramingError for an
     * embedded newline, ClosedError after `close()` or once the connection is
     * gone, WriteError on socket failure.
     */
    async send(line: string): Promise<void> {
        if (!this.accepting || !this.connection.isOpen()) {
            throw new ClosedError();
        }
        await this.connection.write(encodeLine(line));
    }

    /** Refuse further sends. Writes already issued are left to finish or fail. */
    close(): void {
        this.accepting = false;
    }
}
