import { type Connection } from "./connection.js";
import { ClosedError, StateError, toError } from "./errors.js";
import { LineDecoder, DEFAULT_MAX_LINE_LENGTH } from "./framing.js";

export interface LineReaderOptions {
    /** Longest accepted line in bytes, newline excluded. Default: 1 MiB. */
    maxLineLength?: number;
}

export type MessageHandler = (line: string) => void;
export type EndHandler = (err: Error | null) => void;

/**
 * Runs the read loop of a connection: decodes newline-terminated frames
 * and hands them to `onMessage` in arrival order until the stream ends.
 *
 * `onEnd` is called exactly once:
 * - `null` on end-of-stream (after flushing an unterminated last line)
 * - `null` when the loop exits because `stop()` was called
 * - the error otherwise (ReadError, FramingError, ClosedError if the
 *   connection was closed under a reader nobody stopped)
 */
export class LineReader {
    private readonly connection: Connection;
    private readonly decoder: LineDecoder;
    private stopRequested = false;
    private running: Promise<void> | null = null;

    constructor(connection: Connection, options: LineReaderOptions = {}) {
        this.connection = connection;
        this.decoder = new LineDecoder(options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH);
    }

    /** Begin the background read loop. */
    start(onMessage: MessageHandler, onEnd: EndHandler): void {
        if (this.running) {
            throw new StateError("running", "LineReader already started");
        }
        this.running = this.loop(onMessage, onEnd);
    }

    /**
     * Ask the loop to exit at its next suspension point. A read already in
     * flight only returns early if the connection is closed as well.
     */
    stop(): void {
        this.stopRequested = true;
    }

    /** Settles once `onEnd` has run. Resolves immediately if never started. */
    get finished(): Promise<void> {
        return this.running ?? Promise.resolve();
    }

    private async loop(onMessage: MessageHandler, onEnd: EndHandler): Promise<void> {
        let endError: Error | null = null;

        try {
            while (!this.stopRequested) {
                const chunk = await this.connection.read();
                if (chunk === null) {
                    // Peer closed mid-line: the partial line is still a message
                    const rest = this.decoder.flush();
                    if (rest !== null) onMessage(rest);
                    break;
                }

                for (const line of this.decoder.push(chunk)) {
                    if (this.stopRequested) break;
                    onMessage(line);
                }

                // Lines ahead of an overlong one are delivered before it fails the loop
                const overflow = this.decoder.failure;
                if (overflow && !this.stopRequested) throw overflow;
            }
        } catch (err) {
            if (!(this.stopRequested && err instanceof ClosedError)) {
                endError = toError(err);
            }
        }

        this.decoder.reset();
        onEnd(endError);
    }
}
