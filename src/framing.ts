import { FramingError } from "./errors.js";

/** Default maximum line length: 1 MiB */
export const DEFAULT_MAX_LINE_LENGTH = 1024 * 1024;

const NEWLINE = 0x0a;

/**
 * Encode a line into a wire frame.
 *
 * Wire format: [N bytes: UTF-8 text][1 byte: "\n"]
 *
 * A single trailing newline is accepted and not doubled. Any other newline
 * would split the message on the peer's side, so it is rejected.
 */
export function encodeLine(line: string): Buffer {
    const body = line.endsWith("\n") ? line.slice(0, -1) : line;
    if (body.includes("\n")) {
        throw new FramingError("Line contains an embedded newline");
    }
    return Buffer.from(body + "\n", "utf-8");
}

/**
 * Stateful line decoder that handles partial reads and multi-line chunks.
 *
 * Feed chunks from the socket into `push()`. It returns the complete lines
 * decoded so far (possibly none), newline stripped. Splitting happens on raw
 * bytes, so a multi-byte UTF-8 character cut across two chunks is decoded
 * intact.
 *
 * A line longer than maxLineLength bytes raises FramingError. Lines that
 * came before it in the same chunk are still returned; the error is then
 * held and thrown by the next `push()` or `flush()` (see `failure`).
 */
export class LineDecoder {
    private buffer: Buffer = Buffer.alloc(0);
    private readonly maxLineLength: number;
    private deferred: FramingError | null = null;

    constructor(maxLineLength: number = DEFAULT_MAX_LINE_LENGTH) {
        this.maxLineLength = maxLineLength;
    }

    /**
     * Push a chunk of data and return any complete lines decoded from it.
     */
    push(chunk: Buffer): string[] {
        this.throwDeferred();
        this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
        const lines: string[] = [];

        let start = 0;
        let end = this.buffer.indexOf(NEWLINE, start);
        while (end !== -1) {
            if (end - start > this.maxLineLength) {
                return this.overflow(end - start, lines);
            }
            lines.push(this.buffer.toString("utf-8", start, end));
            start = end + 1;
            end = this.buffer.indexOf(NEWLINE, start);
        }

        this.buffer = this.buffer.subarray(start);
        if (this.buffer.length > this.maxLineLength) {
            return this.overflow(this.buffer.length, lines);
        }
        return lines;
    }

    /**
     * Return the buffered partial line, if any, and clear it.
     * Used at end-of-stream so an unterminated last line is not lost.
     */
    flush(): string | null {
        this.throwDeferred();
        if (this.buffer.length === 0) return null;
        const rest = this.buffer.toString("utf-8");
        this.buffer = Buffer.alloc(0);
        return rest;
    }

    /** Number of bytes held for an incomplete line. */
    get pending(): number {
        return this.buffer.length;
    }

    /** The overflow held back after the last `push()`, if any. */
    get failure(): FramingError | null {
        return this.deferred;
    }

    /** Reset internal buffer state. */
    reset(): void {
        this.buffer = Buffer.alloc(0);
        this.deferred = null;
    }

    private overflow(length: number, decoded: string[]): string[] {
        // Drop everything buffered so the decoder is usable again
        this.buffer = Buffer.alloc(0);
        const err = new FramingError(`Line length ${length} exceeds maximum ${this.maxLineLength}`);
        if (decoded.length === 0) throw err;
        this.deferred = err;
        return decoded;
    }

    private throwDeferred(): void {
        const err = this.deferred;
        if (!err) return;
        this.deferred = null;
        throw err;
    }
}
