/**
 * Error hierarchy for line sessions.
 *
 * Every error carries a `code` discriminant so callers can switch on it
 * instead of chaining `instanceof` checks:
 *
 * ```ts
 * try {
 *     await session.send("PING");
 * } catch (err) {
 *     if (isSessionError(err)) {
 *         switch (err.code) {
 *             case "SESSION_CLOSED": break;
 *             case "WRITE_FAILED": console.error(err.cause); break;
 *         }
 *     }
 * }
 * ```
 */

export type SessionErrorCode =
    | "CONNECT_FAILED"
    | "READ_FAILED"
    | "WRITE_FAILED"
    | "SESSION_CLOSED"
    | "INVALID_STATE"
    | "FRAMING"
    | "INVALID_CONFIG";

/** Base class for every error raised by this package. */
export class SessionError extends Error {
    readonly code: SessionErrorCode;

    constructor(code: SessionErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.code = code;
        this.name = "SessionError";
    }
}

/** Dialing the remote address failed (refused, unreachable, DNS, timeout, abort). */
export class ConnectError extends SessionError {
    readonly code = "CONNECT_FAILED" as const;
    readonly address: string;

    constructor(address: string, reason: string, options?: { cause?: unknown }) {
        super("CONNECT_FAILED", `Failed to connect to ${address}: ${reason}`, options);
        this.name = "ConnectError";
        this.address = address;
    }
}

/** The receive path failed for a reason other than a clean end-of-stream. */
export class ReadError extends SessionError {
    readonly code = "READ_FAILED" as const;

    constructor(message: string, options?: { cause?: unknown }) {
        super("READ_FAILED", message, options);
        this.name = "ReadError";
    }
}

/** The send path failed. Does not close the session by itself. */
export class WriteError extends SessionError {
    readonly code = "WRITE_FAILED" as const;

    constructor(message: string, options?: { cause?: unknown }) {
        super("WRITE_FAILED", message, options);
        this.name = "WriteError";
    }
}

/** Operation attempted after close. Always raised immediately. */
export class ClosedError extends SessionError {
    readonly code = "SESSION_CLOSED" as const;

    constructor(message: string = "Session is closed") {
        super("SESSION_CLOSED", message);
        this.name = "ClosedError";
    }
}

/** Operation not valid in the current lifecycle state. */
export class StateError extends SessionError {
    readonly code = "INVALID_STATE" as const;
    readonly state: string;

    constructor(state: string, message: string) {
        super("INVALID_STATE", message);
        this.name = "StateError";
        this.state = state;
    }
}

/** A line violates the wire framing (embedded newline, over the length limit). */
export class FramingError extends SessionError {
    readonly code = "FRAMING" as const;

    constructor(message: string) {
        super("FRAMING", message);
        this.name = "FramingError";
    }
}

/** Configuration failed validation. `path` is the JSON pointer of the bad field. */
export class ConfigError extends SessionError {
    readonly code = "INVALID_CONFIG" as const;
    readonly path: string;

    constructor(path: string, message: string) {
        super("INVALID_CONFIG", `Invalid configuration at ${path || "/"}: ${message}`);
        this.name = "ConfigError";
        this.path = path;
    }
}

/** Narrow any caught value to a {@link SessionError}. */
export function isSessionError(err: unknown): err is SessionError {
    return err instanceof SessionError;
}

/** Coerce a caught value into an Error. */
export function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}
