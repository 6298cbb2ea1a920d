/**
 * Interactive line client: forwards every input line to the peer and
 * prints every inbound line, until input ends.
 */

import * as readline from "node:readline";
import { type ClientConfig } from "./config.js";
import { toError } from "./errors.js";
import { createLogger } from "./logger.js";
import { Session } from "./session.js";

export const PROMPT = "<<<< ";
export const INBOUND_PREFIX = ">>>> ";

export interface ClientIO {
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
    /** Terminal mode: show the prompt and redraw it around inbound lines. */
    interactive?: boolean;
    /** Abort to finish as if input had ended. */
    signal?: AbortSignal;
}

/**
 * Run the client until input ends or `signal` aborts, also while still
 * connecting. Returns the process exit code: 0, or 1 if the connection failed.
 */
export async function runClient(config: ClientConfig, io: ClientIO): Promise<number> {
    const { input, output, interactive = false, signal } = io;
    const log = createLogger("cli");
    const write = (text: string) => {
        output.write(text);
    };

    const session = new Session({
        host: config.host,
        port: config.port,
        connectTimeoutMs: config.connectTimeoutMs,
        maxLineLength: config.maxLineLength,
        logger: log,
    });

    // An abort while dialing closes the session, which cancels the dial
    const abortDial = () => {
        session.close().catch((err: unknown) => {
            log.error({ err }, "close during connect failed");
        });
    };
    if (signal?.aborted) {
        abortDial();
    } else {
        signal?.addEventListener("abort", abortDial, { once: true });
    }

    try {
        await session.open();
    } catch (err) {
        if (signal?.aborted) {
            log.debug("connect aborted");
            return 0;
        }
        log.debug({ err }, "connect failed");
        write(`==== ${toError(err).message} ====\n`);
        return 1;
    } finally {
        signal?.removeEventListener("abort", abortDial);
    }

    write(`==== Connected to ${session.address} ====\n`);

    const rl = interactive
        ? readline.createInterface({ input, output, prompt: PROMPT })
        : readline.createInterface({ input, terminal: false });
    let quitting = false;

    session.on("message", (line: string) => {
        write(`${interactive ? "\r" : ""}${INBOUND_PREFIX}${line}\n`);
        if (interactive) rl.prompt(true);
    });

    // The peer going away does not end the client; the next send reports it
    session.on("end", (err: Error | null) => {
        if (quitting) return;
        write(err ? `==== Connection lost: ${err.message} ====\n` : "==== Connection closed by peer ====\n");
        if (interactive) rl.prompt(true);
    });

    const onAbort = () => rl.close();
    if (signal?.aborted) {
        rl.close();
    } else {
        signal?.addEventListener("abort", onAbort, { once: true });
    }

    try {
        if (interactive) rl.prompt();
        for await (const line of rl) {
            try {
                await session.send(line);
            } catch (err) {
                write(`==== Send failed: ${toError(err).message} ====\n`);
            }
            if (interactive) rl.prompt();
        }
    } finally {
        signal?.removeEventListener("abort", onAbort);
        quitting = true;
        await session.close();
    }

    return 0;
}
