#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { runClient } from "./cli.js";
import { resolveConfig, type ClientConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { setLogLevel } from "./logger.js";

// --- Parse CLI args ---

const argv = await yargs(hideBin(process.argv))
    .scriptName("line-session")
    .usage("Usage: $0 [host] [port] [options]")
    .option("connect-timeout", {
        type: "number",
        describe: "Connect timeout in ms, 0 for none",
    })
    .option("log-level", {
        type: "string",
        describe: "Log level for stderr diagnostics",
    })
    .demandCommand(0, 2, "", "Expected at most a host and a port")
    .strictOptions()
    .help()
    .parse();

// Positionals: [host] [port], defaulting to 127.0.0.1 and 1300
const [host, port] = argv._;

let config: ClientConfig;
try {
    config = resolveConfig({
        host: host === undefined ? undefined : String(host),
        port,
        connectTimeoutMs: argv.connectTimeout,
        logLevel: argv.logLevel,
    });
} catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(err.message);
    process.exit(2);
}

setLogLevel(config.logLevel);

// --- Run until stdin ends or a termination signal arrives ---

const controller = new AbortController();
const stop = () => controller.abort();
process.once("SIGINT", stop);
process.once("SIGTERM", stop);

process.exitCode = await runClient(config, {
    input: process.stdin,
    output: process.stdout,
    interactive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
    signal: controller.signal,
});

// stdin may still hold the event loop open after an abort
process.exit();
