import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger };
export type LogLevel = LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = [
    "fatal",
    "error",
    "warn",
    "info",
    "debug",
    "trace",
    "silent",
];

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.LINE_SESSION_LOG_LEVEL;

/**
 * Root logger. Writes JSON lines to stderr so stdout stays free for the
 * conversation itself. Silent unless LINE_SESSION_LOG_LEVEL says otherwise.
 */
export const rootLogger: Logger = pino(
    {
        name: "line-session",
        level: isLogLevel(envLevel) ? envLevel : "silent",
        serializers: { err: pino.stdSerializers.err },
    },
    pino.destination(2),
);

/** Child logger tagged with the component name. */
export function createLogger(component: string): Logger {
    return rootLogger.child({ component });
}

export function setLogLevel(level: LogLevel): void {
    rootLogger.level = level;
}
