import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { DEFAULT_CONNECT_TIMEOUT_MS } from "./connection.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_MAX_LINE_LENGTH } from "./framing.js";
import { DEFAULT_HOST, DEFAULT_PORT } from "./session.js";

export const ClientConfigSchema = Type.Object({
    host: Type.String({ minLength: 1, default: DEFAULT_HOST, description: "Remote host" }),
    port: Type.Integer({ minimum: 1, maximum: 65535, default: DEFAULT_PORT, description: "Remote port" }),
    connectTimeoutMs: Type.Integer({
        minimum: 0,
        default: DEFAULT_CONNECT_TIMEOUT_MS,
        description: "Dial timeout in ms, 0 for none",
    }),
    maxLineLength: Type.Integer({
        minimum: 1,
        default: DEFAULT_MAX_LINE_LENGTH,
        description: "Longest accepted inbound line in bytes",
    }),
    logLevel: Type.Union(
        [
            Type.Literal("fatal"),
            Type.Literal("error"),
            Type.Literal("warn"),
            Type.Literal("info"),
            Type.Literal("debug"),
            Type.Literal("trace"),
            Type.Literal("silent"),
        ],
        { default: "silent" },
    ),
});

export type ClientConfig = Static<typeof ClientConfigSchema>;

/** Unvalidated config input: any field, any type (CLI flags, env strings). */
export type ClientConfigInput = { [K in keyof ClientConfig]?: unknown };

const ENV_KEYS: ReadonlyArray<readonly [keyof ClientConfig, string]> = [
    ["host", "LINE_SESSION_HOST"],
    ["port", "LINE_SESSION_PORT"],
    ["connectTimeoutMs", "LINE_SESSION_CONNECT_TIMEOUT_MS"],
    ["maxLineLength", "LINE_SESSION_MAX_LINE_LENGTH"],
    ["logLevel", "LINE_SESSION_LOG_LEVEL"],
];

/**
 * Build a validated client config.
 *
 * Precedence: explicit input, then environment variables, then defaults.
 * Numeric strings are coerced. Throws ConfigError naming the first invalid
 * field.
 */
export function resolveConfig(
    input: ClientConfigInput = {},
    env: NodeJS.ProcessEnv = process.env,
): ClientConfig {
    const merged: Record<string, unknown> = {};
    for (const [key, envKey] of ENV_KEYS) {
        const value = input[key] ?? env[envKey];
        if (value !== undefined && value !== "") {
            merged[key] = value;
        }
    }

    const value = Value.Convert(ClientConfigSchema, Value.Default(ClientConfigSchema, merged));
    if (Value.Check(ClientConfigSchema, value)) {
        return value;
    }

    const first = Value.Errors(ClientConfigSchema, value).First();
    throw new ConfigError(first?.path ?? "", first?.message ?? "invalid value");
}
