import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { resolveConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

function rejectsAt(path: string) {
    return (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.equal(err.path, path);
        return true;
    };
}

describe("resolveConfig", () => {
    it("fills every field with its default", () => {
        assert.deepEqual(resolveConfig({}, {}), {
            host: "127.0.0.1",
            port: 1300,
            connectTimeoutMs: 10000,
            maxLineLength: 1048576,
            logLevel: "silent",
        });
    });

    it("coerces numeric strings", () => {
        const config = resolveConfig({ host: "example.test", port: "8080" }, {});
        assert.equal(config.host, "example.test");
        assert.equal(config.port, 8080);
    });

    it("reads the environment", () => {
        const config = resolveConfig({}, {
            LINE_SESSION_HOST: "10.0.0.5",
            LINE_SESSION_PORT: "4000",
            LINE_SESSION_CONNECT_TIMEOUT_MS: "250",
            LINE_SESSION_MAX_LINE_LENGTH: "64",
            LINE_SESSION_LOG_LEVEL: "debug",
        });
        assert.deepEqual(config, {
            host: "10.0.0.5",
            port: 4000,
            connectTimeoutMs: 250,
            maxLineLength: 64,
            logLevel: "debug",
        });
    });

    it("prefers explicit input over the environment", () => {
        const config = resolveConfig({ port: 2000 }, { LINE_SESSION_PORT: "3000" });
        assert.equal(config.port, 2000);
    });

    it("ignores empty environment values", () => {
        const config = resolveConfig({}, { LINE_SESSION_HOST: "", LINE_SESSION_PORT: "" });
        assert.equal(config.host, "127.0.0.1");
        assert.equal(config.port, 1300);
    });

    it("rejects a port out of range", () => {
        assert.throws(() => resolveConfig({ port: 70000 }, {}), rejectsAt("/port"));
    });

    it("rejects a port that is not a number", () => {
        assert.throws(() => resolveConfig({ port: "abc" }, {}), rejectsAt("/port"));
    });

    it("rejects an unknown log level", () => {
        assert.throws(() => resolveConfig({}, { LINE_SESSION_LOG_LEVEL: "loud" }), rejectsAt("/logLevel"));
    });

    it("names the field in the message", () => {
        assert.throws(
            () => resolveConfig({ maxLineLength: 0 }, {}),
            /^ConfigError: Invalid configuration at \/maxLineLength: /,
        );
    });
});
