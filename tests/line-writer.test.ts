import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type * as net from "node:net";
import { Connection } from "../src/connection.js";
import { ClosedError, FramingError } from "../src/errors.js";
import { LineWriter } from "../src/line-writer.js";
import { collect, startRawPeer, waitFor, type RawPeer } from "./helpers.js";

describe("LineWriter", () => {
    let peer: RawPeer;
    let conn: Connection;
    let socket: net.Socket;
    let received: () => string;

    beforeEach(async () => {
        peer = await startRawPeer();
        [conn, socket] = await Promise.all([
            Connection.connect({ host: "127.0.0.1", port: peer.port }),
            peer.accept(),
        ]);
        received = collect(socket);
    });

    afterEach(async () => {
        conn.close();
        await peer.close();
    });

    it("appends the newline terminator", async () => {
        const writer = new LineWriter(conn);
        await writer.send("PING");
        await waitFor(() => received() === "PING\n");
    });

    it("keeps an existing terminator single", async () => {
        const writer = new LineWriter(conn);
        await writer.send("PING\n");
        await writer.send("");
        await waitFor(() => received() === "PING\n\n");
    });

    it("keeps concurrent sends whole and in call order", async () => {
        const writer = new LineWriter(conn);
        const lines = Array.from({ length: 200 }, (_, i) => `message ${i} ${"x".repeat(i)}`);
        const expected = lines.join("\n") + "\n";

        await Promise.all(lines.map((line) => writer.send(line)));
        await waitFor(() => received().length === expected.length);
        assert.equal(received(), expected);
    });

    it("rejects an embedded newline without writing anything", async () => {
        const writer = new LineWriter(conn);
        await assert.rejects(() => writer.send("two\nlines"), FramingError);

        await writer.send("ok");
        await waitFor(() => received() === "ok\n");
    });

    it("refuses sends after close", async () => {
        const writer = new LineWriter(conn);
        writer.close();
        await assert.rejects(() => writer.send("late"), ClosedError);
    });

    it("refuses sends once the connection is closed", async () => {
        const writer = new LineWriter(conn);
        conn.close();
        await assert.rejects(() => writer.send("late"), ClosedError);
    });
});
