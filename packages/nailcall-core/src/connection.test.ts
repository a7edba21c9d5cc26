import { afterEach, describe, expect, it, vi } from "vitest";
import { ProtocolDecodeError, UnknownMessageTypeError, encodeChunk } from "@nailcall/wire";
import { ConnectionManager, type ConnectionState } from "./connection.ts";
import { ConnectionError, TransportError } from "./errors.ts";
import { createLogger } from "./logging.ts";
import { MemoryConnector, MemoryTransport } from "./testing/memory-transport.ts";
import type { Connector } from "./transport.ts";

const endpoint = { host: "localhost", port: 2113 };
const quiet = createLogger("nailcall:test", { debug: "" });

let managers: ConnectionManager[] = [];

function manager(connector: Connector, heartbeatIntervalMs = 60_000) {
  const states: ConnectionState[] = [];
  const conn = new ConnectionManager({
    endpoint,
    connector,
    heartbeatIntervalMs,
    logger: quiet,
    onStateChange: (state) => states.push(state),
  });
  managers.push(conn);
  return { conn, states };
}

afterEach(async () => {
  vi.useRealTimers();
  await Promise.all(managers.map((m) => m.close()));
  managers = [];
});

describe("connect", () => {
  it("starts disconnected and transitions to connected", async () => {
    const connector = new MemoryConnector([new MemoryTransport()]);
    const { conn, states } = manager(connector.connect);

    expect(conn.getState()).toBe("disconnected");
    await conn.connect();

    expect(conn.isConnected()).toBe(true);
    expect(states).toEqual(["connected"]);
    expect(connector.calls).toBe(1);
  });

  it("is a no-op when already connected", async () => {
    const connector = new MemoryConnector([new MemoryTransport(), new MemoryTransport()]);
    const { conn, states } = manager(connector.connect);

    await conn.connect();
    await conn.connect();

    expect(connector.calls).toBe(1);
    expect(states).toEqual(["connected"]);
  });

  it("shares one attempt between concurrent callers", async () => {
    const transport = new MemoryTransport();
    const connector = new MemoryConnector([transport, new MemoryTransport()]);
    const { conn } = manager(connector.connect);

    await Promise.all([conn.connect(), conn.connect(), conn.connect()]);
    await vi.waitFor(() => expect(transport.heartbeatCount()).toBe(1));

    expect(connector.calls).toBe(1);
  });

  it("surfaces a ConnectionError and stays disconnected", async () => {
    const refused: Connector = async (ep) => {
      throw ConnectionError.refused(ep);
    };
    const { conn, states } = manager(refused);

    await expect(conn.connect()).rejects.toMatchObject({ name: "ConnectionError", kind: "refused" });
    expect(conn.getState()).toBe("disconnected");
    expect(states).toEqual([]);
  });

  it("wraps other dial failures as io ConnectionErrors", async () => {
    const broken: Connector = async () => {
      throw new Error("network unreachable");
    };
    const { conn } = manager(broken);

    const error = await conn.connect().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectionError);
    if (!(error instanceof ConnectionError)) return;
    expect(error.kind).toBe("io");
    expect(error.message).toBe("cannot connect to localhost:2113: network unreachable");
  });

  it("can retry after a failed attempt", async () => {
    let attempts = 0;
    const transport = new MemoryTransport();
    const flaky: Connector = async (ep) => {
      attempts++;
      if (attempts === 1) throw ConnectionError.timeout(ep, 100);
      return transport;
    };
    const { conn } = manager(flaky);

    await expect(conn.connect()).rejects.toThrow("timed out after 100ms connecting to localhost:2113");
    await conn.connect();
    expect(conn.isConnected()).toBe(true);
  });
});

describe("close", () => {
  it("is a no-op when never connected", async () => {
    const { conn, states } = manager(new MemoryConnector([]).connect);
    await conn.close();
    expect(states).toEqual([]);
  });

  it("can be called twice without error", async () => {
    const transport = new MemoryTransport();
    const { conn, states } = manager(new MemoryConnector([transport]).connect);

    await conn.connect();
    await conn.close();
    await conn.close();

    expect(transport.isClosed()).toBe(true);
    expect(states).toEqual(["connected", "disconnected"]);
  });

  it("shares one teardown between concurrent callers", async () => {
    const { conn, states } = manager(new MemoryConnector([new MemoryTransport()]).connect);

    await conn.connect();
    await Promise.all([conn.close(), conn.close()]);

    expect(states).toEqual(["connected", "disconnected"]);
  });

  it("opens a fresh transport on reconnect", async () => {
    const first = new MemoryTransport();
    const second = new MemoryTransport();
    const connector = new MemoryConnector([first, second]);
    const { conn, states } = manager(connector.connect);

    await conn.connect();
    await conn.close();
    await conn.connect();
    await conn.writeLocked("argument", "again");

    expect(connector.calls).toBe(2);
    expect(first.sentKinds()).toEqual([]);
    expect(second.sentKinds()).toEqual(["argument"]);
    expect(states).toEqual(["connected", "disconnected", "connected"]);
  });

  it("rejects a read that is waiting for data", async () => {
    const { conn } = manager(new MemoryConnector([new MemoryTransport()]).connect);
    await conn.connect();

    const read = expect(conn.readLocked()).rejects.toBeInstanceOf(TransportError);
    await conn.close();
    await read;
  });

  it("rejects a read that is waiting for its payload", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    transport.deliver(encodeChunk("stdout", "partial").subarray(0, 8));
    const read = expect(conn.readLocked()).rejects.toBeInstanceOf(TransportError);
    await conn.close();
    await read;
  });
});

describe("writeLocked", () => {
  it("writes a framed chunk", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    await conn.writeLocked("argument", "--verbose");

    const written = transport.sent.filter((c) => c.header.kind === "argument");
    expect(written).toHaveLength(1);
    expect(written[0].header.length).toBe(9);
    expect(new TextDecoder().decode(written[0].payload)).toBe("--verbose");
  });

  it("fails with TransportError when disconnected", async () => {
    const { conn } = manager(new MemoryConnector([]).connect);
    await expect(conn.writeLocked("command", "Main")).rejects.toMatchObject({
      name: "TransportError",
      kind: "closed",
    });
  });

  it("propagates socket write failures", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    transport.failSends = new Error("EPIPE");
    const error = await conn.writeLocked("command", "Main").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    if (!(error instanceof TransportError)) return;
    expect(error.kind).toBe("io");
    expect(error.message).toBe("EPIPE");
  });
});

describe("readLocked", () => {
  it("returns a server chunk", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    transport.deliver(encodeChunk("stdout", "hi"));
    const chunk = await conn.readLocked();

    expect(chunk.header).toEqual({ kind: "stdout", length: 2 });
    expect(new TextDecoder().decode(chunk.payload)).toBe("hi");
  });

  it("waits for a chunk that arrives in pieces", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    const bytes = encodeChunk("stderr", "split");
    const read = conn.readLocked();
    transport.deliver(bytes.subarray(0, 3));
    transport.deliver(bytes.subarray(3, 7));
    transport.deliver(bytes.subarray(7));

    const chunk = await read;
    expect(chunk.header).toEqual({ kind: "stderr", length: 5 });
    expect(new TextDecoder().decode(chunk.payload)).toBe("split");
  });

  it("returns an empty payload for a zero-length chunk", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    transport.deliver(encodeChunk("sendinput"));
    const chunk = await conn.readLocked();
    expect(chunk.header).toEqual({ kind: "sendinput", length: 0 });
    expect(chunk.payload).toHaveLength(0);
  });

  it("rejects a known kind the server may not send", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    transport.deliver(encodeChunk("argument", "x"));
    const error = await conn.readLocked().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnknownMessageTypeError);
    if (!(error instanceof UnknownMessageTypeError)) return;
    expect(error.kind).toBe("argument");
    expect(error.tag).toBe(0x41);
    expect(error.message).toBe("Unexpected message type from server: argument");
  });

  it("rejects an unknown tag", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    transport.deliver(new Uint8Array([0, 0, 0, 0, 0x3f]));
    await expect(conn.readLocked()).rejects.toThrow("Unknown message type: '?'");
  });

  it("fails with TransportError when disconnected", async () => {
    const { conn } = manager(new MemoryConnector([]).connect);
    await expect(conn.readLocked()).rejects.toBeInstanceOf(TransportError);
  });

  it("reports a header cut short by the server as truncated", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    const read = conn.readLocked().catch((e: unknown) => e);
    transport.deliver(new Uint8Array([0, 0, 0]));
    transport.end();
    const error = await read;

    expect(error).toBeInstanceOf(ProtocolDecodeError);
    if (!(error instanceof ProtocolDecodeError)) return;
    expect(error.message).toBe("truncated chunk header: expected 5 bytes, got 3");
  });

  it("reports a payload cut short by the server as truncated", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    transport.deliver(encodeChunk("stdout", "Hello").subarray(0, 7));
    transport.end();
    const error = await conn.readLocked().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProtocolDecodeError);
    if (!(error instanceof ProtocolDecodeError)) return;
    expect(error.message).toBe("truncated stdout payload: expected 5 bytes, got 2");
  });

  it("keeps a clean end of stream as a TransportError", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    transport.end();
    const error = await conn.readLocked().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).not.toBeInstanceOf(ProtocolDecodeError);
    if (!(error instanceof TransportError)) return;
    expect(error.message).toBe("connection closed by server");
  });

  it("returns chunks buffered before the server ended the stream", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    transport.deliver(encodeChunk("stdout", "A"), encodeChunk("exit", "0"));
    transport.end();

    expect((await conn.readLocked()).header).toEqual({ kind: "stdout", length: 1 });
    expect((await conn.readLocked()).header).toEqual({ kind: "exit", length: 1 });
  });

  it("keeps a partial header as a TransportError when closed locally", async () => {
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect);
    await conn.connect();

    const read = conn.readLocked().catch((e: unknown) => e);
    transport.deliver(new Uint8Array([0, 0]));
    await conn.close();
    const error = await read;

    expect(error).toBeInstanceOf(TransportError);
  });
});

describe("heartbeat", () => {
  it("emits a heartbeat within two intervals of connecting", async () => {
    vi.useFakeTimers();
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect, 500);

    await conn.connect();
    await vi.advanceTimersByTimeAsync(1_000);

    expect(transport.heartbeatCount()).toBeGreaterThanOrEqual(1);
    const beat = transport.sent.find((c) => c.header.kind === "heartbeat");
    expect(beat?.header.length).toBe(0);
  });

  it("keeps beating while a read waits for the server", async () => {
    vi.useFakeTimers();
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect, 500);

    await conn.connect();
    const read = conn.readLocked();
    await vi.advanceTimersByTimeAsync(0);
    const before = transport.heartbeatCount();

    await vi.advanceTimersByTimeAsync(1_000);
    expect(transport.heartbeatCount()).toBe(before + 2);

    transport.deliver(encodeChunk("exit", "0"));
    await expect(read).resolves.toMatchObject({ header: { kind: "exit", length: 1 } });
  });

  it("stops when the connection closes", async () => {
    vi.useFakeTimers();
    const transport = new MemoryTransport();
    const { conn } = manager(new MemoryConnector([transport]).connect, 500);

    await conn.connect();
    await vi.advanceTimersByTimeAsync(0);
    await conn.close();
    const beats = transport.heartbeatCount();

    await vi.advanceTimersByTimeAsync(5_000);
    expect(transport.heartbeatCount()).toBe(beats);
    expect(vi.getTimerCount()).toBe(0);
  });
});
