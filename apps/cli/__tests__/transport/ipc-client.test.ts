/**
 * IPC Client Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { existsSync, rmSync, mkdirSync } from "node:fs";
import { createServer, type Server } from "node:net";
import { IPCClientImpl } from "../../src/transport/ipc-client.js";
import { CLOSE_EVENT, RPCCallError, RPCErrorCode } from "../../src/transport/types.js";
import {
  FakeRpcError,
  FakeUpdateEngine,
  testSocketPath,
  type FakeUpdateEngineOptions,
} from "../helpers/fake-update-engine.js";

describe("IPCClient", () => {
  let testDir: string;
  let socketPath: string;
  let server: FakeUpdateEngine | undefined;
  let client: IPCClientImpl | undefined;
  let rawServer: Server | undefined;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    testDir = join(tmpdir(), `otactl-ipc-client-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
    socketPath = testSocketPath(testDir, "ipc-client-test");
  });

  afterEach(async () => {
    await client?.close();
    client = undefined;
    await server?.stop();
    server = undefined;
    const raw = rawServer;
    rawServer = undefined;
    if (raw) {
      await new Promise<void>((resolve) => raw.close(() => resolve()));
    }
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
    vi.restoreAllMocks();
  });

  async function startServerWith(
    options: Omit<FakeUpdateEngineOptions, "socketPath">,
  ): Promise<FakeUpdateEngine> {
    const fake = new FakeUpdateEngine({ socketPath, ...options });
    server = fake;
    await fake.start();
    return fake;
  }

  function startServer(handlers?: FakeUpdateEngineOptions["handlers"]): Promise<FakeUpdateEngine> {
    return startServerWith({ handlers });
  }

  it("sends a request and receives the response", async () => {
    await startServer({ "test.ping": () => ({ pong: true }) });

    client = new IPCClientImpl({ socketPath });
    await client.connect();

    await expect(client.call("test.ping")).resolves.toEqual({ pong: true });
  });

  it("sends params with the request", async () => {
    const fake = await startServer({ "test.echo": (params) => params });

    client = new IPCClientImpl({ socketPath });
    await client.connect();

    await expect(client.call("test.echo", { uri: "file:///tmp/p.bin" })).resolves.toEqual({
      uri: "file:///tmp/p.bin",
    });
    expect(fake.requests).toEqual([
      { id: 1, method: "test.echo", params: { uri: "file:///tmp/p.bin" } },
    ]);
  });

  it("rejects with the RPC error code of an error response", async () => {
    await startServer({
      "test.fail": () => {
        throw new FakeRpcError(RPCErrorCode.METHOD_NOT_FOUND, "Unknown method");
      },
    });

    client = new IPCClientImpl({ socketPath });
    await client.connect();

    const error = await client.call("test.fail").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RPCCallError);
    expect(error).toMatchObject({ message: "Unknown method", rpcCode: -32601 });
  });

  it("rejects on timeout", async () => {
    await startServer({ "test.slow": () => new Promise(() => {}) });

    client = new IPCClientImpl({ socketPath, timeoutMs: 100 });
    await client.connect();

    await expect(client.call("test.slow")).rejects.toThrow("RPC timeout after 100ms");
  });

  it("waits past any fixed delay when the timeout is 0", async () => {
    await startServer({
      "test.late": () => new Promise((resolve) => setTimeout(() => resolve("late"), 150)),
    });

    client = new IPCClientImpl({ socketPath, timeoutMs: 0 });
    await client.connect();

    await expect(client.call("test.late")).resolves.toBe("late");
  });

  it("receives events from the server", async () => {
    const fake = await startServer();

    client = new IPCClientImpl({ socketPath });
    await client.connect();

    const received: unknown[] = [];
    client.on("update_engine.status", (data) => received.push(data));
    await vi.waitFor(() => expect(fake.connectionCount()).toBe(1));

    fake.emitStatus(3, 0.25);

    await vi.waitFor(() => expect(received).toEqual([{ status: 3, progress: 0.25 }]));
  });

  it("emits _close and rejects pending calls when the server drops the connection", async () => {
    const fake = await startServer({ "test.slow": () => new Promise(() => {}) });

    client = new IPCClientImpl({ socketPath });
    await client.connect();
    const closed = vi.fn();
    client.on(CLOSE_EVENT, closed);

    const pending = client.call("test.slow");
    await vi.waitFor(() => expect(fake.connectionCount()).toBe(1));
    fake.dropClients();

    await expect(pending).rejects.toThrow("Connection closed");
    await vi.waitFor(() => expect(closed).toHaveBeenCalledTimes(1));
  });

  it("does not emit _close when the client closes the connection itself", async () => {
    await startServer();

    client = new IPCClientImpl({ socketPath });
    await client.connect();
    const closed = vi.fn();
    client.on(CLOSE_EVENT, closed);

    await client.close();

    expect(closed).not.toHaveBeenCalled();
  });

  it("closes without waiting for a peer that keeps its side open", async () => {
    const fake = await startServerWith({ allowHalfOpen: true });

    client = new IPCClientImpl({ socketPath });
    await client.connect();
    await expect(client.call("update_engine.suspend")).resolves.toEqual({ errorCode: 0 });
    await vi.waitFor(() => expect(fake.connectionCount()).toBe(1));

    const outcome = await Promise.race([
      client.close().then(() => "closed"),
      new Promise((resolve) => setTimeout(() => resolve("hung"), 2000)),
    ]);

    expect(outcome).toBe("closed");
  });

  it("decodes a multi-byte character split across two reads", async () => {
    const reply = Buffer.from(
      JSON.stringify({ id: 1, error: { code: RPCErrorCode.INTERNAL_ERROR, message: "échec" } }) + "\n",
      "utf-8",
    );
    const split = reply.indexOf(0xc3) + 1;
    const raw = createServer((socket) => {
      socket.once("data", () => {
        socket.write(reply.subarray(0, split));
        setTimeout(() => socket.write(reply.subarray(split)), 50);
      });
    });
    rawServer = raw;
    await new Promise<void>((resolve) => raw.listen(socketPath, () => resolve()));

    client = new IPCClientImpl({ socketPath });
    await client.connect();

    const error = await client.call("update_engine.cancel").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RPCCallError);
    expect(error).toMatchObject({ message: "échec", rpcCode: -32603 });
  });

  it("rejects calls before connect", async () => {
    client = new IPCClientImpl({ socketPath });

    await expect(client.call("test.ping")).rejects.toThrow("Client not connected");
  });

  it("errors when the socket doesn't exist", async () => {
    client = new IPCClientImpl({ socketPath: testSocketPath(testDir, "nonexistent") });

    await expect(client.connect()).rejects.toThrow();
  });
});
