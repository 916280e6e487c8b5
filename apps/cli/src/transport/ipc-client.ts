/**
 * IPC Client: Unix domain socket / named pipe client for the update engine.
 *
 * Protocol: Line-delimited JSON (newline-separated messages).
 */

import { connect, type Socket } from "node:net";
import { StringDecoder } from "node:string_decoder";
import { createLogger } from "@otactl/shared";
import {
  CLOSE_EVENT,
  RPCCallError,
  RPCErrorCode,
  RPCEventSchema,
  RPCResponseSchema,
} from "./types.js";
import type { IPCClient, IPCClientOptions, RPCEvent, RPCRequest } from "./types.js";

const logger = createLogger("IPCClient");

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * Implementation of the IPC client over node:net.
 */
export class IPCClientImpl implements IPCClient {
  private socket: Socket | null = null;
  private readonly socketPath: string;
  private readonly timeoutMs: number;
  private buffer = "";
  private readonly decoder = new StringDecoder("utf8");
  private pendingRequests = new Map<number, PendingRequest>();
  private eventHandlers = new Map<string, Array<(data: unknown) => void>>();
  private nextRequestId = 1;
  private closing = false;

  constructor(options: IPCClientOptions) {
    this.socketPath = options.socketPath;
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = connect(this.socketPath);
      let connected = false;

      socket.on("connect", () => {
        connected = true;
        this.socket = socket;
        resolve();
      });

      socket.on("error", (err) => {
        if (!connected) {
          reject(err);
          return;
        }
        logger.warn("Socket error", { endpoint: this.socketPath, error: err.message });
      });

      socket.on("data", (data) => {
        this.handleData(data);
      });

      socket.on("close", () => {
        if (!connected) return;
        this.socket = null;
        this.cleanup();
        if (!this.closing) {
          // Connection lost
          this.handleEvent({ event: CLOSE_EVENT, data: null });
        }
      });
    });
  }

  call(method: string, params?: unknown): Promise<unknown> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(
        new RPCCallError("Client not connected", RPCErrorCode.CONNECTION_CLOSED),
      );
    }

    const id = this.nextRequestId++;
    const request: RPCRequest = params === undefined ? { id, method } : { id, method, params };

    return new Promise((resolve, reject) => {
      const timer =
        this.timeoutMs > 0
          ? setTimeout(() => {
              this.pendingRequests.delete(id);
              reject(new RPCCallError(`RPC timeout after ${this.timeoutMs}ms`, RPCErrorCode.TIMEOUT));
            }, this.timeoutMs)
          : null;

      this.pendingRequests.set(id, { resolve, reject, timer });
      logger.debug("Sending request", { id, method });
      socket.write(JSON.stringify(request) + "\n");
    });
  }

  close(): Promise<void> {
    this.closing = true;
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      this.cleanup();
      return Promise.resolve();
    }
    // Do not wait for the peer to end its side: once our writes are flushed, we are done.
    return new Promise((resolve) => {
      socket.end(() => {
        socket.destroy();
        resolve();
      });
    });
  }

  on(event: string, handler: (data: unknown) => void): void {
    const handlers = this.eventHandlers.get(event);
    if (handlers) {
      handlers.push(handler);
    } else {
      this.eventHandlers.set(event, [handler]);
    }
  }

  private handleData(data: Buffer): void {
    // A multi-byte character may span two reads; the decoder holds the partial bytes.
    this.buffer += this.decoder.write(data);

    let newlineIndex: number;
    while ((newlineIndex = this.buffer.indexOf("\n")) !== -1) {
      const line = this.buffer.slice(0, newlineIndex);
      this.buffer = this.buffer.slice(newlineIndex + 1);

      if (line.trim().length > 0) {
        this.handleMessage(line);
      }
    }
  }

  private handleMessage(line: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      logger.error("Failed to parse message", { error: String(err) });
      return;
    }

    const event = RPCEventSchema.safeParse(parsed);
    if (event.success) {
      this.handleEvent(event.data);
      return;
    }

    const response = RPCResponseSchema.safeParse(parsed);
    if (!response.success) {
      logger.error("Ignoring malformed message", { line });
      return;
    }

    const pending = this.pendingRequests.get(response.data.id);
    if (!pending) {
      logger.warn(`Received response for unknown request ID: ${response.data.id}`);
      return;
    }
    if (pending.timer) {
      clearTimeout(pending.timer);
    }
    this.pendingRequests.delete(response.data.id);

    const error = response.data.error;
    if (error) {
      pending.reject(new RPCCallError(error.message, error.code));
    } else {
      pending.resolve(response.data.result);
    }
  }

  private handleEvent(event: RPCEvent): void {
    const handlers = this.eventHandlers.get(event.event);
    if (!handlers) {
      logger.debug(`No handler for event "${event.event}"`);
      return;
    }
    for (const handler of handlers) {
      try {
        handler(event.data);
      } catch (err) {
        logger.error("Event handler error", { event: event.event, error: String(err) });
      }
    }
  }

  private cleanup(): void {
    for (const pending of this.pendingRequests.values()) {
      if (pending.timer) {
        clearTimeout(pending.timer);
      }
      pending.reject(new RPCCallError("Connection closed", RPCErrorCode.CONNECTION_CLOSED));
    }
    this.pendingRequests.clear();
  }
}
