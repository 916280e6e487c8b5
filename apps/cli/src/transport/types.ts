/**
 * Transport types: line-delimited JSON messages exchanged with the update engine.
 */

import { z } from "zod";

/** Request sent from the client to the update engine. */
export interface RPCRequest {
  /** Request ID (for matching the response) */
  id: number;

  method: string;

  params?: unknown;
}

/** RPC error structure. */
export interface RPCError {
  /** Negative integers, JSON-RPC 2.0 convention */
  code: number;

  message: string;

  data?: unknown;
}

/** Response sent from the update engine to the client. */
export interface RPCResponse {
  id: number;

  /** Present on success */
  result?: unknown;

  /** Present on failure */
  error?: RPCError;
}

/** Notification pushed by the update engine (unidirectional). */
export interface RPCEvent {
  event: string;
  data?: unknown;
}

export const RPCErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const RPCResponseSchema = z.object({
  id: z.number().int(),
  result: z.unknown().optional(),
  error: RPCErrorSchema.optional(),
});

export const RPCEventSchema = z.object({
  event: z.string(),
  data: z.unknown(),
});

export const RPCRequestSchema = z.object({
  id: z.number().int(),
  method: z.string(),
  params: z.unknown().optional(),
});

/** Client side of the transport. */
export interface IPCClient {
  connect(): Promise<void>;

  /** Send a request and wait for its response. Rejects with an RPCCallError. */
  call(method: string, params?: unknown): Promise<unknown>;

  /** End the connection once pending writes have flushed. */
  close(): Promise<void>;

  /** Listen for notifications. `_close` fires when the connection ends. */
  on(event: string, handler: (data: unknown) => void): void;
}

export interface IPCClientOptions {
  /** Unix domain socket path or Windows named pipe */
  socketPath: string;

  /** Per-call timeout in milliseconds; 0 waits forever (default: 0) */
  timeoutMs?: number;
}

/** A call was answered with an error payload, timed out, or lost its connection. */
export class RPCCallError extends Error {
  constructor(
    message: string,
    public readonly rpcCode?: number,
  ) {
    super(message);
    this.name = "RPCCallError";
  }
}

/** Internal event emitted when the connection ends. */
export const CLOSE_EVENT = "_close";

/** Remote methods of the update engine. */
export const Methods = {
  SUSPEND: "update_engine.suspend",
  RESUME: "update_engine.resume",
  CANCEL: "update_engine.cancel",
  APPLY_PAYLOAD: "update_engine.applyPayload",
  BIND: "update_engine.bind",
} as const;

/** Notifications delivered after a successful bind. */
export const Events = {
  STATUS: "update_engine.status",
  COMPLETE: "update_engine.complete",
} as const;

/** Result of every call except bind. `errorCode` defaults to SUCCESS. */
export const CallResultSchema = z
  .object({ errorCode: z.number().int().nonnegative().default(0) })
  .passthrough()
  .nullish();

export const BindResultSchema = z.object({ bound: z.boolean() });

export const ApplyPayloadParamsSchema = z.object({
  uri: z.string().min(1),
  headers: z.array(z.string()),
});

export const StatusEventSchema = z.object({
  status: z.number().int(),
  progress: z.number().min(0).max(1),
});

export const CompleteEventSchema = z.object({
  errorCode: z.number().int().nonnegative(),
});

export const RPCErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  TIMEOUT: -32000,
  CONNECTION_CLOSED: -32001,
} as const;
