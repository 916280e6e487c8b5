/**
 * Remote service proxy: the fixed call surface of the update engine.
 */

import type { UpdateEngineCallback } from "./listener.js";
import type { CallResult } from "./result.js";

export interface UpdateEngineService {
  suspend(): Promise<CallResult<void>>;
  resume(): Promise<CallResult<void>>;
  cancel(): Promise<CallResult<void>>;

  /** Start applying the payload at `uri`. Headers are `key: value` lines, in order. */
  applyPayload(uri: string, headers: readonly string[]): Promise<CallResult<void>>;

  /**
   * Register a callback for status and completion notifications.
   * Resolves to `ok` with `false` when the service refused the binding.
   */
  bind(callback: UpdateEngineCallback): Promise<CallResult<boolean>>;

  /** Invoked once if the connection to the service is lost. */
  onServiceDied(handler: () => void): void;

  /** Release the connection (and with it, any binding). */
  close(): Promise<void>;
}

/** Acquires a connected service proxy. Rejects with a ConnectionError. */
export type ServiceConnector = () => Promise<UpdateEngineService>;
