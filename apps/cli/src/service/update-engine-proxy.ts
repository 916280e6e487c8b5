/**
 * RemoteUpdateEngine: UpdateEngineService backed by the IPC transport.
 *
 * Every call is awaited and mapped to a CallResult; nothing is retried.
 * Notifications and connection loss are posted to the injected scheduler so
 * that they run on the client's event loop, in the order they arrived.
 */

import type {
  CallResult,
  TaskScheduler,
  UpdateEngineCallback,
  UpdateEngineService,
} from "@otactl/sdk";
import {
  CallFailure,
  ConnectionError,
  ErrorCode,
  RemoteErrorCodeError,
  failed,
  succeeded,
} from "@otactl/sdk";
import { createLogger, errorCodeToString, formatZodError } from "@otactl/shared";
import type { ClientConfig } from "@otactl/shared";
import type { ZodType, ZodTypeDef } from "zod";
import { IPCClientImpl } from "../transport/ipc-client.js";
import {
  ApplyPayloadParamsSchema,
  BindResultSchema,
  CallResultSchema,
  CLOSE_EVENT,
  CompleteEventSchema,
  Events,
  Methods,
  RPCCallError,
  StatusEventSchema,
} from "../transport/types.js";
import type { IPCClient } from "../transport/types.js";

const logger = createLogger("UpdateEngineProxy");

export class RemoteUpdateEngine implements UpdateEngineService {
  private bound = false;
  private dead = false;
  private deathHandlers: Array<() => void> = [];

  constructor(
    private readonly client: IPCClient,
    private readonly scheduler: TaskScheduler,
    private readonly endpoint: string,
  ) {
    client.on(CLOSE_EVENT, () => this.handleConnectionLost());
  }

  suspend(): Promise<CallResult<void>> {
    return this.invoke("suspend", Methods.SUSPEND);
  }

  resume(): Promise<CallResult<void>> {
    return this.invoke("resume", Methods.RESUME);
  }

  cancel(): Promise<CallResult<void>> {
    return this.invoke("cancel", Methods.CANCEL);
  }

  applyPayload(uri: string, headers: readonly string[]): Promise<CallResult<void>> {
    const params = ApplyPayloadParamsSchema.safeParse({ uri, headers: [...headers] });
    if (!params.success) {
      return Promise.resolve(
        failed(new CallFailure("applyPayload", `invalid params: ${formatZodError(params.error)}`)),
      );
    }
    return this.invoke("applyPayload", Methods.APPLY_PAYLOAD, params.data);
  }

  async bind(callback: UpdateEngineCallback): Promise<CallResult<boolean>> {
    if (this.bound) {
      return failed(new CallFailure("bind", "a callback is already bound to this client"));
    }

    // Handlers go in before the call: the first notification may arrive with the reply.
    this.client.on(Events.STATUS, (data) => {
      const event = StatusEventSchema.safeParse(data);
      if (!event.success) {
        logger.warn("Ignoring malformed status notification", { error: formatZodError(event.error) });
        return;
      }
      this.post(() => callback.onStatusUpdate(event.data.status, event.data.progress));
    });
    this.client.on(Events.COMPLETE, (data) => {
      const event = CompleteEventSchema.safeParse(data);
      if (!event.success) {
        logger.warn("Ignoring malformed completion notification", {
          error: formatZodError(event.error),
        });
        return;
      }
      this.post(() => callback.onPayloadApplicationComplete(event.data.errorCode));
    });
    this.bound = true;

    const reply = await this.request("bind", Methods.BIND, BindResultSchema);
    if (!reply.ok) {
      return reply;
    }
    return succeeded(reply.value.bound);
  }

  onServiceDied(handler: () => void): void {
    if (this.dead) {
      this.post(handler);
      return;
    }
    this.deathHandlers.push(handler);
  }

  close(): Promise<void> {
    return this.client.close();
  }

  private async invoke(
    method: string,
    rpcMethod: string,
    params?: unknown,
  ): Promise<CallResult<void>> {
    const reply = await this.request(method, rpcMethod, CallResultSchema, params);
    if (!reply.ok) {
      return reply;
    }
    const errorCode = reply.value?.errorCode ?? ErrorCode.SUCCESS;
    if (errorCode !== ErrorCode.SUCCESS) {
      return failed(new RemoteErrorCodeError(method, errorCode, errorCodeToString(errorCode)));
    }
    return succeeded(undefined);
  }

  private async request<Output, Input>(
    method: string,
    rpcMethod: string,
    schema: ZodType<Output, ZodTypeDef, Input>,
    params?: unknown,
  ): Promise<CallResult<Output>> {
    let raw: unknown;
    try {
      raw = await this.client.call(rpcMethod, params);
    } catch (err) {
      if (err instanceof RPCCallError) {
        return failed(new CallFailure(method, err.message, { cause: err, remoteCode: err.rpcCode }));
      }
      return failed(new CallFailure(method, String(err), { cause: err }));
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      return failed(
        new CallFailure(method, `unexpected reply: ${formatZodError(parsed.error)}`),
      );
    }
    return succeeded(parsed.data);
  }

  private post(task: () => void): void {
    if (!this.scheduler.postTask(task)) {
      logger.debug("Dropping notification: event loop is closed");
    }
  }

  private handleConnectionLost(): void {
    if (this.dead) return;
    this.dead = true;
    logger.warn("Lost the connection to the update engine", { endpoint: this.endpoint });
    for (const handler of this.deathHandlers) {
      this.post(handler);
    }
  }
}

/** Connect to the update engine and wrap the connection in a proxy. */
export async function connectUpdateEngine(
  config: ClientConfig,
  scheduler: TaskScheduler,
): Promise<UpdateEngineService> {
  const client = new IPCClientImpl({
    socketPath: config.socketPath,
    timeoutMs: config.callTimeoutMs,
  });
  try {
    await client.connect();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConnectionError(config.socketPath, message, { cause: err });
  }
  logger.debug("Connected to the update engine", { endpoint: config.socketPath });
  return new RemoteUpdateEngine(client, scheduler, config.socketPath);
}
