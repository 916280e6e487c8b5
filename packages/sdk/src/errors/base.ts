/**
 * Error hierarchy for the update engine client.
 *
 * Every error is terminal for the invocation; nothing is retried.
 */

export class ClientError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ClientError";
  }
}

/** Bad or missing flags, stray positional arguments. No remote call is made. */
export class UsageError extends ClientError {
  constructor(message: string) {
    super(message, "USAGE_ERROR");
    this.name = "UsageError";
  }
}

/** The update engine could not be reached, or the connection was lost. */
export class ConnectionError extends ClientError {
  constructor(
    public readonly endpoint: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Connection to "${endpoint}" failed: ${message}`, "CONNECTION_ERROR", options);
    this.name = "ConnectionError";
  }
}

/** A specific remote call did not succeed. */
export class CallFailure extends ClientError {
  /** Error code from the RPC error payload, when the service sent one. */
  public readonly remoteCode?: number;

  constructor(
    public readonly method: string,
    message: string,
    options?: { cause?: unknown; code?: string; remoteCode?: number },
  ) {
    super(`${method}() failed: ${message}`, options?.code ?? "CALL_FAILURE", options);
    this.name = "CallFailure";
    this.remoteCode = options?.remoteCode;
  }
}

/** The service answered with a non-success update error code. */
export class RemoteErrorCodeError extends CallFailure {
  constructor(
    method: string,
    public readonly errorCode: number,
    errorName: string,
  ) {
    super(method, `update engine returned ${errorName} (${errorCode})`, {
      code: "REMOTE_ERROR_CODE",
    });
    this.name = "RemoteErrorCodeError";
  }
}

/** The deferred-exit task could not be enqueued. */
export class SchedulingFailure extends ClientError {
  constructor(message: string) {
    super(message, "SCHEDULING_FAILURE");
    this.name = "SchedulingFailure";
  }
}

export class ConfigError extends ClientError {
  constructor(
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}
