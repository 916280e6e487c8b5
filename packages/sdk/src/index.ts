// Types
export { UpdateStatus } from "./types/status.js";
export type { UpdateStatusValue } from "./types/status.js";

export { ErrorCode } from "./types/error-code.js";
export type { ErrorCodeValue } from "./types/error-code.js";

export { EXIT_OK, EXIT_FAILURE, succeeded, failed } from "./types/result.js";
export type { CallResult, ExitOutcome } from "./types/result.js";

export type { UpdateEngineCallback } from "./types/listener.js";
export type { UpdateEngineService, ServiceConnector } from "./types/service.js";
export type { Task, TaskScheduler } from "./types/scheduler.js";

// Errors
export {
  ClientError,
  UsageError,
  ConnectionError,
  CallFailure,
  RemoteErrorCodeError,
  SchedulingFailure,
  ConfigError,
} from "./errors/base.js";
