// Execution
export { createTaskQueue } from "./execution/queue.js";
export type { TaskQueue } from "./execution/queue.js";
export { createEventLoop } from "./execution/loop.js";
export type { EventLoop, LoopState } from "./execution/loop.js";

// Exit coordination
export {
  createExitCoordinator,
  outcomeFromResult,
  outcomeFromErrorCode,
  OK_OUTCOME,
  FAILURE_OUTCOME,
} from "./exit/exit-coordinator.js";
export type { ExitCoordinator, EventLoopQuitHandle } from "./exit/exit-coordinator.js";

// Callback listener
export { createUpdateCallback } from "./callback/update-callback.js";
export type { UpdateCallbackState } from "./callback/update-callback.js";

// Dispatch
export {
  createCommandDispatcher,
  primaryAction,
  validateOptions,
} from "./dispatcher/command-dispatcher.js";
export type {
  CommandDispatcher,
  CommandDispatcherDeps,
  DispatcherState,
  DispatchInput,
  PrimaryAction,
  ValidatedInput,
} from "./dispatcher/command-dispatcher.js";
