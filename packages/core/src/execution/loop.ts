/**
 * EventLoop: the client's single task queue.
 *
 * Incoming notifications and the deferred-exit task both arrive here as
 * tasks and run strictly one after another. The loop only ends when a task
 * calls quitWithExitCode(); run() then resolves to that code.
 *
 * State machine:
 *   IDLE → RUNNING → QUIT
 *   IDLE → QUIT (quit requested before run(); run() returns immediately)
 */

import type { Task, TaskScheduler } from "@otactl/sdk";
import { createLogger } from "@otactl/shared";
import { createTaskQueue } from "./queue.js";

const logger = createLogger("EventLoop");

export type LoopState = "IDLE" | "RUNNING" | "QUIT";

export interface EventLoop extends TaskScheduler {
  /** Run queued tasks until quitWithExitCode() is called. Resolves to the exit code. */
  run(): Promise<number>;
  /** Stop accepting tasks and end run() once the current task returns. */
  quitWithExitCode(code: number): void;
  getState(): LoopState;
  /** Number of tasks waiting to run. */
  pending(): number;
}

export function createEventLoop(): EventLoop {
  const queue = createTaskQueue<Task>();
  let state: LoopState = "IDLE";
  let exitCode: number | null = null;

  // Read through a function: quitWithExitCode() changes it while run() awaits.
  function requestedExitCode(): number | null {
    return exitCode;
  }

  function runTask(task: Task): void {
    try {
      task();
    } catch (err) {
      logger.error("Task failed", { error: String(err) });
    }
  }

  return {
    postTask(task: Task): boolean {
      if (exitCode !== null) {
        return false;
      }
      queue.push(task);
      return true;
    },

    async run(): Promise<number> {
      if (state === "RUNNING") {
        throw new Error("Event loop is already running");
      }
      const early = requestedExitCode();
      if (early !== null) {
        return early;
      }

      state = "RUNNING";
      logger.debug("Event loop started");
      let code: number | null = null;
      while (code === null) {
        runTask(await queue.pull());
        code = requestedExitCode();
      }
      queue.clear();
      state = "QUIT";
      logger.debug("Event loop stopped", { exitCode: code });
      return code;
    },

    quitWithExitCode(code: number): void {
      if (exitCode !== null) {
        return;
      }
      exitCode = code;
      if (state === "RUNNING") {
        // Wake a consumer parked on an empty queue.
        queue.push(() => {});
      } else {
        state = "QUIT";
      }
    },

    getState(): LoopState {
      return state;
    },

    pending(): number {
      return queue.size();
    },
  };
}
