/**
 * ExitCoordinator: owns the single exit outcome of a client run.
 *
 * requestExit() never ends the process inline: it posts a quit task on the
 * event loop, so replies already in flight finish their round trip first.
 * Only the first request counts.
 */

import type { CallResult, ExitOutcome, TaskScheduler } from "@otactl/sdk";
import { EXIT_FAILURE, EXIT_OK, ErrorCode, SchedulingFailure } from "@otactl/sdk";
import { createLogger, errorCodeToString } from "@otactl/shared";

const logger = createLogger("ExitCoordinator");

/** The part of the event loop the coordinator needs. */
export interface EventLoopQuitHandle extends TaskScheduler {
  quitWithExitCode(code: number): void;
}

export const OK_OUTCOME: ExitOutcome = Object.freeze({ ok: true, code: EXIT_OK });
export const FAILURE_OUTCOME: ExitOutcome = Object.freeze({ ok: false, code: EXIT_FAILURE });

export interface ExitCoordinator {
  /**
   * Record `outcome` and schedule the quit task.
   * Returns EXIT_OK when the task was scheduled (or an outcome already
   * exists), EXIT_FAILURE when the event loop refused it.
   */
  requestExit(outcome: ExitOutcome): number;
  /** The recorded outcome, or null while none was requested. */
  getOutcome(): ExitOutcome | null;
}

/** ok → 0; any failure → 1, with the failure description logged. */
export function outcomeFromResult(result: CallResult<unknown>): ExitOutcome {
  if (result.ok) {
    return OK_OUTCOME;
  }
  logger.error(result.error.message, { code: result.error.code });
  return FAILURE_OUTCOME;
}

/** SUCCESS → 0; any other update error code → 1. */
export function outcomeFromErrorCode(errorCode: number): ExitOutcome {
  if (errorCode === ErrorCode.SUCCESS) {
    return OK_OUTCOME;
  }
  logger.error(`Update failed with ${errorCodeToString(errorCode)} (${errorCode})`);
  return FAILURE_OUTCOME;
}

export function createExitCoordinator(loop: EventLoopQuitHandle): ExitCoordinator {
  let outcome: ExitOutcome | null = null;

  return {
    requestExit(requested: ExitOutcome): number {
      if (outcome) {
        logger.debug("Exit already requested, ignoring", {
          requested: requested.code,
          recorded: outcome.code,
        });
        return EXIT_OK;
      }
      outcome = requested;

      const code = requested.code;
      const posted = loop.postTask(() => loop.quitWithExitCode(code));
      if (!posted) {
        const failure = new SchedulingFailure("Failed to schedule exit: event loop is no longer accepting tasks");
        logger.error(failure.message, { code: failure.code });
        return EXIT_FAILURE;
      }
      logger.debug("Exit scheduled", { exitCode: code });
      return EXIT_OK;
    },

    getOutcome(): ExitOutcome | null {
      return outcome;
    },
  };
}
