/**
 * Update callback: the listener bound to the update engine in --follow mode.
 *
 * Status updates are only logged. The first completion notification hands
 * the outcome to the exit coordinator; repeats are ignored.
 */

import type { UpdateEngineCallback } from "@otactl/sdk";
import { createLogger, errorCodeToString, updateStatusToString } from "@otactl/shared";
import { outcomeFromErrorCode, type ExitCoordinator } from "../exit/exit-coordinator.js";

const logger = createLogger("UpdateCallback");

export interface UpdateCallbackState {
  /** Completion notifications received, including ignored repeats. */
  completions: number;
}

export function createUpdateCallback(
  coordinator: ExitCoordinator,
  state: UpdateCallbackState = { completions: 0 },
): UpdateEngineCallback {
  return {
    onStatusUpdate(status: number, progress: number): void {
      logger.info(`onStatusUpdate(${updateStatusToString(status)} (${status}), ${progress})`);
    },

    onPayloadApplicationComplete(errorCode: number): void {
      state.completions++;
      logger.info(`onPayloadApplicationComplete(${errorCodeToString(errorCode)} (${errorCode}))`);
      if (state.completions > 1) {
        logger.warn("Ignoring repeated completion notification", { errorCode });
        return;
      }
      coordinator.requestExit(outcomeFromErrorCode(errorCode));
    },
  };
}
